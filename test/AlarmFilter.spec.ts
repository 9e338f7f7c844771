import { AlarmFilter } from '../src/client/AlarmFilter';
import { ConfigError } from '../src/core/ExporterError';

describe('AlarmFilter', () => {
    it('treats a missing or empty pattern as no filter', () => {
        expect(AlarmFilter.compile(undefined)).toBeNull();
        expect(AlarmFilter.compile('')).toBeNull();
    });

    it('matches on the description or the type, unanchored', () => {
        const filter = AlarmFilter.compile('fan|PEM');

        expect(filter?.matches({ description: 'Fan Tray Failure', type: 'Chassis' })).toBe(false);
        expect(filter?.matches({ description: 'Tray fan failure', type: 'Chassis' })).toBe(true);
        expect(filter?.matches({ description: 'Power supply', type: 'PEM' })).toBe(true);
        expect(filter?.matches({ description: 'Rescue configuration is not set', type: 'Configuration' })).toBe(false);
    });

    it('rejects invalid patterns with a ConfigError', () => {
        expect(() => AlarmFilter.compile('[unclosed')).toThrow(ConfigError);

        try {
            AlarmFilter.compile('[unclosed');
        } catch (error) {
            expect(error).toMatchObject({ field: 'alarmFilter', kind: 'config' });
        }
    });

    it('is immutable once compiled', () => {
        const filter = AlarmFilter.compile('PEM');

        expect(Object.isFrozen(filter)).toBe(true);
        expect(filter?.source).toBe('PEM');
    });
});
