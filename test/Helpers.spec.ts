import { boolToGauge, parseBoolean, parseDecimal } from '../src/utils/Helpers';

describe('Helpers', () => {
    it('parses plain decimals only', () => {
        expect(parseDecimal('-2.60')).toBe(-2.6);
        expect(parseDecimal(' 3.3000 ')).toBe(3.3);
        expect(parseDecimal('.5')).toBe(0.5);
        expect(parseDecimal('1e3')).toBe(1000);
        expect(parseDecimal('- Inf')).toBeUndefined();
        expect(parseDecimal('')).toBeUndefined();
        expect(parseDecimal('0x10')).toBeUndefined();
    });

    it('parses infinity and NaN spellings', () => {
        expect(parseDecimal('Inf')).toBe(Infinity);
        expect(parseDecimal('+inf')).toBe(Infinity);
        expect(parseDecimal('-Inf')).toBe(-Infinity);
        expect(parseDecimal('-Infinity')).toBe(-Infinity);
        expect(parseDecimal('NaN')).toBeNaN();
    });

    it('encodes booleans as gauge values', () => {
        expect(boolToGauge(true)).toBe(1);
        expect(boolToGauge(false)).toBe(0);
    });

    it('normalizes boolean settings', () => {
        expect(parseBoolean(' YES ')).toBe(true);
        expect(parseBoolean('off')).toBe(false);
        expect(parseBoolean('maybe')).toBeNull();
    });
});
