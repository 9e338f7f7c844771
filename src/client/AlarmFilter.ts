import { ConfigError, describeError } from '../core/ExporterError';

/**
 * The fields of an alarm the filter looks at.
 */
export interface FilterableAlarm {
    readonly description: string;
    readonly type: string;
}

/**
 * Compiled alarm exclusion pattern.
 *
 * The pattern is compiled once and the instance is frozen, so one filter can be
 * shared by every client and evaluated from concurrent collections. Matching is
 * an unanchored search, like `RegExp.prototype.test`.
 *
 * @example
 * const filter = AlarmFilter.compile('fan|PEM');
 * filter.matches({ description: 'Fan Tray Failure', type: 'Chassis' }); // true
 */
export class AlarmFilter {
    private readonly pattern: RegExp;

    private constructor(public readonly source: string) {
        try {
            this.pattern = new RegExp(source);
        } catch (error) {
            throw new ConfigError('alarmFilter', `invalid pattern "${source}": ${describeError(error)}`, error);
        }
        Object.freeze(this);
    }

    /**
     * Compiles a pattern. An empty or missing pattern means "no filter".
     * @throws ConfigError when the pattern is not a valid regular expression.
     */
    public static compile(source: string | undefined): AlarmFilter | null {
        if (source === undefined || source.length === 0) return null;
        return new AlarmFilter(source);
    }

    public matches(alarm: FilterableAlarm): boolean {
        return this.pattern.test(alarm.description) || this.pattern.test(alarm.type);
    }
}
