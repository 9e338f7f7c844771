/**
 * Helpers.ts
 * Utility functions for value conversion.
 */

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY = /^([+-]?)inf(inity)?$/i;

/**
 * Parses a textual decimal number (e.g. "-2.37"), including the spellings
 * "Inf", "-Infinity" and "NaN". Returns undefined for anything else, such as
 * the "- Inf" (with a space) the vendor prints for a dark receiver.
 */
export function parseDecimal(str: string): number | undefined {
    const trimmed = str.trim();
    if (DECIMAL.test(trimmed)) return Number(trimmed);

    const infinity = INFINITY.exec(trimmed);
    if (infinity) return infinity[1] === '-' ? -Infinity : Infinity;

    if (trimmed.toLowerCase() === 'nan') return NaN;
    return undefined;
}

/**
 * Encodes a boolean as a gauge value.
 */
export function boolToGauge(value: boolean): number {
    return value ? 1 : 0;
}

/**
 * Standardizes boolean settings (yes/no/true/false/1/0/on/off) to JS booleans.
 */
export function parseBoolean(value: string): boolean | null {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === 'yes' || normalized === '1' || normalized === 'on') return true;
    if (normalized === 'false' || normalized === 'no' || normalized === '0' || normalized === 'off') return false;
    return null; // Not a boolean
}
