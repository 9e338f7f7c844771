/**
 * core/ExporterError.ts
 *
 * Error hierarchy for the collection pipeline.
 * - TransportError: the command channel failed (connectivity, auth, timeout).
 * - DecodeError: a reply did not match the expected XML envelope.
 * - ConfigError: invalid settings, raised before any collection starts.
 */

export type ExporterErrorKind = 'transport' | 'decode' | 'config';

export abstract class ExporterError extends Error {
    public readonly isExporterError = true;
    public readonly timestamp: Date;
    public abstract readonly kind: ExporterErrorKind;

    protected constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.timestamp = new Date();

        // Fix for extending built-ins in TypeScript/ES6
        Object.setPrototypeOf(this, new.target.prototype);
    }

    get isTransport(): boolean {
        return this.kind === 'transport';
    }

    get isDecode(): boolean {
        return this.kind === 'decode';
    }

    get isConfig(): boolean {
        return this.kind === 'config';
    }

    /**
     * Flat representation for structured log sinks.
     */
    public toJSON(): Record<string, unknown> {
        return {
            errorType: this.name,
            kind: this.kind,
            message: this.message,
            timestamp: this.timestamp
        };
    }
}

/**
 * The remote session could not run a command.
 * Format: "Transport [10.0.0.1] (show bgp summary | display xml) -> connection reset"
 */
export class TransportError extends ExporterError {
    public readonly kind = 'transport';

    constructor(
        public readonly host: string,
        public readonly detail: string,
        public readonly command?: string,
        cause?: unknown
    ) {
        super(`Transport [${host}]${command ? ` (${command})` : ''} -> ${detail}`, cause);
        this.name = 'TransportError';
    }

    public toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), host: this.host, command: this.command, detail: this.detail };
    }
}

/**
 * A reply was malformed XML or did not fit the domain's envelope schema.
 */
export class DecodeError extends ExporterError {
    public readonly kind = 'decode';

    constructor(
        public readonly command: string,
        public readonly issues: string[],
        cause?: unknown
    ) {
        super(`Decode (${command}) -> ${issues.join('; ')}`, cause);
        this.name = 'DecodeError';
    }

    public toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), command: this.command, issues: this.issues };
    }
}

export class ConfigError extends ExporterError {
    public readonly kind = 'config';

    constructor(public readonly field: string, detail: string, cause?: unknown) {
        super(`Config [${field}] -> ${detail}`, cause);
        this.name = 'ConfigError';
    }

    public toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), field: this.field };
    }
}

export function isExporterError(error: unknown): error is ExporterError {
    return error instanceof ExporterError;
}

/**
 * Extracts a printable reason from anything thrown.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
