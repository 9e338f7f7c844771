/**
 * Cross-cutting types shared by the client, the collectors and the features.
 */

/**
 * Minimal logging surface. `console` satisfies it, so does most structured loggers.
 */
export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

/**
 * Telemetry domains the exporter can collect, keyed the way they are toggled in configuration.
 */
export type Feature =
    | 'alarm'
    | 'bgp'
    | 'ospf'
    | 'isis'
    | 'routes'
    | 'routing_engine'
    | 'environment'
    | 'interfaces'
    | 'interface_diagnostics';

export const ALL_FEATURES: readonly Feature[] = [
    'interfaces',
    'alarm',
    'bgp',
    'ospf',
    'isis',
    'routes',
    'routing_engine',
    'environment',
    'interface_diagnostics'
];
