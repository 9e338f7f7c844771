import * as dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { AlarmFilter } from '../client/AlarmFilter';
import { ConfigError, describeError } from './ExporterError';
import { ALL_FEATURES, Feature } from '../types';
import { parseBoolean } from '../utils/Helpers';

// Load environment variables immediately
dotenv.config();

export interface ExporterOptions {
    /** Devices to scrape, by hostname or address */
    targets?: string[];
    /** SSH login user */
    username?: string;
    /** SSH password */
    password?: string;
    /** Path of a private key file for public key authentication */
    keyFile?: string;
    /** SSH port (default: 22) */
    port?: number;
    /** SSH handshake timeout in seconds (default: 10) */
    timeout?: number;
    /** Alarms matching this pattern (description or type) are not counted */
    alarmFilter?: string;
    /** Log commands and raw replies */
    debug?: boolean;
    /** Per-domain toggles; unspecified domains keep their defaults */
    features?: Partial<Record<Feature, boolean>>;
}

export interface SshSettings {
    readonly username: string;
    readonly password?: string;
    readonly privateKey?: Buffer;
    readonly port: number;
    readonly timeout: number;
}

export interface ExporterConfig {
    readonly targets: readonly string[];
    readonly ssh: SshSettings;
    readonly alarmFilter: AlarmFilter | null;
    readonly debug: boolean;
    readonly features: Readonly<Record<Feature, boolean>>;
}

export const DEFAULT_FEATURES: Readonly<Record<Feature, boolean>> = {
    interfaces: true,
    alarm: true,
    bgp: true,
    ospf: true,
    isis: true,
    routes: true,
    routing_engine: true,
    environment: true,
    interface_diagnostics: false
};

/**
 * **Configuration Resolver**
 *
 * **Priority:**
 * 1. **Environment Variables:** `JUNOS_TARGETS`, `JUNOS_SSH_USER`, ... (a `.env` file is loaded first).
 * 2. **Options:** explicit values passed here.
 * 3. **Defaults:** port 22, 10s timeout, every domain except optics diagnostics enabled.
 *
 * Every problem is reported as a `ConfigError` here, before anything is collected.
 *
 * @example
 * // JUNOS_TARGETS=edge-1,edge-2 JUNOS_SSH_USER=exporter JUNOS_SSH_KEYFILE=/etc/exporter/id_ed25519
 * const config = loadConfig({ features: { interface_diagnostics: true } });
 */
export function loadConfig(options: ExporterOptions = {}, env: NodeJS.ProcessEnv = process.env): ExporterConfig {
    const targets = env.JUNOS_TARGETS !== undefined ? splitList(env.JUNOS_TARGETS) : (options.targets ?? []);
    if (targets.length === 0) {
        throw new ConfigError('targets', 'at least one target is required (JUNOS_TARGETS)');
    }

    const username = env.JUNOS_SSH_USER || options.username;
    if (!username) {
        throw new ConfigError('username', 'an SSH user is required (JUNOS_SSH_USER)');
    }

    const password = env.JUNOS_SSH_PASSWORD || options.password;
    const keyFile = env.JUNOS_SSH_KEYFILE || options.keyFile;
    if (!password && !keyFile) {
        throw new ConfigError('password', 'either a password or a key file is required (JUNOS_SSH_PASSWORD / JUNOS_SSH_KEYFILE)');
    }

    const port = readNumber('port', env.JUNOS_SSH_PORT, options.port, 22);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigError('port', `${port} is not a valid TCP port`);
    }

    const timeout = readNumber('timeout', env.JUNOS_SSH_TIMEOUT, options.timeout, 10);
    if (timeout <= 0) {
        throw new ConfigError('timeout', 'must be a positive number of seconds');
    }

    const features: Record<Feature, boolean> = { ...DEFAULT_FEATURES };
    for (const feature of ALL_FEATURES) {
        features[feature] = readBoolean(
            `features.${feature}`,
            env[`JUNOS_${feature.toUpperCase()}_ENABLED`],
            options.features?.[feature],
            DEFAULT_FEATURES[feature]
        );
    }

    return {
        targets,
        ssh: {
            username,
            password: password || undefined,
            privateKey: keyFile ? readKeyFile(keyFile) : undefined,
            port,
            timeout
        },
        alarmFilter: AlarmFilter.compile(env.JUNOS_ALARM_FILTER || options.alarmFilter),
        debug: readBoolean('debug', env.JUNOS_DEBUG, options.debug, false),
        features
    };
}

function splitList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function readNumber(field: string, fromEnv: string | undefined, fromOptions: number | undefined, fallback: number): number {
    if (fromEnv !== undefined && fromEnv !== '') {
        const parsed = Number(fromEnv);
        if (Number.isNaN(parsed)) {
            throw new ConfigError(field, `"${fromEnv}" is not a number`);
        }
        return parsed;
    }
    return fromOptions ?? fallback;
}

function readBoolean(field: string, fromEnv: string | undefined, fromOptions: boolean | undefined, fallback: boolean): boolean {
    if (fromEnv !== undefined && fromEnv !== '') {
        const parsed = parseBoolean(fromEnv);
        if (parsed === null) {
            throw new ConfigError(field, `"${fromEnv}" is not a boolean`);
        }
        return parsed;
    }
    return fromOptions ?? fallback;
}

function readKeyFile(path: string): Buffer {
    try {
        return readFileSync(path);
    } catch (error) {
        throw new ConfigError('keyFile', `cannot read ${path}: ${describeError(error)}`, error);
    }
}
