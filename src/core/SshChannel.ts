import { EventEmitter } from 'events';
import { Client, ClientChannel, ConnectConfig } from 'ssh2';
import { ChannelFactory, RemoteCommandChannel } from './CommandChannel';
import { TransportError, describeError } from './ExporterError';

/**
 * Configuration options for the SSH channel.
 */
export interface SshChannelOptions {
    /** Target IP address or Hostname */
    host: string;
    /** Target Port (default: 22) */
    port?: number;
    /** Login user */
    username: string;
    /** Password authentication (optional when a key is given) */
    password?: string;
    /** Private key contents for public key authentication */
    privateKey?: string | Buffer;
    /** Handshake timeout in seconds (default: 10) */
    timeout?: number;
    /** Per-command timeout in seconds (default: 30) */
    commandTimeout?: number;
    /** Send SSH keep-alive packets every 10s (default: true) */
    keepAlive?: boolean;
}

export declare interface SshChannel {
    on(event: 'close', listener: () => void): this;
    on(event: 'error', listener: (err: TransportError) => void): this;
}

/**
 * SSH-backed command channel.
 * Responsibilities:
 * 1. Session: opens and tears down one SSH connection per target.
 * 2. Execution: runs each CLI command on its own exec channel and buffers stdout.
 * 3. Serialization: commands queue up, so at most one is in flight per session.
 */
export class SshChannel extends EventEmitter implements RemoteCommandChannel {
    private client: Client | null = null;
    private readonly options: Required<Omit<SshChannelOptions, 'password' | 'privateKey'>> &
        Pick<SshChannelOptions, 'password' | 'privateKey'>;

    public connected: boolean = false;

    // Tail of the command queue; each command starts after the previous settles.
    private queue: Promise<unknown> = Promise.resolve();

    // Fails the command currently in flight, if any.
    private abortInFlight: ((error: TransportError) => void) | null = null;

    constructor(options: SshChannelOptions) {
        super();
        this.options = {
            port: 22,
            timeout: 10,
            commandTimeout: 30,
            keepAlive: true,
            ...options
        };
    }

    /**
     * Factory that opens one connected channel per target with shared settings.
     *
     * @example
     * const open = SshChannel.factory({ username: 'exporter', password: 'test-secret' });
     * const channel = await open('edge-1');
     */
    public static factory(settings: Omit<SshChannelOptions, 'host'>): ChannelFactory {
        return async (target: string) => {
            const channel = new SshChannel({ ...settings, host: target });
            await channel.connect();
            return channel;
        };
    }

    public get host(): string {
        return this.options.host;
    }

    /**
     * Opens the SSH session.
     * @returns Promise that resolves once authentication has completed.
     */
    public connect(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.connected) return resolve();

            this.cleanup();

            const config: ConnectConfig = {
                host: this.options.host,
                port: this.options.port,
                username: this.options.username,
                password: this.options.password,
                privateKey: this.options.privateKey,
                readyTimeout: this.options.timeout * 1000,
                keepaliveInterval: this.options.keepAlive ? 10000 : 0
            };

            const client = new Client();
            this.client = client;

            client.once('ready', () => {
                this.connected = true;
                resolve();
            });

            client.on('error', (err: Error) => {
                const error = new TransportError(this.host, err.message, undefined, err);
                // During the handshake the promise owns the error, afterwards the running command does
                if (!this.connected) {
                    reject(error);
                    return;
                }

                this.connected = false;
                this.failInFlight(error);
                if (this.listenerCount('error') > 0) {
                    this.emit('error', error);
                }
            });

            client.on('close', () => {
                this.connected = false;
                this.failInFlight(new TransportError(this.host, 'Session closed'));
                this.emit('close');
            });

            try {
                client.connect(config);
            } catch (err) {
                reject(new TransportError(this.host, describeError(err), undefined, err));
            }
        });
    }

    /**
     * Runs a command once every previously queued command has settled.
     */
    public runCommand(command: string): Promise<Buffer> {
        const run = this.queue.then(() => this.exec(command));
        // The caller observes the rejection through `run`; the queue only needs to advance.
        this.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    /**
     * Gracefully closes the session.
     */
    public close(): void {
        if (this.client) {
            this.client.end();
        }
        this.connected = false;
    }

    private failInFlight(error: TransportError): void {
        const abort = this.abortInFlight;
        this.abortInFlight = null;
        if (abort) abort(error);
    }

    private cleanup(): void {
        if (this.client) {
            this.client.removeAllListeners();
            this.client.end();
            this.client = null;
        }
        this.connected = false;
    }

    private exec(command: string): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            const client = this.client;
            if (!this.connected || !client) {
                reject(new TransportError(this.host, 'Session is not connected. Call connect() first.', command));
                return;
            }

            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            let channel: ClientChannel | null = null;
            let settled = false;

            const finish = (error: TransportError | null): void => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                this.abortInFlight = null;

                if (error) {
                    reject(error);
                } else {
                    resolve(Buffer.concat(stdout));
                }
            };

            const timer = setTimeout(() => {
                finish(new TransportError(
                    this.host,
                    `Command timed out after ${this.options.commandTimeout} seconds`,
                    command
                ));
                if (channel) channel.destroy();
            }, this.options.commandTimeout * 1000);

            this.abortInFlight = (error: TransportError) => {
                finish(new TransportError(this.host, error.detail, command, error));
                if (channel) channel.destroy();
            };

            client.exec(command, (err, stream) => {
                if (err) {
                    finish(new TransportError(this.host, err.message, command, err));
                    return;
                }

                channel = stream;

                stream.on('data', (chunk: Buffer) => {
                    stdout.push(chunk);
                });

                stream.stderr.on('data', (chunk: Buffer) => {
                    stderr.push(chunk);
                });

                stream.on('close', (code?: number | null) => {
                    if (typeof code !== 'number') {
                        finish(new TransportError(this.host, 'Command ended without an exit status', command));
                        return;
                    }
                    if (code !== 0) {
                        const reason = Buffer.concat(stderr).toString('utf8').trim();
                        finish(new TransportError(
                            this.host,
                            `Command exited with status ${code}${reason ? `: ${reason}` : ''}`,
                            command
                        ));
                        return;
                    }
                    finish(null);
                });
            });
        });
    }
}
