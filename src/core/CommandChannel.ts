/**
 * Boundary contract of the remote management session.
 *
 * A channel is bound to one target device. It executes one CLI command at a
 * time and hands back the raw reply bytes; every failure surfaces as a
 * `TransportError`.
 */
export interface RemoteCommandChannel {
    /** Identity of the bound device (hostname or address). */
    readonly host: string;

    runCommand(command: string): Promise<Buffer>;

    close(): void;
}

/**
 * Opens a channel to the given target. Used by the device collector so that every
 * concurrently scraped target gets its own session.
 */
export type ChannelFactory = (target: string) => Promise<RemoteCommandChannel>;
