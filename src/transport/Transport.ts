import type { Socket } from 'net';
import type { TransportKind } from '../types';

/**
 * Callbacks a listening transport reports to.
 */
export interface TransportHandlers {
    /** A connection was accepted. The socket starts paused. */
    connection: (socket: Socket) => void;
    /** The listening endpoint reported an error (accept failures included). */
    error: (error: Error) => void;
}

/**
 * Local endpoint the bridge listens on and clients dial.
 * This decouples where the bytes travel (loopback TCP, Unix socket) from
 * what they mean; the dispatcher never sees a transport.
 */
export interface LocalTransport {
    readonly kind: TransportKind;

    /** Human-readable endpoint, e.g. `tcp://127.0.0.1:28011`. */
    describe(): string;

    /**
     * Removes stale resources, binds and listens. On failure every acquired
     * resource is released before the returned promise rejects.
     */
    listen(handlers: TransportHandlers, backlog: number): Promise<void>;

    /** Stops listening and releases the endpoint's named resources. */
    close(): Promise<void>;

    isListening(): boolean;

    /** Opens a client connection to the endpoint. */
    connect(): Socket;
}
