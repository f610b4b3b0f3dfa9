import net from 'net';
import type { ListenOptions, NetConnectOpts, Server, Socket } from 'net';
import { TransportError, toError } from '../errors';
import type { TransportKind } from '../types';
import type { LocalTransport, TransportHandlers } from './Transport';

/**
 * Shared `net.Server` plumbing for the concrete transports. Subclasses
 * describe where to listen and which named resources to clean up.
 */
export abstract class NetTransport implements LocalTransport {
    public abstract readonly kind: TransportKind;
    private server: Server | null = null;

    public abstract describe(): string;
    protected abstract listenOptions(backlog: number): ListenOptions;
    protected abstract connectOptions(): NetConnectOpts;

    /** Runs before binding. */
    protected async acquire(): Promise<void> { }

    /** Runs after the server closed, and after a failed listen. */
    protected async release(): Promise<void> { }

    /** Runs once the server is bound. */
    protected onListening(_server: Server): void { }

    public isListening(): boolean {
        return this.server !== null;
    }

    public async listen(handlers: TransportHandlers, backlog: number): Promise<void> {
        if (this.server) {
            throw new TransportError(`Already listening on ${this.describe()}`);
        }

        await this.acquire();
        // Half-open so a client may shut down its side right after sending
        // and still receive the reply.
        const server = net.createServer({ allowHalfOpen: true, pauseOnConnect: true });
        try {
            await new Promise<void>((resolve, reject) => {
                server.once('error', reject);
                server.listen(this.listenOptions(backlog), () => {
                    server.off('error', reject);
                    resolve();
                });
            });
        } catch (err) {
            server.close();
            await this.release();
            throw new TransportError(`Cannot listen on ${this.describe()}`, toError(err));
        }

        server.on('connection', handlers.connection);
        server.on('error', handlers.error);
        this.server = server;
        this.onListening(server);
    }

    public async close(): Promise<void> {
        const server = this.server;
        this.server = null;
        try {
            if (server) {
                await new Promise<void>((resolve) => {
                    server.close(() => resolve());
                });
            }
        } finally {
            await this.release();
        }
    }

    public connect(): Socket {
        return net.createConnection(this.connectOptions());
    }
}
