import type { ListenOptions, NetConnectOpts, Server } from 'net';
import { CONSTANTS } from '../protocol';
import { NetTransport } from './NetTransport';

export interface TcpTransportConfig {
    /** @default '127.0.0.1' */
    host?: string;
    /** Port to listen on or dial; 0 picks a free port. @default 28011 */
    port?: number;
}

/**
 * Loopback TCP endpoint. The default on Windows, where named sockets are
 * not available to every client.
 */
export class TcpTransport extends NetTransport {
    public readonly kind = 'tcp' as const;
    private readonly host: string;
    private boundPort: number;

    constructor(config: TcpTransportConfig = {}) {
        super();
        this.host = config.host ?? CONSTANTS.DEFAULT_HOST;
        this.boundPort = config.port ?? CONSTANTS.DEFAULT_PORT;
    }

    /** The configured port, or the actual one once listening on port 0. */
    public get port(): number {
        return this.boundPort;
    }

    public describe(): string {
        return `tcp://${this.host}:${this.boundPort}`;
    }

    protected listenOptions(backlog: number): ListenOptions {
        return { host: this.host, port: this.boundPort, backlog, exclusive: true };
    }

    protected connectOptions(): NetConnectOpts {
        return { host: this.host, port: this.boundPort };
    }

    protected onListening(server: Server): void {
        const address = server.address();
        if (address !== null && typeof address === 'object') {
            this.boundPort = address.port;
        }
    }
}
