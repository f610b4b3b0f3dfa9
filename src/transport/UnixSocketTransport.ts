import { rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ListenOptions, NetConnectOpts } from 'net';
import { TransportError, toError } from '../errors';
import { CONSTANTS } from '../protocol';
import { NetTransport } from './NetTransport';

export interface UnixSocketTransportConfig {
    /** @default `<tmpdir>/vmlink.sock` */
    socketPath?: string;
}

export function defaultSocketPath(): string {
    return path.join(os.tmpdir(), CONSTANTS.DEFAULT_SOCKET_NAME);
}

/**
 * Named Unix-domain socket endpoint.
 *
 * A socket file left behind by a crashed bridge makes `bind` fail, so the
 * file is removed before listening as well as after closing.
 */
export class UnixSocketTransport extends NetTransport {
    public readonly kind = 'unix' as const;
    public readonly socketPath: string;

    constructor(config: UnixSocketTransportConfig = {}) {
        super();
        this.socketPath = config.socketPath ?? defaultSocketPath();
    }

    public describe(): string {
        return `unix://${this.socketPath}`;
    }

    protected listenOptions(backlog: number): ListenOptions {
        return { path: this.socketPath, backlog, exclusive: true };
    }

    protected connectOptions(): NetConnectOpts {
        return { path: this.socketPath };
    }

    protected async acquire(): Promise<void> {
        await this.unlink();
    }

    protected async release(): Promise<void> {
        await this.unlink();
    }

    private async unlink(): Promise<void> {
        try {
            await rm(this.socketPath, { force: true });
        } catch (err) {
            throw new TransportError(`Cannot remove stale socket ${this.socketPath}`, toError(err));
        }
    }
}
