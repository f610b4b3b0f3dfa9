import type { TransportKind } from '../types';
import type { LocalTransport } from './Transport';
import { TcpTransport } from './TcpTransport';
import { UnixSocketTransport } from './UnixSocketTransport';

export type { LocalTransport, TransportHandlers } from './Transport';
export { NetTransport } from './NetTransport';
export { TcpTransport } from './TcpTransport';
export type { TcpTransportConfig } from './TcpTransport';
export { UnixSocketTransport, defaultSocketPath } from './UnixSocketTransport';
export type { UnixSocketTransportConfig } from './UnixSocketTransport';

export interface TransportOptions {
    transport: 'auto' | TransportKind;
    host: string;
    port: number;
    socketPath: string;
}

/**
 * `auto` picks loopback TCP on Windows and a named socket everywhere else.
 */
export function resolveTransportKind(choice: 'auto' | TransportKind, platform: NodeJS.Platform = process.platform): TransportKind {
    if (choice !== 'auto') return choice;
    return platform === 'win32' ? 'tcp' : 'unix';
}

export function createTransport(options: TransportOptions, platform: NodeJS.Platform = process.platform): LocalTransport {
    const kind = resolveTransportKind(options.transport, platform);
    return kind === 'tcp'
        ? new TcpTransport({ host: options.host, port: options.port })
        : new UnixSocketTransport({ socketPath: options.socketPath });
}
