/**
 * vmlink - a local memory bridge for a running virtual machine.
 *
 * External tools connect over a named socket (or loopback TCP on Windows),
 * send one request of read/write commands and get one reply back.
 *
 * @example
 * ```typescript
 * import { InMemoryMachine, SessionLoop, TcpTransport, MemoryClient } from 'vmlink';
 *
 * const transport = new TcpTransport({ port: 0 });
 * const session = new SessionLoop(new InMemoryMachine(), transport);
 * await session.start();
 *
 * const client = new MemoryClient(transport);
 * await client.write32(0x1000, 0xdeadbeef);
 * await client.read32(0x1000); // 0xdeadbeef
 * ```
 *
 * @packageDocumentation
 */

export { CommandDispatcher, safetyChecks } from './core/CommandDispatcher';
export { SessionLoop, createSession, TRANSIENT_ACCEPT_ERRORS, isTransientAcceptError } from './session';
export type { SessionConfig, SessionEvents } from './session';
export { MemoryClient, RequestBuilder, parseReply } from './client';
export type { MemoryClientConfig } from './client';
export { InMemoryMachine, DEFAULT_MACHINE_SIZE } from './memory/InMemoryMachine';
export type { InMemoryMachineConfig } from './memory/InMemoryMachine';

// Transports
export {
    NetTransport,
    TcpTransport,
    UnixSocketTransport,
    createTransport,
    defaultSocketPath,
    resolveTransportKind,
} from './transport';
export type {
    LocalTransport,
    TransportHandlers,
    TransportOptions,
    TcpTransportConfig,
    UnixSocketTransportConfig,
} from './transport';

// Protocol
export * from './protocol';
export * from './codec';
export { ByteCursor } from './binary';

// Types
export type {
    MemoryAccess,
    TransportKind,
    SessionState,
    FailureReason,
    DispatchOutcome,
    ExchangeRecord,
} from './types';

// Configuration
export { ConfigSchema, resolveConfig, loadConfig, loadConfigFile, configFromEnv, parseInteger } from './config';
export type { VmLinkConfig, VmLinkConfigInput, LoadConfigOptions } from './config';

// Errors
export {
    VmLinkError,
    ConfigurationError,
    TransportError,
    ConnectionError,
    ProtocolError,
    RequestTooLargeError,
    SessionError,
} from './errors';

// Utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';
export { describeRequest, hexDump, formatAddress, formatValue, startTimer } from './debug';
