import type { Socket } from 'net';
import { CommandDispatcher } from '../core/CommandDispatcher';
import { describeRequest, hexDump, startTimer } from '../debug';
import { SessionError, TransportError, errnoOf, toError } from '../errors';
import { CONSTANTS } from '../protocol';
import type { LocalTransport } from '../transport/Transport';
import type { DispatchOutcome, ExchangeRecord, MemoryAccess, SessionState } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger } from '../utils/Logger';

/**
 * Accept errors that leave the listening endpoint usable. The loop logs them
 * and keeps accepting; any other accept error stops it.
 */
export const TRANSIENT_ACCEPT_ERRORS: ReadonlySet<string> = new Set([
    'ECONNABORTED',
    'ECONNRESET',
    'EINTR',
    'EAGAIN',
    'EWOULDBLOCK',
    'EINPROGRESS',
    'EMFILE',
    'ENFILE',
]);

export function isTransientAcceptError(error: unknown): boolean {
    const code = errnoOf(error);
    return code !== undefined && TRANSIENT_ACCEPT_ERRORS.has(code);
}

export interface SessionConfig {
    /** Request buffer size; longer requests are truncated. @default 650000 */
    maxRequestSize?: number;
    /** Reply buffer size. @default 450000 */
    maxReplySize?: number;
    /** How long to wait for a request after accepting. @default 10000 */
    readTimeoutMs?: number;
    /** @default 4096 */
    backlog?: number;
}

export type SessionEvents = {
    status: [SessionState];
    /** One per served connection, after the socket is closed. */
    exchange: [ExchangeRecord];
    /** A fatal endpoint error; the loop is stopping. */
    error: [Error];
};

interface LoopResources {
    transport: LocalTransport;
    requestBuffer: Uint8Array;
    replyBuffer: Uint8Array;
    ended: boolean;
}

/**
 * Serves the bridge protocol on one listening endpoint.
 *
 * Connections are served strictly one at a time: one read, one dispatch,
 * one write, close. Sockets accepted while an exchange is running wait,
 * paused, in a queue. The request and reply buffers are allocated once per
 * run and reused for every exchange.
 *
 * @example
 * ```typescript
 * const session = new SessionLoop(machine, new TcpTransport({ port: 0 }));
 * await session.start();
 * // ...
 * await session.stop();
 * ```
 */
export class SessionLoop extends EventEmitter<SessionEvents> {
    private status: SessionState = 'CREATED';
    private readonly config: Required<SessionConfig>;
    private readonly dispatcher: CommandDispatcher;
    private resources: LoopResources | null = null;
    private readonly pending: Socket[] = [];
    private draining: Promise<void> | null = null;
    private stopping: Promise<void> | null = null;

    private DEFAULT_CONFIG: Required<SessionConfig> = {
        maxRequestSize: CONSTANTS.MAX_REQUEST_SIZE,
        maxReplySize: CONSTANTS.MAX_REPLY_SIZE,
        readTimeoutMs: CONSTANTS.READ_TIMEOUT_MS,
        backlog: CONSTANTS.DEFAULT_BACKLOG,
    };

    constructor(
        memory: MemoryAccess,
        private readonly transport: LocalTransport,
        config: SessionConfig = {},
        private readonly log: Logger = logger.child('session')
    ) {
        super();
        this.dispatcher = new CommandDispatcher(memory);
        this.config = {
            maxRequestSize: config.maxRequestSize ?? this.DEFAULT_CONFIG.maxRequestSize,
            maxReplySize: config.maxReplySize ?? this.DEFAULT_CONFIG.maxReplySize,
            readTimeoutMs: config.readTimeoutMs ?? this.DEFAULT_CONFIG.readTimeoutMs,
            backlog: config.backlog ?? this.DEFAULT_CONFIG.backlog,
        };
    }

    public getStatus(): SessionState {
        return this.status;
    }

    /** Where clients connect, e.g. `unix:///tmp/vmlink.sock`. */
    public get endpoint(): string {
        return this.transport.describe();
    }

    /**
     * Allocates the buffers and starts listening. Resolves once the endpoint
     * accepts connections.
     *
     * @throws {SessionError} when called twice
     * @throws {TransportError} when the endpoint cannot be set up
     */
    public async start(): Promise<void> {
        if (this.status !== 'CREATED') {
            throw new SessionError(`Cannot start a session in state ${this.status}`);
        }

        const resources: LoopResources = {
            transport: this.transport,
            requestBuffer: new Uint8Array(this.config.maxRequestSize),
            replyBuffer: new Uint8Array(this.config.maxReplySize),
            ended: false,
        };

        try {
            await this.transport.listen({
                connection: (socket) => this.accept(socket, resources),
                error: (err) => this.onServerError(err),
            }, this.config.backlog);
        } catch (err) {
            this.setStatus('STOPPED');
            this.log.error(`Failed to listen on ${this.transport.describe()}:`, err);
            throw err;
        }

        this.resources = resources;
        this.setStatus('LISTENING');
        this.log.info(`Listening on ${this.transport.describe()}`);
        this.setStatus('ACCEPTING');
    }

    /**
     * Stops accepting, closes queued connections and releases the endpoint
     * once the in-flight exchange, if any, has finished. Safe to call more
     * than once, and before `start`.
     */
    public stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.shutdown();
        }
        return this.stopping;
    }

    private accept(socket: Socket, resources: LoopResources): void {
        if (resources.ended) {
            socket.destroy();
            return;
        }
        // Errors are reported per exchange; this keeps a late one from
        // becoming an uncaught exception.
        socket.on('error', (err) => this.log.conn('Socket error:', err));
        this.pending.push(socket);
        if (!this.draining) {
            this.draining = this.drain(resources);
        }
    }

    private async drain(resources: LoopResources): Promise<void> {
        try {
            let socket = this.pending.shift();
            while (socket && !resources.ended) {
                await this.serve(socket, resources);
                socket = this.pending.shift();
            }
        } finally {
            this.draining = null;
        }
    }

    private async serve(socket: Socket, resources: LoopResources): Promise<void> {
        const timer = startTimer();
        this.setStatus('PROCESSING');

        const record: ExchangeRecord = { requestLength: 0, replyLength: 0, outcome: null, durationMs: 0 };
        try {
            let request: Uint8Array;
            try {
                request = await this.readOnce(socket, resources.requestBuffer);
            } catch (err) {
                record.readError = toError(err);
                this.log.conn(`Request read failed: ${record.readError.message}`);
                return;
            }
            record.requestLength = request.length;
            this.traceRequest(request);

            const outcome = this.dispatcher.dispatch(request, resources.replyBuffer);
            record.outcome = outcome;
            this.traceOutcome(outcome);

            try {
                await this.writeReply(socket, resources.replyBuffer.subarray(0, outcome.length));
                record.replyLength = outcome.length;
            } catch (err) {
                record.writeError = toError(err);
                this.log.conn(`Reply write failed: ${record.writeError.message}`);
            }
        } finally {
            socket.destroy();
            record.durationMs = timer.elapsed();
            if (this.status === 'PROCESSING') {
                this.setStatus('ACCEPTING');
            }
            this.emit('exchange', record);
        }
    }

    /**
     * Performs the single read of an exchange. Resolves with a view of
     * `buffer` holding the received bytes, truncated to its size; a peer that
     * closes without sending yields an empty view.
     */
    private readOnce(socket: Socket, buffer: Uint8Array): Promise<Uint8Array> {
        return new Promise<Uint8Array>((resolve, reject) => {
            const cleanup = () => {
                socket.setTimeout(0);
                socket.off('readable', onReadable);
                socket.off('end', onEnd);
                socket.off('error', onError);
                socket.off('timeout', onTimeout);
                socket.off('close', onClose);
            };
            const settle = (fn: () => void) => {
                cleanup();
                fn();
            };

            const onReadable = () => {
                const chunk: unknown = socket.read();
                if (!(chunk instanceof Uint8Array)) {
                    return;
                }
                const length = Math.min(chunk.length, buffer.length);
                buffer.set(chunk.subarray(0, length));
                if (chunk.length > length) {
                    this.log.warn(`Request of ${chunk.length} bytes truncated to ${length}`);
                }
                settle(() => resolve(buffer.subarray(0, length)));
            };
            const onEnd = () => settle(() => resolve(buffer.subarray(0, 0)));
            const onError = (err: Error) => settle(() => reject(err));
            const onTimeout = () => settle(() =>
                reject(new Error(`No request within ${this.config.readTimeoutMs}ms`)));
            const onClose = () => settle(() => reject(new Error('Connection closed before a request arrived')));

            socket.setTimeout(this.config.readTimeoutMs);
            socket.on('end', onEnd);
            socket.on('error', onError);
            socket.on('timeout', onTimeout);
            socket.on('close', onClose);
            socket.on('readable', onReadable);
        });
    }

    private writeReply(socket: Socket, reply: Uint8Array): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            socket.write(reply, (err) => (err ? reject(err) : resolve()));
        });
    }

    private traceRequest(request: Uint8Array): void {
        if (!this.log.isDebugEnabled()) return;
        this.log.debug(`Request of ${request.length} bytes`);
        for (const line of describeRequest(request)) {
            this.log.debug(`  ${line}`);
        }
        this.log.debug(hexDump(request.subarray(0, 64)));
    }

    private traceOutcome(outcome: DispatchOutcome): void {
        if (outcome.ok) {
            this.log.debug(`Executed ${outcome.executed} command(s), reply of ${outcome.length} bytes`);
        } else if (outcome.error) {
            this.log.warn(`Request failed at command ${outcome.index}: ${outcome.reason}`, outcome.error);
        } else {
            this.log.debug(`Request failed at command ${outcome.index}: ${outcome.reason}`);
        }
    }

    private onServerError(err: Error): void {
        if (isTransientAcceptError(err)) {
            this.log.warn(`Transient accept error (${errnoOf(err)}), still accepting`);
            return;
        }
        const error = new TransportError(`Accept failed on ${this.transport.describe()}`, err);
        this.log.error(error.message, err);
        this.emit('error', error);
        this.stop().catch((stopErr) => this.log.error('Failed to stop session:', stopErr));
    }

    private async shutdown(): Promise<void> {
        const resources = this.resources;
        if (!resources) {
            this.setStatus('STOPPED');
            return;
        }

        resources.ended = true;
        for (const socket of this.pending.splice(0)) {
            socket.destroy();
        }
        if (this.draining) {
            await this.draining;
        }

        try {
            await resources.transport.close();
        } finally {
            this.resources = null;
            this.setStatus('STOPPED');
            this.log.info(`Stopped listening on ${resources.transport.describe()}`);
        }
    }

    private setStatus(s: SessionState): void {
        if (this.status === s) return;
        this.status = s;
        this.emit('status', s);
    }
}
