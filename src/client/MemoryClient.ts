import type { WireValue } from '../codec';
import { ConnectionError, ProtocolError, RequestTooLargeError, toError } from '../errors';
import { CONSTANTS } from '../protocol';
import type { LocalTransport } from '../transport/Transport';
import { Logger, logger } from '../utils/Logger';
import { RequestBuilder, parseReply } from './RequestBuilder';

export interface MemoryClientConfig {
    /** Gives up on a request after this long. @default 10000 */
    requestTimeoutMs?: number;
    /**
     * Must match the bridge's request buffer. Capped at
     * `CONSTANTS.MAX_SINGLE_READ`, since the bridge reads a request once.
     * @default 65536
     */
    maxRequestSize?: number;
    /** Must match the bridge's reply buffer. @default 450000 */
    maxReplySize?: number;
}

/**
 * Talks to a running bridge. Every request opens its own connection, sends
 * the request, half-closes and reads the reply until the bridge closes.
 *
 * @example
 * ```typescript
 * const client = new MemoryClient(new UnixSocketTransport());
 * await client.write32(0x1000, 0xdeadbeef);
 * const value = await client.read32(0x1000);
 * ```
 */
export class MemoryClient {
    private readonly config: Required<MemoryClientConfig>;

    constructor(
        private readonly transport: LocalTransport,
        config: MemoryClientConfig = {},
        private readonly log: Logger = logger.child('client')
    ) {
        this.config = {
            requestTimeoutMs: config.requestTimeoutMs ?? CONSTANTS.READ_TIMEOUT_MS,
            maxRequestSize: Math.min(config.maxRequestSize ?? CONSTANTS.MAX_SINGLE_READ, CONSTANTS.MAX_SINGLE_READ),
            maxReplySize: config.maxReplySize ?? CONSTANTS.MAX_REPLY_SIZE,
        };
    }

    /**
     * Sends a batch and returns its read values in order.
     *
     * @throws {RequestTooLargeError} before connecting, when the batch cannot fit the bridge's buffers
     * @throws {ProtocolError} when the bridge rejects the batch
     * @throws {ConnectionError} when the exchange does not complete
     */
    public async execute(builder: RequestBuilder): Promise<WireValue[]> {
        if (builder.requestSize > this.config.maxRequestSize) {
            throw new RequestTooLargeError('Request', builder.requestSize, this.config.maxRequestSize);
        }
        if (builder.replySize > this.config.maxReplySize) {
            throw new RequestTooLargeError('Reply', builder.replySize, this.config.maxReplySize);
        }
        const reply = await this.exchange(builder.build());
        return parseReply(reply, builder);
    }

    public async read8(address: number): Promise<number> {
        return this.readNumber(new RequestBuilder().read8(address));
    }

    public async read16(address: number): Promise<number> {
        return this.readNumber(new RequestBuilder().read16(address));
    }

    public async read32(address: number): Promise<number> {
        return this.readNumber(new RequestBuilder().read32(address));
    }

    public async read64(address: number): Promise<bigint> {
        const [value] = await this.execute(new RequestBuilder().read64(address));
        if (typeof value !== 'bigint') {
            throw new ProtocolError('Expected a 64-bit value');
        }
        return value;
    }

    public async write8(address: number, value: number): Promise<void> {
        await this.execute(new RequestBuilder().write8(address, value));
    }

    public async write16(address: number, value: number): Promise<void> {
        await this.execute(new RequestBuilder().write16(address, value));
    }

    public async write32(address: number, value: number): Promise<void> {
        await this.execute(new RequestBuilder().write32(address, value));
    }

    public async write64(address: number, value: bigint | number): Promise<void> {
        await this.execute(new RequestBuilder().write64(address, value));
    }

    /**
     * Sends raw request bytes and resolves with every byte the bridge sent
     * back before closing. The reply is not interpreted.
     */
    public exchange(request: Uint8Array): Promise<Uint8Array> {
        const endpoint = this.transport.describe();
        this.log.debug(`Sending ${request.length} bytes to ${endpoint}`);

        return new Promise<Uint8Array>((resolve, reject) => {
            const socket = this.transport.connect();
            const chunks: Buffer[] = [];
            let settled = false;

            const finish = (err: Error | null) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                if (err) {
                    reject(err);
                    return;
                }
                const reply = Buffer.concat(chunks);
                this.log.debug(`Received ${reply.length} bytes from ${endpoint}`);
                resolve(new Uint8Array(reply.buffer, reply.byteOffset, reply.length));
            };

            socket.setTimeout(this.config.requestTimeoutMs);
            socket.on('timeout', () => finish(new ConnectionError(
                `No reply from ${endpoint} within ${this.config.requestTimeoutMs}ms`
            )));
            socket.on('error', (err) => finish(new ConnectionError(
                `Exchange with ${endpoint} failed: ${err.message}`,
                toError(err),
                true
            )));
            socket.on('data', (chunk: Buffer) => chunks.push(chunk));
            socket.on('end', () => finish(null));
            socket.on('close', () => finish(new ConnectionError(
                `Connection to ${endpoint} closed before the reply ended`
            )));
            socket.on('connect', () => {
                socket.end(request);
            });
        });
    }

    private async readNumber(builder: RequestBuilder): Promise<number> {
        const [value] = await this.execute(builder);
        if (typeof value !== 'number') {
            throw new ProtocolError('Expected a value narrower than 64 bits');
        }
        return value;
    }
}
