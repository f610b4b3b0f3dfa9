import { decodeUint, encode16, encode32, encodeUint, type WireValue } from '../codec';
import { ConfigurationError, ProtocolError, RequestTooLargeError } from '../errors';
import {
    CONSTANTS,
    OpCode,
    Status,
    readOpCode,
    replySizeOf,
    requestSizeOf,
    writeOpCode,
    type ByteWidth,
    type MemoryOp,
} from '../protocol';

interface PendingCommand {
    op: MemoryOp;
    opcode: OpCode;
    address: number;
    value?: WireValue;
}

const MAX_U32 = 0xffff_ffff;

/**
 * Assembles a request. One sub-command is sent bare; any other count,
 * zero included, gets a batch header.
 *
 * @example
 * ```typescript
 * const request = new RequestBuilder()
 *     .read32(0x1000)
 *     .write8(0x2000, 0x01);
 * const reply = await client.execute(request);   // [value at 0x1000]
 * ```
 */
export class RequestBuilder {
    private readonly commands: PendingCommand[] = [];

    public read8(address: number): this { return this.read(1, address); }
    public read16(address: number): this { return this.read(2, address); }
    public read32(address: number): this { return this.read(4, address); }
    public read64(address: number): this { return this.read(8, address); }

    public write8(address: number, value: number): this { return this.write(1, address, value); }
    public write16(address: number, value: number): this { return this.write(2, address, value); }
    public write32(address: number, value: number): this { return this.write(4, address, value); }
    public write64(address: number, value: bigint | number): this { return this.write(8, address, value); }

    public read(width: ByteWidth, address: number): this {
        return this.push({ op: { kind: 'read', width }, opcode: readOpCode(width), address });
    }

    public write(width: ByteWidth, address: number, value: WireValue): this {
        checkValue(width, value);
        return this.push({ op: { kind: 'write', width }, opcode: writeOpCode(width), address, value });
    }

    /** Sub-commands added so far. */
    public get count(): number {
        return this.commands.length;
    }

    /** Widths of the reads, in reply order. */
    public get readWidths(): ByteWidth[] {
        return this.commands.filter(c => c.op.kind === 'read').map(c => c.op.width);
    }

    /** Length of the request `build()` produces. */
    public get requestSize(): number {
        const header = this.commands.length === 1 ? 0 : CONSTANTS.BATCH_HEADER_SIZE;
        return this.commands.reduce((sum, c) => sum + requestSizeOf(c.op), header);
    }

    /** Length of a successful reply, status byte included. */
    public get replySize(): number {
        return this.commands.reduce<number>((sum, c) => sum + replySizeOf(c.op), CONSTANTS.STATUS_SIZE);
    }

    public build(): Uint8Array {
        const bytes = new Uint8Array(this.requestSize);
        let offset = 0;
        if (this.commands.length !== 1) {
            bytes[0] = OpCode.MultiCommand;
            encode16(bytes, 1, this.commands.length);
            offset = CONSTANTS.BATCH_HEADER_SIZE;
        }
        for (const command of this.commands) {
            bytes[offset] = command.opcode;
            encode32(bytes, offset + 1, command.address);
            if (command.value !== undefined) {
                encodeUint(bytes, offset + CONSTANTS.COMMAND_HEADER_SIZE, command.op.width, command.value);
            }
            offset += requestSizeOf(command.op);
        }
        return bytes;
    }

    private push(command: PendingCommand): this {
        if (!Number.isInteger(command.address) || command.address < 0 || command.address > MAX_U32) {
            throw new ConfigurationError(`Address must be an unsigned 32-bit integer, got ${command.address}`);
        }
        if (this.commands.length >= CONSTANTS.MAX_BATCH_COUNT) {
            throw new RequestTooLargeError('Batch', this.commands.length + 1, CONSTANTS.MAX_BATCH_COUNT);
        }
        this.commands.push(command);
        return this;
    }
}

function checkValue(width: ByteWidth, value: WireValue): void {
    const max = (1n << BigInt(width * 8)) - 1n;
    const valid = typeof value === 'bigint'
        ? value >= 0n && value <= max
        : Number.isSafeInteger(value) && value >= 0 && BigInt(value) <= max;
    if (!valid) {
        throw new ConfigurationError(`Value ${value} does not fit in ${width} byte(s)`);
    }
}

/**
 * Decodes a reply to the request `builder` produced.
 *
 * @returns the read values in request order; 8-byte reads as bigint
 * @throws {ProtocolError} on a failure status or a reply of the wrong length
 */
export function parseReply(reply: Uint8Array, builder: RequestBuilder): WireValue[] {
    if (reply.length === 0) {
        throw new ProtocolError('Empty reply', reply);
    }
    if (reply[0] === Status.FAIL) {
        throw new ProtocolError('Request failed', reply);
    }
    if (reply[0] !== Status.OK) {
        throw new ProtocolError(`Unknown reply status 0x${reply[0].toString(16).padStart(2, '0')}`, reply);
    }
    if (reply.length !== builder.replySize) {
        throw new ProtocolError(`Expected a reply of ${builder.replySize} bytes, got ${reply.length}`, reply);
    }

    const values: WireValue[] = [];
    let offset: number = CONSTANTS.STATUS_SIZE;
    for (const width of builder.readWidths) {
        values.push(decodeUint(reply, offset, width));
        offset += width;
    }
    return values;
}
