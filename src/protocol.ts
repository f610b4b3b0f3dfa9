/**
 * @file protocol.ts
 * @brief Wire protocol definition for the vmlink memory bridge.
 *
 * # Request
 *
 * A request is either a single sub-command or a batch:
 *
 * ```text
 * [MultiCommand u8 | count u16]?                     optional batch header
 * [opcode u8 | address u32 | value (writes only)]*   `count` sub-commands
 * ```
 *
 * # Reply
 *
 * ```text
 * [status u8 | read values...]
 * ```
 *
 * Every multi-byte field is little-endian. A reply with `Status.FAIL` is
 * always exactly one byte long, whatever went wrong.
 */

/**
 * Sub-command opcodes. `MultiCommand` is only meaningful as the first byte of
 * a request, where it introduces a batch header.
 */
export enum OpCode {
    Read8 = 0x00,
    Read16 = 0x01,
    Read32 = 0x02,
    Read64 = 0x03,
    Write8 = 0x04,
    Write16 = 0x05,
    Write32 = 0x06,
    Write64 = 0x07,
    MultiCommand = 0xff,
}

/**
 * Reply status byte.
 */
export enum Status {
    OK = 0x00,
    FAIL = 0xff,
}

/** Width of a memory value in bytes. */
export type ByteWidth = 1 | 2 | 4 | 8;

/** Width of a memory value in bits, as used on the command line. */
export type BitWidth = 8 | 16 | 32 | 64;

export type MemoryOpKind = 'read' | 'write';

export interface MemoryOp {
    readonly kind: MemoryOpKind;
    readonly width: ByteWidth;
}

/**
 * Protocol constants.
 */
export const CONSTANTS = {
    /** opcode + address */
    COMMAND_HEADER_SIZE: 5,
    /** MultiCommand tag + u16 count */
    BATCH_HEADER_SIZE: 3,
    /** Largest count a batch header can carry */
    MAX_BATCH_COUNT: 0xffff,
    /** Reply bytes reserved for the status code */
    STATUS_SIZE: 1,
    /** Default request buffer capacity */
    MAX_REQUEST_SIZE: 650_000,
    /** Default reply buffer capacity */
    MAX_REPLY_SIZE: 450_000,
    /** Most request bytes the bridge takes in its single read per connection */
    MAX_SINGLE_READ: 65_536,
    /** Loopback TCP port used where named sockets are unavailable */
    DEFAULT_PORT: 28011,
    DEFAULT_HOST: '127.0.0.1',
    DEFAULT_SOCKET_NAME: 'vmlink.sock',
    DEFAULT_BACKLOG: 4096,
    READ_TIMEOUT_MS: 10_000,
} as const;

const MEMORY_OPS: ReadonlyMap<number, MemoryOp> = new Map<number, MemoryOp>([
    [OpCode.Read8, { kind: 'read', width: 1 }],
    [OpCode.Read16, { kind: 'read', width: 2 }],
    [OpCode.Read32, { kind: 'read', width: 4 }],
    [OpCode.Read64, { kind: 'read', width: 8 }],
    [OpCode.Write8, { kind: 'write', width: 1 }],
    [OpCode.Write16, { kind: 'write', width: 2 }],
    [OpCode.Write32, { kind: 'write', width: 4 }],
    [OpCode.Write64, { kind: 'write', width: 8 }],
]);

/**
 * Looks up the memory operation an opcode byte stands for.
 * Returns undefined for `MultiCommand` and every undefined byte.
 */
export function memoryOpFor(opcode: number): MemoryOp | undefined {
    return MEMORY_OPS.get(opcode);
}

export function readOpCode(width: ByteWidth): OpCode {
    switch (width) {
        case 1: return OpCode.Read8;
        case 2: return OpCode.Read16;
        case 4: return OpCode.Read32;
        case 8: return OpCode.Read64;
    }
}

export function writeOpCode(width: ByteWidth): OpCode {
    switch (width) {
        case 1: return OpCode.Write8;
        case 2: return OpCode.Write16;
        case 4: return OpCode.Write32;
        case 8: return OpCode.Write64;
    }
}

/**
 * Request bytes a sub-command occupies, header included.
 */
export function requestSizeOf(op: MemoryOp): number {
    return op.kind === 'write'
        ? CONSTANTS.COMMAND_HEADER_SIZE + op.width
        : CONSTANTS.COMMAND_HEADER_SIZE;
}

/**
 * Reply bytes a sub-command produces.
 */
export function replySizeOf(op: MemoryOp): number {
    return op.kind === 'read' ? op.width : 0;
}

export function bitsToBytes(bits: BitWidth): ByteWidth {
    switch (bits) {
        case 8: return 1;
        case 16: return 2;
        case 32: return 4;
        case 64: return 8;
    }
}

export function isBitWidth(value: number): value is BitWidth {
    return value === 8 || value === 16 || value === 32 || value === 64;
}

export function opCodeName(opcode: number): string {
    const name = OpCode[opcode];
    return typeof name === 'string' ? name : `0x${opcode.toString(16).padStart(2, '0')}`;
}
