/**
 * @file codec.ts
 * @brief Fixed-width little-endian integer codec for the vmlink wire format.
 *
 * These functions do no bounds checking: the caller owns the offset
 * arithmetic (see `ByteCursor` and `CommandDispatcher.safetyChecks`).
 * Reading past the end of a buffer yields garbage rather than an error, so
 * do not call them on unchecked offsets.
 *
 * @example
 * ```typescript
 * import { encode32, decode32 } from 'vmlink';
 *
 * const bytes = new Uint8Array(4);
 * encode32(bytes, 0, 0xdeadbeef);   // ef be ad de
 * decode32(bytes, 0);               // 0xdeadbeef
 * ```
 */

import type { ByteWidth } from './protocol';

export type WireValue = number | bigint;

export function decode8(buffer: Uint8Array, offset: number): number {
    return buffer[offset];
}

export function decode16(buffer: Uint8Array, offset: number): number {
    return buffer[offset] | (buffer[offset + 1] << 8);
}

export function decode32(buffer: Uint8Array, offset: number): number {
    return (
        (buffer[offset] |
            (buffer[offset + 1] << 8) |
            (buffer[offset + 2] << 16) |
            (buffer[offset + 3] << 24)) >>> 0
    );
}

export function decode64(buffer: Uint8Array, offset: number): bigint {
    const lo = BigInt(decode32(buffer, offset));
    const hi = BigInt(decode32(buffer, offset + 4));
    return (hi << 32n) | lo;
}

export function encode8(buffer: Uint8Array, offset: number, value: number): void {
    buffer[offset] = value & 0xff;
}

export function encode16(buffer: Uint8Array, offset: number, value: number): void {
    buffer[offset] = value & 0xff;
    buffer[offset + 1] = (value >>> 8) & 0xff;
}

export function encode32(buffer: Uint8Array, offset: number, value: number): void {
    buffer[offset] = value & 0xff;
    buffer[offset + 1] = (value >>> 8) & 0xff;
    buffer[offset + 2] = (value >>> 16) & 0xff;
    buffer[offset + 3] = (value >>> 24) & 0xff;
}

export function encode64(buffer: Uint8Array, offset: number, value: bigint): void {
    const v = BigInt.asUintN(64, value);
    encode32(buffer, offset, Number(v & 0xffffffffn));
    encode32(buffer, offset + 4, Number(v >> 32n));
}

/**
 * Width-generic decode. 8-byte values come back as bigint, narrower ones as
 * number.
 */
export function decodeUint(buffer: Uint8Array, offset: number, width: ByteWidth): WireValue {
    switch (width) {
        case 1: return decode8(buffer, offset);
        case 2: return decode16(buffer, offset);
        case 4: return decode32(buffer, offset);
        case 8: return decode64(buffer, offset);
    }
}

/**
 * Width-generic encode. Accepts either numeric type for any width; values
 * wider than `width` are truncated to their low bytes.
 */
export function encodeUint(buffer: Uint8Array, offset: number, width: ByteWidth, value: WireValue): void {
    if (width === 8) {
        encode64(buffer, offset, typeof value === 'bigint' ? value : BigInt(value));
        return;
    }
    const n = typeof value === 'bigint' ? Number(BigInt.asUintN(32, value)) : value;
    switch (width) {
        case 1: encode8(buffer, offset, n); break;
        case 2: encode16(buffer, offset, n); break;
        case 4: encode32(buffer, offset, n); break;
    }
}
