/**
 * @file ByteCursor.ts
 * @brief Bounds-checked cursor over a byte buffer.
 *
 * The dispatcher keeps one cursor over the request and one over the reply.
 * `fits()` answers "is there room for n more bytes"; every access checks
 * its own range and throws `RangeError` instead of touching bytes outside
 * the view.
 *
 * @example
 * ```typescript
 * const cursor = new ByteCursor(request);
 * if (cursor.fits(5)) {
 *     const address = cursor.peekUint(4, 1);
 *     cursor.advance(5);
 * }
 * ```
 */

import { decodeUint, encodeUint, type WireValue } from '../codec';
import type { ByteWidth } from '../protocol';

export class ByteCursor {
    private position: number;

    constructor(private readonly bytes: Uint8Array, start: number = 0) {
        if (start < 0 || start > bytes.length) {
            throw new RangeError(`ByteCursor: start ${start} outside buffer of ${bytes.length} bytes`);
        }
        this.position = start;
    }

    public get offset(): number {
        return this.position;
    }

    public get capacity(): number {
        return this.bytes.length;
    }

    public get remaining(): number {
        return this.bytes.length - this.position;
    }

    /**
     * True when `count` more bytes fit between the cursor and the end.
     */
    public fits(count: number): boolean {
        return this.position + count <= this.bytes.length;
    }

    public advance(count: number): void {
        this.check(0, count);
        this.position += count;
    }

    /**
     * Byte at `at` bytes past the cursor, or undefined past the end.
     */
    public peekByte(at: number = 0): number | undefined {
        const index = this.position + at;
        return index < this.bytes.length ? this.bytes[index] : undefined;
    }

    /**
     * Decodes an integer `at` bytes past the cursor without moving it.
     */
    public peekUint(width: ByteWidth, at: number = 0): WireValue {
        this.check(at, width);
        return decodeUint(this.bytes, this.position + at, width);
    }

    /**
     * Encodes an integer at the cursor and moves past it.
     */
    public writeUint(width: ByteWidth, value: WireValue): void {
        this.check(0, width);
        encodeUint(this.bytes, this.position, width, value);
        this.position += width;
    }

    /**
     * The bytes between `from` and the cursor.
     */
    public written(from: number = 0): Uint8Array {
        return this.bytes.subarray(from, this.position);
    }

    private check(at: number, count: number): void {
        const start = this.position + at;
        if (at < 0 || count < 0 || start + count > this.bytes.length) {
            throw new RangeError(
                `ByteCursor: ${count} bytes at ${start} outside buffer of ${this.bytes.length} bytes`
            );
        }
    }
}
