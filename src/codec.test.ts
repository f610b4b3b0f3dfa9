import { describe, it, expect } from 'vitest';
import {
    decode8,
    decode16,
    decode32,
    decode64,
    decodeUint,
    encode8,
    encode16,
    encode32,
    encode64,
    encodeUint,
} from './codec';

describe('codec', () => {
    describe('decode', () => {
        const bytes = Uint8Array.from([0xaa, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);

        it('reads little-endian values at an offset', () => {
            expect(decode8(bytes, 1)).toBe(0x01);
            expect(decode16(bytes, 1)).toBe(0x0201);
            expect(decode32(bytes, 1)).toBe(0x04030201);
            expect(decode64(bytes, 1)).toBe(0x0807060504030201n);
        });

        it('returns unsigned values when the top bit is set', () => {
            const high = Uint8Array.from([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
            expect(decode16(high, 0)).toBe(0xffff);
            expect(decode32(high, 0)).toBe(0xffffffff);
            expect(decode64(high, 0)).toBe(0xffffffffffffffffn);
        });

        it('dispatches on width', () => {
            expect(decodeUint(bytes, 0, 1)).toBe(0xaa);
            expect(decodeUint(bytes, 0, 2)).toBe(0x01aa);
            expect(decodeUint(bytes, 1, 4)).toBe(0x04030201);
            expect(decodeUint(bytes, 1, 8)).toBe(0x0807060504030201n);
        });
    });

    describe('encode', () => {
        it('writes little-endian values at an offset', () => {
            const bytes = new Uint8Array(16);
            encode8(bytes, 0, 0x7f);
            encode16(bytes, 1, 0xbeef);
            encode32(bytes, 3, 0xdeadbeef);
            encode64(bytes, 7, 0x1122334455667788n);
            expect(Array.from(bytes)).toEqual([
                0x7f,
                0xef, 0xbe,
                0xef, 0xbe, 0xad, 0xde,
                0x88, 0x77, 0x66, 0x55, 0x44, 0x33, 0x22, 0x11,
                0x00,
            ]);
        });

        it('keeps only the low bytes of oversized values', () => {
            const bytes = new Uint8Array(2);
            encode8(bytes, 0, 0x1ff);
            expect(bytes[0]).toBe(0xff);
            encode16(bytes, 0, 0x12345);
            expect(Array.from(bytes)).toEqual([0x45, 0x23]);
        });

        it('wraps negative 64-bit values to two\'s complement', () => {
            const bytes = new Uint8Array(8);
            encode64(bytes, 0, -1n);
            expect(Array.from(bytes)).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);
        });

        it('accepts either numeric type in the width-generic form', () => {
            const bytes = new Uint8Array(8);
            encodeUint(bytes, 0, 8, 0x1234);
            expect(decode64(bytes, 0)).toBe(0x1234n);
            encodeUint(bytes, 0, 4, 0xcafef00dn);
            expect(decode32(bytes, 0)).toBe(0xcafef00d);
            encodeUint(bytes, 0, 2, 0xabcd);
            expect(decode16(bytes, 0)).toBe(0xabcd);
            encodeUint(bytes, 0, 1, 0x5a);
            expect(decode8(bytes, 0)).toBe(0x5a);
        });
    });

    it('decodes what it encodes for boundary values', () => {
        const bytes = new Uint8Array(8);
        for (const value of [0n, 1n, 0x7fffffffffffffffn, 0x8000000000000000n, 0xffffffffffffffffn]) {
            encode64(bytes, 0, value);
            expect(decode64(bytes, 0)).toBe(value);
        }
    });
});
