/**
 * @file InMemoryMachine.ts
 * @brief A `MemoryAccess` backed by a plain byte array.
 *
 * Stands in for a real machine when running the bridge on its own and in
 * tests. Values are stored little-endian. Addresses past the end of the
 * backing store behave like unmapped memory: they read as zero and swallow
 * writes, also when only part of a value falls outside.
 *
 * @example
 * ```typescript
 * const machine = new InMemoryMachine({ size: 0x10000 });
 * machine.write32(0x1000, 0xdeadbeef);
 * machine.read8(0x1000);   // 0xef
 * ```
 */

import { ConfigurationError } from '../errors';
import type { MemoryAccess } from '../types';

export interface InMemoryMachineConfig {
    /**
     * Size of the address space in bytes.
     * @default 32 MiB
     */
    size?: number;

    /**
     * Whether the machine starts out running.
     * @default true
     */
    active?: boolean;
}

export const DEFAULT_MACHINE_SIZE = 32 * 1024 * 1024;
const MAX_MACHINE_SIZE = 0x8000_0000;

export class InMemoryMachine implements MemoryAccess {
    private readonly bytes: Uint8Array;
    private readonly view: DataView;
    private active: boolean;

    constructor(config: InMemoryMachineConfig = {}) {
        const size = config.size ?? DEFAULT_MACHINE_SIZE;
        if (!Number.isInteger(size) || size < 1 || size > MAX_MACHINE_SIZE) {
            throw new ConfigurationError(`InMemoryMachine: size must be between 1 byte and 2 GiB, got ${size}`);
        }
        this.bytes = new Uint8Array(size);
        this.view = new DataView(this.bytes.buffer);
        this.active = config.active ?? true;
    }

    public get size(): number {
        return this.bytes.length;
    }

    public hasActiveMachine(): boolean {
        return this.active;
    }

    public setActive(active: boolean): void {
        this.active = active;
    }

    public read8(address: number): number {
        return this.inRange(address, 1) ? this.view.getUint8(address) : this.readPartial(address, 1);
    }

    public read16(address: number): number {
        return this.inRange(address, 2) ? this.view.getUint16(address, true) : this.readPartial(address, 2);
    }

    public read32(address: number): number {
        return this.inRange(address, 4) ? this.view.getUint32(address, true) : this.readPartial(address, 4);
    }

    public read64(address: number): bigint {
        if (this.inRange(address, 8)) {
            return this.view.getBigUint64(address, true);
        }
        const lo = BigInt(this.readPartial(address, 4));
        const hi = BigInt(this.readPartial(address + 4, 4));
        return (hi << 32n) | lo;
    }

    public write8(address: number, value: number): void {
        if (this.inRange(address, 1)) this.view.setUint8(address, value);
        else this.writePartial(address, 1, value);
    }

    public write16(address: number, value: number): void {
        if (this.inRange(address, 2)) this.view.setUint16(address, value, true);
        else this.writePartial(address, 2, value);
    }

    public write32(address: number, value: number): void {
        if (this.inRange(address, 4)) this.view.setUint32(address, value, true);
        else this.writePartial(address, 4, value);
    }

    public write64(address: number, value: bigint): void {
        if (this.inRange(address, 8)) {
            this.view.setBigUint64(address, BigInt.asUintN(64, value), true);
            return;
        }
        const v = BigInt.asUintN(64, value);
        this.writePartial(address, 4, Number(v & 0xffffffffn));
        this.writePartial(address + 4, 4, Number(v >> 32n));
    }

    /**
     * Copies `data` into memory starting at `address`. Bytes past the end
     * are dropped.
     */
    public load(address: number, data: Uint8Array): void {
        for (let i = 0; i < data.length; i++) {
            this.write8(address + i, data[i]);
        }
    }

    /**
     * Copies `length` bytes out of memory starting at `address`.
     */
    public dump(address: number, length: number): Uint8Array {
        const out = new Uint8Array(length);
        for (let i = 0; i < length; i++) {
            out[i] = this.read8(address + i);
        }
        return out;
    }

    private inRange(address: number, width: number): boolean {
        return address >= 0 && address + width <= this.bytes.length;
    }

    private readPartial(address: number, width: number): number {
        let value = 0;
        for (let i = width - 1; i >= 0; i--) {
            const at = address + i;
            const byte = at >= 0 && at < this.bytes.length ? this.bytes[at] : 0;
            value = value * 256 + byte;
        }
        return value;
    }

    private writePartial(address: number, width: number, value: number): void {
        let rest = value >>> 0;
        for (let i = 0; i < width; i++) {
            const at = address + i;
            if (at >= 0 && at < this.bytes.length) {
                this.bytes[at] = rest & 0xff;
            }
            rest >>>= 8;
        }
    }
}
