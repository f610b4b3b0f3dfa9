/**
 * @file debug.ts
 * @brief Debug utilities for vmlink.
 *
 * Human-readable views of raw requests, used by the session's debug logging
 * and by the CLI.
 *
 * @example
 * ```typescript
 * import { describeRequest, hexDump } from 'vmlink';
 *
 * console.log(describeRequest(bytes).join('\n'));
 * console.log(hexDump(bytes));
 * ```
 */

import { decode16, decode32, decodeUint } from './codec';
import { CONSTANTS, OpCode, memoryOpFor, opCodeName, requestSizeOf } from './protocol';

/**
 * Renders a request as one line per sub-command, the way the dispatcher
 * would walk it. Stops at the first sub-command it cannot decode.
 */
export function describeRequest(data: Uint8Array): string[] {
    if (data.length === 0) {
        return ['<empty request>'];
    }

    const lines: string[] = [];
    let offset = 0;
    let count = 1;

    if (data[0] === OpCode.MultiCommand) {
        if (data.length < CONSTANTS.BATCH_HEADER_SIZE) {
            return ['<truncated batch header>'];
        }
        count = decode16(data, 1);
        offset = CONSTANTS.BATCH_HEADER_SIZE;
        lines.push(`batch of ${count}`);
    }

    for (let i = 0; i < count; i++) {
        if (offset >= data.length) {
            lines.push(`<missing sub-command ${i}>`);
            break;
        }
        const op = memoryOpFor(data[offset]);
        if (!op) {
            lines.push(`<invalid 0x${data[offset].toString(16).padStart(2, '0')}>`);
            break;
        }
        const size = requestSizeOf(op);
        if (offset + size > data.length) {
            lines.push(`<truncated ${opCodeName(data[offset])}>`);
            break;
        }
        const address = formatAddress(decode32(data, offset + 1));
        let line = `${opCodeName(data[offset])} @${address}`;
        if (op.kind === 'write') {
            const value = decodeUint(data, offset + CONSTANTS.COMMAND_HEADER_SIZE, op.width);
            line += ` = ${formatValue(value, op.width)}`;
        }
        lines.push(line);
        offset += size;
    }

    return lines;
}

export function formatAddress(address: number): string {
    return `0x${address.toString(16).padStart(8, '0')}`;
}

/**
 * Hex with the zero padding of the value's width.
 */
export function formatValue(value: number | bigint, width: number): string {
    return `0x${value.toString(16).padStart(width * 2, '0')}`;
}

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 *
 * @param baseAddress - Address printed for the first byte
 */
export function hexDump(data: Uint8Array, bytesPerLine: number = 16, baseAddress: number = 0): string {
    if (data.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < data.length; i += bytesPerLine) {
        const slice = data.subarray(i, Math.min(i + bytesPerLine, data.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = (baseAddress + i).toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

/**
 * Performance timer for measuring exchange latency.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * dispatcher.dispatch(request, reply);
 * log.debug(`dispatch took ${timer.elapsedMicros()}µs`);
 * ```
 */
export function startTimer(): { elapsed: () => number; elapsedMicros: () => number } {
    const start = performance.now();
    return {
        elapsed: () => performance.now() - start,
        elapsedMicros: () => (performance.now() - start) * 1000,
    };
}
