/**
 * @file CommandDispatcher.ts
 * @brief Interprets one request buffer against a `MemoryAccess` facade.
 *
 * The dispatcher is the only place that validates protocol bounds. For each
 * sub-command it checks that the request holds the whole sub-command and
 * that the reply has room for its result, then executes it. The first
 * failing sub-command aborts the batch with a one-byte FAIL reply.
 *
 * A memory facade that throws fails the batch like any other sub-command.
 *
 * Writes are applied as they are reached. A batch that fails at sub-command
 * `i` leaves the writes of sub-commands `0..i-1` in place: clients may rely
 * on that partial application, so it is part of the contract.
 */

import { ByteCursor } from '../binary/ByteCursor';
import { toError } from '../errors';
import type { WireValue } from '../codec';
import {
    CONSTANTS,
    OpCode,
    Status,
    memoryOpFor,
    replySizeOf,
    requestSizeOf,
    type ByteWidth,
} from '../protocol';
import type { DispatchOutcome, FailureReason, MemoryAccess } from '../types';

type StepResult = { ok: true } | { ok: false; reason: FailureReason; error?: Error };

/**
 * Bounds check applied before every sub-command.
 *
 * @returns false when the sub-command would read past the request or write
 * past the reply
 */
export function safetyChecks(
    requestCursor: number,
    requestNeeded: number,
    replyCursor: number,
    replyNeeded: number,
    requestCapacity: number,
    replyCapacity: number
): boolean {
    return !(
        requestCursor + requestNeeded > requestCapacity ||
        replyCursor + replyNeeded > replyCapacity
    );
}

export class CommandDispatcher {
    constructor(private readonly memory: MemoryAccess) { }

    /**
     * Parses `request`, runs its sub-commands and fills `reply`.
     *
     * `request` must be exactly the received bytes: its length is the
     * request capacity used by the bounds checks. `reply` is written from
     * index 0; only the first `outcome.length` bytes are meaningful.
     */
    public dispatch(request: Uint8Array, reply: Uint8Array): DispatchOutcome {
        if (reply.length < CONSTANTS.STATUS_SIZE) {
            throw new RangeError('CommandDispatcher: reply buffer cannot hold a status byte');
        }

        // Every command needs a running machine; check once for the batch.
        if (!this.memory.hasActiveMachine()) {
            return this.fail(reply, 'machine-inactive', -1, 0);
        }

        const input = new ByteCursor(request);
        const output = new ByteCursor(reply, CONSTANTS.STATUS_SIZE);

        let batch = 1;
        if (input.peekByte() === OpCode.MultiCommand) {
            if (!input.fits(CONSTANTS.BATCH_HEADER_SIZE)) {
                return this.fail(reply, 'request-overflow', -1, 0);
            }
            batch = Number(input.peekUint(2, 1));
            input.advance(CONSTANTS.BATCH_HEADER_SIZE);
        }

        for (let i = 0; i < batch; i++) {
            const result = this.step(input, output);
            if (!result.ok) {
                return this.fail(reply, result.reason, i, i, result.error);
            }
        }

        reply[0] = Status.OK;
        return { ok: true, length: output.offset, executed: batch };
    }

    private step(input: ByteCursor, output: ByteCursor): StepResult {
        // The address follows the opcode for every valid opcode, so it is
        // taken before the opcode is examined. Discarded on failure.
        const address = input.fits(CONSTANTS.COMMAND_HEADER_SIZE)
            ? Number(input.peekUint(4, 1))
            : undefined;

        const opcode = input.peekByte();
        if (opcode === undefined) {
            return { ok: false, reason: 'request-overflow' };
        }
        const op = memoryOpFor(opcode);
        if (!op) {
            return { ok: false, reason: 'invalid-opcode' };
        }

        const requestNeeded = requestSizeOf(op);
        const replyNeeded = replySizeOf(op);
        if (
            address === undefined ||
            !safetyChecks(input.offset, requestNeeded, output.offset, replyNeeded, input.capacity, output.capacity)
        ) {
            return {
                ok: false,
                reason: input.fits(requestNeeded) ? 'reply-overflow' : 'request-overflow',
            };
        }

        try {
            if (op.kind === 'read') {
                output.writeUint(op.width, this.read(op.width, address));
            } else {
                this.write(op.width, address, input.peekUint(op.width, CONSTANTS.COMMAND_HEADER_SIZE));
            }
        } catch (err) {
            return { ok: false, reason: 'memory-fault', error: toError(err) };
        }
        input.advance(requestNeeded);
        return { ok: true };
    }

    private read(width: ByteWidth, address: number): WireValue {
        switch (width) {
            case 1: return this.memory.read8(address);
            case 2: return this.memory.read16(address);
            case 4: return this.memory.read32(address);
            case 8: return this.memory.read64(address);
        }
    }

    private write(width: ByteWidth, address: number, value: WireValue): void {
        switch (width) {
            case 1: this.memory.write8(address, Number(value)); break;
            case 2: this.memory.write16(address, Number(value)); break;
            case 4: this.memory.write32(address, Number(value)); break;
            case 8: this.memory.write64(address, BigInt(value)); break;
        }
    }

    private fail(
        reply: Uint8Array,
        reason: FailureReason,
        index: number,
        executed: number,
        error?: Error
    ): DispatchOutcome {
        reply[0] = Status.FAIL;
        return { ok: false, length: 1, reason, index, executed, error };
    }
}
