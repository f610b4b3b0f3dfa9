/**
 * Capability the bridge uses to reach the machine's address space.
 *
 * Implementations are synchronous and not reentrant: the session never
 * calls into them from two exchanges at once. Addresses are unsigned 32-bit.
 * 8/16/32-bit values travel as unsigned numbers, 64-bit values as bigint.
 */
export interface MemoryAccess {
    /** False while no machine is running; every request then fails. */
    hasActiveMachine(): boolean;

    read8(address: number): number;
    read16(address: number): number;
    read32(address: number): number;
    read64(address: number): bigint;

    write8(address: number, value: number): void;
    write16(address: number, value: number): void;
    write32(address: number, value: number): void;
    write64(address: number, value: bigint): void;
}

export type TransportKind = 'tcp' | 'unix';

export type SessionState = 'CREATED' | 'LISTENING' | 'ACCEPTING' | 'PROCESSING' | 'STOPPED';

/**
 * Why a dispatch failed. Only used for logging; on the wire every failure is
 * the same status byte.
 */
export type FailureReason =
    | 'machine-inactive'
    | 'invalid-opcode'
    | 'request-overflow'
    | 'reply-overflow'
    | 'memory-fault';

export type DispatchOutcome =
    | {
        ok: true;
        /** Bytes of the reply buffer to send, status byte included */
        length: number;
        /** Sub-commands executed */
        executed: number;
    }
    | {
        ok: false;
        length: 1;
        reason: FailureReason;
        /** Batch position of the failing sub-command, -1 when nothing was parsed */
        index: number;
        /** Sub-commands that took effect before the failure */
        executed: number;
        /** What the memory facade threw, for `memory-fault` */
        error?: Error;
    };

/**
 * Summary of one served connection, emitted by the session loop.
 */
export interface ExchangeRecord {
    requestLength: number;
    /** 0 when the read failed and nothing was sent */
    replyLength: number;
    outcome: DispatchOutcome | null;
    /** Set when the read failed or timed out */
    readError?: Error;
    /** Set when writing the reply failed */
    writeError?: Error;
    durationMs: number;
}
