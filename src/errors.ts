/**
 * Error types for vmlink.
 *
 * These never reach the wire: the protocol reports every failure with the
 * same status byte. They are raised by the library around it (config,
 * transport, client) so callers can branch on `code`.
 */

/**
 * Base class for all vmlink errors.
 */
export class VmLinkError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'VmLinkError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, VmLinkError);
        }
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends VmLinkError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when the listening endpoint cannot be set up, or when the server
 * reports an accept error outside the transient allow-list.
 */
export class TransportError extends VmLinkError {
    public readonly errno: string | undefined;

    constructor(message: string, public readonly cause?: Error) {
        super(message, 'TRANSPORT_ERROR');
        this.name = 'TransportError';
        this.errno = errnoOf(cause);
    }
}

/**
 * Thrown by the client when a connection fails, times out or is closed
 * before a reply arrives.
 */
export class ConnectionError extends VmLinkError {
    constructor(
        message: string,
        public readonly cause?: Error,
        public readonly isRetryable: boolean = true
    ) {
        super(message, 'CONNECTION_ERROR');
        this.name = 'ConnectionError';
    }
}

/**
 * Thrown by the client when the bridge answers with the failure status or a
 * reply of the wrong size.
 */
export class ProtocolError extends VmLinkError {
    constructor(
        message: string,
        public readonly reply?: Uint8Array
    ) {
        super(message, 'PROTOCOL_ERROR');
        this.name = 'ProtocolError';
    }
}

/**
 * Thrown when a batch cannot fit the bridge's request or reply buffers.
 */
export class RequestTooLargeError extends VmLinkError {
    constructor(what: string, size: number, limit: number) {
        super(
            `${what} of ${size} exceeds the limit of ${limit}. ` +
            'Split the batch into several requests.',
            'REQUEST_TOO_LARGE'
        );
        this.name = 'RequestTooLargeError';
    }
}

/**
 * Thrown when the session loop is used out of order.
 */
export class SessionError extends VmLinkError {
    constructor(message: string) {
        super(message, 'SESSION_ERROR');
        this.name = 'SessionError';
    }
}

/**
 * Extracts the errno code (`EADDRINUSE`, `EMFILE`, ...) Node attaches to
 * system errors.
 */
export function errnoOf(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code = error.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
