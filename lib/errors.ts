/**
 * PC/SC status codes used to classify reader and card failures
 */
export const SCARD_F_COMM_ERROR = 0x80100013;
export const SCARD_E_TIMEOUT = 0x8010000a;
export const SCARD_E_SHARING_VIOLATION = 0x8010000b;
export const SCARD_E_NO_SMARTCARD = 0x8010000c;
export const SCARD_E_NOT_TRANSACTED = 0x80100016;
export const SCARD_E_READER_UNAVAILABLE = 0x80100017;
export const SCARD_E_NO_SERVICE = 0x8010001d;
export const SCARD_E_NO_READERS_AVAILABLE = 0x8010002e;
export const SCARD_W_UNSUPPORTED_CARD = 0x80100065;
export const SCARD_W_UNRESPONSIVE_CARD = 0x80100066;
export const SCARD_W_UNPOWERED_CARD = 0x80100067;
export const SCARD_W_RESET_CARD = 0x80100068;
export const SCARD_W_REMOVED_CARD = 0x80100069;

/**
 * Base error class for reader and card communication failures
 */
export class CommunicationError extends Error {
    readonly code: number;

    constructor(message: string, code: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CommunicationError';
        this.code = code;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * The reader itself could not be reached or faulted (host-to-reader link)
 */
export class ReaderCommunicationError extends CommunicationError {
    constructor(
        message = 'Reader communication failed',
        code = SCARD_F_COMM_ERROR,
        options?: { cause?: unknown }
    ) {
        super(message, code, options);
        this.name = 'ReaderCommunicationError';
    }
}

/**
 * The reader reached the card but the card did not answer correctly
 */
export class CardCommunicationError extends CommunicationError {
    constructor(
        message = 'Card communication failed',
        code = SCARD_E_NOT_TRANSACTED,
        options?: { cause?: unknown }
    ) {
        super(message, code, options);
        this.name = 'CardCommunicationError';
    }
}

/**
 * Error thrown when a card is removed during an operation
 */
export class CardRemovedError extends CardCommunicationError {
    constructor(message = 'Card was removed', options?: { cause?: unknown }) {
        super(message, SCARD_W_REMOVED_CARD, options);
        this.name = 'CardRemovedError';
    }
}

/**
 * Error thrown when the card does not answer to reset or to a command
 */
export class UnresponsiveCardError extends CardCommunicationError {
    constructor(
        message = 'Card is unresponsive',
        options?: { cause?: unknown }
    ) {
        super(message, SCARD_W_UNRESPONSIVE_CARD, options);
        this.name = 'UnresponsiveCardError';
    }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends ReaderCommunicationError {
    constructor(message = 'Operation timed out', options?: { cause?: unknown }) {
        super(message, SCARD_E_TIMEOUT, options);
        this.name = 'TimeoutError';
    }
}

/**
 * Error thrown when PC/SC service is not running
 */
export class ServiceNotRunningError extends ReaderCommunicationError {
    constructor(
        message = 'PC/SC service not running',
        options?: { cause?: unknown }
    ) {
        super(message, SCARD_E_NO_SERVICE, options);
        this.name = 'ServiceNotRunningError';
    }
}

/**
 * Error thrown when the reader is detached or no longer known to the service
 */
export class ReaderUnavailableError extends ReaderCommunicationError {
    constructor(
        message = 'Reader is unavailable',
        options?: { cause?: unknown }
    ) {
        super(message, SCARD_E_READER_UNAVAILABLE, options);
        this.name = 'ReaderUnavailableError';
    }
}

/**
 * Error thrown when there's a sharing violation
 */
export class SharingViolationError extends ReaderCommunicationError {
    constructor(
        message = 'Sharing violation - card is in use',
        options?: { cause?: unknown }
    ) {
        super(message, SCARD_E_SHARING_VIOLATION, options);
        this.name = 'SharingViolationError';
    }
}

type CommunicationErrorConstructor = new (
    message?: string,
    options?: { cause?: unknown }
) => CommunicationError;

/**
 * PC/SC error codes mapped to specific error classes
 */
const ERROR_CODE_MAP = new Map<number, CommunicationErrorConstructor>([
    [SCARD_W_REMOVED_CARD, CardRemovedError],
    [SCARD_W_UNRESPONSIVE_CARD, UnresponsiveCardError],
    [SCARD_E_TIMEOUT, TimeoutError],
    [SCARD_E_NO_SERVICE, ServiceNotRunningError],
    [SCARD_E_READER_UNAVAILABLE, ReaderUnavailableError],
    [SCARD_E_NO_READERS_AVAILABLE, ReaderUnavailableError],
    [SCARD_E_SHARING_VIOLATION, SharingViolationError],
]);

// Codes raised by the card side of the link
const CARD_SIDE_CODES = new Set<number>([
    SCARD_E_NO_SMARTCARD,
    SCARD_E_NOT_TRANSACTED,
    SCARD_W_UNSUPPORTED_CARD,
    SCARD_W_UNRESPONSIVE_CARD,
    SCARD_W_UNPOWERED_CARD,
    SCARD_W_RESET_CARD,
    SCARD_W_REMOVED_CARD,
]);

/**
 * Factory function to create the appropriate error class based on PC/SC error code
 */
export function createCommunicationError(
    message: string,
    code: number,
    options?: { cause?: unknown }
): CommunicationError {
    const ErrorClass = ERROR_CODE_MAP.get(code);
    if (ErrorClass) {
        return new ErrorClass(message, options);
    }
    if (CARD_SIDE_CODES.has(code)) {
        return new CardCommunicationError(message, code, options);
    }
    return new ReaderCommunicationError(message, code, options);
}

export type FailureSide = 'reader' | 'card';

function errorCode(err: unknown): number | null {
    if (err instanceof Error && 'code' in err && typeof err.code === 'number') {
        return err.code;
    }
    return null;
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Check if an error indicates that the card left the reader
 */
export function isCardRemovedError(err: unknown): boolean {
    if (err instanceof CardRemovedError) {
        return true;
    }
    if (errorCode(err) === SCARD_W_REMOVED_CARD) {
        return true;
    }
    return /removed|no (smart ?)?card/i.test(errorMessage(err));
}

/**
 * Check if an error indicates an unresponsive card (SCARD_W_UNRESPONSIVE_CARD).
 */
export function isUnresponsiveCardError(err: unknown): boolean {
    if (errorCode(err) === SCARD_W_UNRESPONSIVE_CARD) {
        return true;
    }
    return errorMessage(err).toLowerCase().includes('unresponsive');
}

/**
 * Classify a driver failure as a reader or card communication error.
 *
 * Errors that already belong to the taxonomy pass through untouched. Others
 * are classified by their PC/SC `code`, then by message, then by `fallback`.
 */
export function toCommunicationError(
    err: unknown,
    fallback: FailureSide,
    context: string
): CommunicationError {
    if (err instanceof CommunicationError) {
        return err;
    }

    const message = `${context}: ${errorMessage(err)}`;
    const options = { cause: err };

    const code = errorCode(err);
    if (code !== null) {
        return createCommunicationError(message, code, options);
    }
    if (isCardRemovedError(err)) {
        return new CardRemovedError(message, options);
    }
    if (isUnresponsiveCardError(err)) {
        return new UnresponsiveCardError(message, options);
    }

    return fallback === 'card'
        ? new CardCommunicationError(message, SCARD_E_NOT_TRANSACTED, options)
        : new ReaderCommunicationError(message, SCARD_F_COMM_ERROR, options);
}
