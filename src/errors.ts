import { SW } from './constants.js';

/**
 * Failure categories reported by the applet client
 */
export type HsmAuthErrorKind =
    | 'InvalidParams'
    | 'TransportError'
    | 'WrongCredential'
    | 'StorageFull'
    | 'EntryNotFound'
    | 'MemoryError'
    | 'TouchRequired'
    | 'EntryInvalid'
    | 'DataInvalid'
    | 'NotSupported'
    | 'GenericError';

const DESCRIPTIONS: Record<HsmAuthErrorKind, string> = {
    InvalidParams: 'Invalid parameters',
    TransportError: 'Error in PCSC call',
    WrongCredential: 'Wrong Password/Authentication key',
    StorageFull: 'Storage full',
    EntryNotFound: 'Entry not found',
    MemoryError: 'Error allocating memory',
    TouchRequired: 'Touch required',
    EntryInvalid: 'Entry invalid',
    DataInvalid: 'Invalid authentication data',
    NotSupported: 'Not supported',
    GenericError: 'General error',
};

/**
 * Human-readable description of an error kind
 */
export function describeErrorKind(kind: HsmAuthErrorKind): string {
    return DESCRIPTIONS[kind];
}

export interface HsmAuthErrorOptions {
    /** Status word the card answered with */
    sw?: number | undefined;
    /** Remaining attempts, set for WrongCredential */
    retries?: number | undefined;
    cause?: unknown;
}

/**
 * Error raised by every applet operation.
 *
 * `retries` is only present for `WrongCredential`; zero means the credential
 * or the management key is now blocked.
 */
export class HsmAuthError extends Error {
    readonly kind: HsmAuthErrorKind;
    readonly sw: number | undefined;
    readonly retries: number | undefined;

    constructor(kind: HsmAuthErrorKind, message?: string, options: HsmAuthErrorOptions = {}) {
        super(message ?? describeErrorKind(kind), { cause: options.cause });
        this.name = 'HsmAuthError';
        this.kind = kind;
        this.sw = options.sw;
        this.retries = options.retries;
    }
}

/**
 * Status word classes the applet distinguishes
 */
export type StatusClass =
    | 'authentication-failed'
    | 'file-full'
    | 'file-not-found'
    | 'wrong-data'
    | 'memory-error'
    | 'security-status-not-satisfied'
    | 'file-invalid'
    | 'data-invalid'
    | 'ins-not-supported'
    | 'other';

/**
 * Classify a status word. Success is not a class: callers check for 0x9000
 * before translating.
 */
export function classifyStatus(sw: number): StatusClass {
    if ((sw & 0xfff0) === SW.AUTHENTICATION_FAILED) {
        return 'authentication-failed';
    }
    switch (sw) {
        case SW.FILE_FULL: return 'file-full';
        case SW.FILE_NOT_FOUND: return 'file-not-found';
        case SW.WRONG_DATA: return 'wrong-data';
        case SW.MEMORY_ERROR: return 'memory-error';
        case SW.SECURITY_STATUS_NOT_SATISFIED: return 'security-status-not-satisfied';
        case SW.FILE_INVALID: return 'file-invalid';
        case SW.DATA_INVALID: return 'data-invalid';
        case SW.INS_NOT_SUPPORTED: return 'ins-not-supported';
        default: return 'other';
    }
}

export interface TranslatedStatus {
    kind: HsmAuthErrorKind;
    retries?: number | undefined;
}

/**
 * Map a failure status word to an error kind
 */
export function translateStatus(sw: number): TranslatedStatus {
    const statusClass = classifyStatus(sw);
    switch (statusClass) {
        case 'authentication-failed':
            return { kind: 'WrongCredential', retries: sw & 0x0f };
        case 'file-full':
            return { kind: 'StorageFull' };
        case 'file-not-found':
            return { kind: 'EntryNotFound' };
        case 'wrong-data':
            return { kind: 'InvalidParams' };
        case 'memory-error':
            return { kind: 'MemoryError' };
        case 'security-status-not-satisfied':
            return { kind: 'TouchRequired' };
        case 'file-invalid':
            return { kind: 'EntryInvalid' };
        case 'data-invalid':
            return { kind: 'DataInvalid' };
        case 'ins-not-supported':
            return { kind: 'NotSupported' };
        case 'other':
            return { kind: 'GenericError' };
        default: {
            const unhandled: never = statusClass;
            throw new Error(`Unhandled status class: ${String(unhandled)}`);
        }
    }
}

/**
 * Format a status word as four hex digits
 */
export function formatSw(sw: number): string {
    return sw.toString(16).padStart(4, '0');
}

/**
 * Build the error thrown for a failure status word
 */
export function statusError(sw: number): HsmAuthError {
    const { kind, retries } = translateStatus(sw);
    const message = retries !== undefined
        ? `${describeErrorKind(kind)} (SW ${formatSw(sw)}, ${String(retries)} retries left)`
        : `${describeErrorKind(kind)} (SW ${formatSw(sw)})`;
    return new HsmAuthError(kind, message, { sw, retries });
}
