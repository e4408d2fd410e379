export {
    HsmAuthApplication,
    createHsmAuthApplication,
    default,
    parseCredentialList,
    parseSessionKeys,
} from './hsm-auth-application.js';
export type { HsmAuthApplicationOptions } from './hsm-auth-application.js';
export { Session } from './session.js';
export type {
    SessionOptions,
    PcscBinding,
    PcscConstants,
    PcscContext,
    PcscReader,
    PcscCard,
} from './session.js';
export { CommandFrame, parseResponse, buildSelectApdu } from './apdu.js';
export { encodeLength, decodeRecords } from './tlv.js';
export type { TlvRecord } from './tlv.js';
export {
    HsmAuthError,
    classifyStatus,
    translateStatus,
    statusError,
    describeErrorKind,
    formatSw,
} from './errors.js';
export type { HsmAuthErrorKind, HsmAuthErrorOptions, StatusClass, TranslatedStatus } from './errors.js';
export { createLogger, dumpHex } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
export * from './constants.js';
export type {
    Algorithm,
    BytesLike,
    CalculateOptions,
    CardResponse,
    CredentialEntry,
    Label,
    SessionKeys,
    SmartCard,
    StoreCredentialOptions,
    TouchPolicy,
    TransmitOptions,
} from './types.js';
