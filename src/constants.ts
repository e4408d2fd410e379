/**
 * Protocol constants for the HSM authentication applet
 */

/** Management key length, also the on-wire width of a credential password */
export const PW_LEN = 16;
export const MIN_LABEL_LEN = 1;
export const MAX_LABEL_LEN = 64;
/** Length of each half of an AES-128 credential */
export const KEY_LEN = 16;
export const SESSION_KEY_LEN = 16;
/** Cryptograms at or below this length are placeholders and are not sent */
export const CARD_CRYPTO_LEN = 8;
export const HOST_CRYPTO_LEN = 8;
export const CONTEXT_LEN = 16;
export const ECP256_PUBKEY_LEN = 65;
export const ECP256_PRIVKEY_LEN = 32;

/** Maximum Lc of a short APDU */
export const MAX_DATA_LEN = 255;

/**
 * Applet AID used for SELECT
 */
export const HSMAUTH_AID = Buffer.from([0xa0, 0x00, 0x00, 0x05, 0x27, 0x21, 0x07]);

export const INS = {
    SELECT: 0xa4,
    PUT: 0x01,
    DELETE: 0x02,
    CALCULATE: 0x03,
    GET_CHALLENGE: 0x04,
    LIST: 0x05,
    RESET: 0x06,
    GET_VERSION: 0x07,
    PUT_MGMKEY: 0x08,
    GET_MGMKEY_RETRIES: 0x09,
    GET_PUBKEY: 0x0a,
} as const;

export const P1_RESET = 0xde;
export const P2_RESET = 0xad;

export const TAG = {
    LABEL: 0x71,
    LABEL_LIST: 0x72,
    PW: 0x73,
    ALGO: 0x74,
    KEY_ENC: 0x75,
    KEY_MAC: 0x76,
    CONTEXT: 0x77,
    RESPONSE: 0x78,
    VERSION: 0x79,
    TOUCH: 0x7a,
    MGMKEY: 0x7b,
    PUBKEY: 0x7c,
    PRIVKEY: 0x7d,
} as const;

export const SW = {
    SUCCESS: 0x9000,
    AUTHENTICATION_FAILED: 0x63c0,
    FILE_FULL: 0x6a84,
    FILE_NOT_FOUND: 0x6a82,
    WRONG_DATA: 0x6a80,
    MEMORY_ERROR: 0x6581,
    SECURITY_STATUS_NOT_SATISFIED: 0x6982,
    FILE_INVALID: 0x6983,
    DATA_INVALID: 0x6984,
    INS_NOT_SUPPORTED: 0x6d00,
} as const;

/**
 * Wire identifiers of the credential algorithms
 */
export const ALGORITHM_ID = {
    aes128: 38,
    ecp256: 39,
} as const;

export const DEFAULT_READER = 'YubiKey';
