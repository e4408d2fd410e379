/**
 * Response from an applet command
 */
export interface CardResponse {
    /** Response payload without the status word */
    buffer: Buffer;
    /** Check if the response indicates success (SW 9000) */
    isOk(): boolean;
    /** Status word, 0 when the card returned fewer than two bytes */
    sw: number;
    /** Status word 1 */
    sw1: number;
    /** Status word 2 */
    sw2: number;
}

/**
 * Transmit options for smartcard package
 */
export interface TransmitOptions {
    /** Automatically handle T=0 status words (SW1=61, SW1=6C) */
    autoGetResponse?: boolean;
}

/**
 * Anything that can exchange an APDU with the card.
 * The response includes the trailing status word.
 */
export interface SmartCard {
    transmit(apdu: Buffer, options?: TransmitOptions): Promise<Buffer>;
}

export type Algorithm = 'aes128' | 'ecp256';

export type TouchPolicy = 'off' | 'on';

/**
 * Credential as reported by LIST
 */
export interface CredentialEntry {
    /** Label decoded as UTF-8 for display */
    label: string;
    /** Label exactly as stored; pass this back to address the credential */
    labelBytes: Buffer;
    /** Known algorithm, undefined for identifiers this client does not know */
    algorithm: Algorithm | undefined;
    /** Raw algorithm identifier */
    algorithmId: number;
    touchPolicy: TouchPolicy;
    /** Remaining password attempts for this credential */
    counter: number;
}

/**
 * Session keys derived by CALCULATE
 */
export interface SessionKeys {
    encryption: Buffer;
    mac: Buffer;
    responseMac: Buffer;
}

/**
 * Byte input accepted by the operations
 */
export type BytesLike = Buffer | Uint8Array | readonly number[];

/**
 * Credential label: a string is encoded as UTF-8, bytes are sent unchanged
 */
export type Label = string | Uint8Array;

export interface StoreCredentialOptions {
    /** Management key, exactly 16 bytes */
    managementKey: BytesLike;
    label: Label;
    algorithm: Algorithm;
    /** 32 bytes for aes128 (encryption key then MAC key), private scalar for ecp256 */
    key: BytesLike;
    /** Credential password, at most 16 bytes */
    password: BytesLike | string;
    touchPolicy?: TouchPolicy | undefined;
}

export interface CalculateOptions {
    label: Label;
    /** Host and card challenges for symmetric credentials, host public key for asymmetric ones */
    context: BytesLike;
    cardPublicKey?: BytesLike | undefined;
    cardCryptogram?: BytesLike | undefined;
    password: BytesLike | string;
}
