import { CommandFrame, parseResponse } from './apdu.js';
import {
    ALGORITHM_ID,
    CARD_CRYPTO_LEN,
    ECP256_PRIVKEY_LEN,
    ECP256_PUBKEY_LEN,
    INS,
    KEY_LEN,
    MAX_LABEL_LEN,
    MIN_LABEL_LEN,
    P1_RESET,
    P2_RESET,
    PW_LEN,
    SESSION_KEY_LEN,
    TAG,
} from './constants.js';
import { HsmAuthError, formatSw, statusError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import type {
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
} from './types.js';

export interface HsmAuthApplicationOptions {
    /** Diagnostics for failed commands; defaults to a silent logger */
    logger?: Logger | undefined;
}

function toBuffer(value: BytesLike | string): Buffer {
    if (typeof value === 'string') {
        return Buffer.from(value, 'utf8');
    }
    return Buffer.from(value);
}

function invalid(message: string): HsmAuthError {
    return new HsmAuthError('InvalidParams', message);
}

/**
 * Encode and validate a credential label (1-64 bytes)
 */
function encodeLabel(label: Label): Buffer {
    const bytes = typeof label === 'string' ? Buffer.from(label, 'utf8') : Buffer.from(label);
    if (bytes.length < MIN_LABEL_LEN || bytes.length > MAX_LABEL_LEN) {
        throw invalid(
            `Label must be between ${String(MIN_LABEL_LEN)} and ${String(MAX_LABEL_LEN)} bytes`
        );
    }
    return bytes;
}

function encodeManagementKey(key: BytesLike, name = 'Management key'): Buffer {
    const bytes = toBuffer(key);
    if (bytes.length !== PW_LEN) {
        throw invalid(`${name} must be exactly ${String(PW_LEN)} bytes`);
    }
    return bytes;
}

function encodePassword(password: BytesLike | string): Buffer {
    const bytes = toBuffer(password);
    if (bytes.length > PW_LEN) {
        throw invalid(`Password must be at most ${String(PW_LEN)} bytes`);
    }
    return bytes;
}

function touchPolicyToByte(policy: TouchPolicy): number {
    switch (policy) {
        case 'off': return 0x00;
        case 'on': return 0x01;
    }
}

function byteToAlgorithm(id: number): Algorithm | undefined {
    switch (id) {
        case ALGORITHM_ID.aes128: return 'aes128';
        case ALGORITHM_ID.ecp256: return 'ecp256';
        default: return undefined;
    }
}

/**
 * Parse the LIST response payload.
 * Each entry is `72 len algo touch label… counter` with `len = 3 + label length`.
 *
 * @param capacity - Maximum number of entries the caller accepts
 * @throws HsmAuthError (MemoryError) when more than `capacity` entries are present
 * @throws HsmAuthError (GenericError) on an unexpected tag, inconsistent length or trailing bytes
 */
export function parseCredentialList(buffer: Buffer, capacity = Number.POSITIVE_INFINITY): CredentialEntry[] {
    const entries: CredentialEntry[] = [];
    let i = 0;

    // i + 1 < length guarantees tag and length can be read
    while (i + 1 < buffer.length) {
        const tag = buffer[i++];
        if (tag !== TAG.LABEL_LIST) {
            throw new HsmAuthError('GenericError', 'Unexpected tag returned on list');
        }
        const len = buffer[i++] ?? 0;

        if (entries.length >= capacity) {
            throw new HsmAuthError(
                'MemoryError',
                `More than ${String(capacity)} credentials returned`
            );
        }
        if (i + len > buffer.length || len < 3 || len - 3 > MAX_LABEL_LEN) {
            throw new HsmAuthError(
                'GenericError',
                `Length of element doesn't match expectations (${String(len)})`
            );
        }

        const algorithmId = buffer[i++] ?? 0;
        const touch = buffer[i++] ?? 0;
        const labelBytes = Buffer.from(buffer.subarray(i, i + len - 3));
        i += len - 3;
        const counter = buffer[i++] ?? 0;

        entries.push({
            label: labelBytes.toString('utf8'),
            labelBytes,
            algorithm: byteToAlgorithm(algorithmId),
            algorithmId,
            touchPolicy: touch === 0 ? 'off' : 'on',
            counter,
        });
    }

    if (i !== buffer.length) {
        throw new HsmAuthError('GenericError', 'Trailing bytes after last list entry');
    }

    return entries;
}

/**
 * Split a CALCULATE payload into the three session keys
 */
export function parseSessionKeys(buffer: Buffer): SessionKeys {
    if (buffer.length !== 3 * SESSION_KEY_LEN) {
        throw new HsmAuthError(
            'GenericError',
            `Wrong length returned: ${String(buffer.length)}`
        );
    }
    return {
        encryption: Buffer.from(buffer.subarray(0, SESSION_KEY_LEN)),
        mac: Buffer.from(buffer.subarray(SESSION_KEY_LEN, 2 * SESSION_KEY_LEN)),
        responseMac: Buffer.from(buffer.subarray(2 * SESSION_KEY_LEN, 3 * SESSION_KEY_LEN)),
    };
}

/**
 * Client for the HSM authentication applet.
 *
 * Every method validates its arguments, sends exactly one APDU and throws an
 * {@link HsmAuthError} on failure. Calls on one instance must not overlap.
 *
 * @example
 * ```typescript
 * import { Session, HsmAuthApplication } from 'hsmauth';
 *
 * const session = new Session({ verbose: 1 });
 * await session.connect('YubiKey');
 * const app = new HsmAuthApplication(session);
 * for (const entry of await app.listCredentials()) {
 *     console.log(entry.label, entry.counter);
 * }
 * session.disconnect();
 * ```
 */
export class HsmAuthApplication {
    readonly #card: SmartCard;
    readonly #logger: Logger;

    constructor(card: SmartCard, options: HsmAuthApplicationOptions = {}) {
        this.#card = card;
        this.#logger = options.logger ?? createLogger();
    }

    /**
     * Send a command and return the successful response.
     * @param action - Used in the diagnostic logged on failure
     */
    async #send(frame: CommandFrame, action: string): Promise<CardResponse> {
        let raw: Buffer;
        try {
            raw = await this.#card.transmit(frame.toBuffer(), { autoGetResponse: true });
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            this.#logger.info(`Unable to ${action}: transmit failed: ${reason}`);
            throw new HsmAuthError('TransportError', `Transmit failed: ${reason}`, { cause: error });
        }

        const response = parseResponse(raw);
        if (!response.isOk()) {
            this.#logger.info(`Unable to ${action}: ${formatSw(response.sw)}`);
            throw statusError(response.sw);
        }
        return response;
    }

    /**
     * Get the applet version as `major.minor.patch`.
     */
    async getVersion(): Promise<string> {
        const response = await this.#send(new CommandFrame(INS.GET_VERSION), 'get version');
        const [major, minor, patch] = response.buffer;
        if (response.buffer.length !== 3 || major === undefined || minor === undefined || patch === undefined) {
            throw statusError(response.sw);
        }
        return `${String(major)}.${String(minor)}.${String(patch)}`;
    }

    /**
     * Store a credential.
     * @throws HsmAuthError with `retries` set when the management key is wrong
     */
    async storeCredential(options: StoreCredentialOptions): Promise<void> {
        const managementKey = encodeManagementKey(options.managementKey);
        const label = encodeLabel(options.label);
        const key = toBuffer(options.key);
        const password = encodePassword(options.password);
        const touchPolicy = options.touchPolicy ?? 'off';

        if (options.algorithm === 'aes128' && key.length !== 2 * KEY_LEN) {
            throw invalid(`AES-128 credential key must be ${String(2 * KEY_LEN)} bytes`);
        }
        if (options.algorithm === 'ecp256' && (key.length === 0 || key.length > ECP256_PRIVKEY_LEN)) {
            throw invalid(`EC P-256 private key must be 1 to ${String(ECP256_PRIVKEY_LEN)} bytes`);
        }

        const frame = new CommandFrame(INS.PUT);
        frame.appendField(TAG.MGMKEY, managementKey);
        frame.appendField(TAG.LABEL, label);
        frame.appendField(TAG.ALGO, Buffer.from([ALGORITHM_ID[options.algorithm]]));

        if (options.algorithm === 'aes128') {
            frame.appendField(TAG.KEY_ENC, key.subarray(0, KEY_LEN));
            frame.appendField(TAG.KEY_MAC, key.subarray(KEY_LEN));
        } else {
            frame.appendField(TAG.PRIVKEY, key);
        }

        frame.appendField(TAG.PW, password, PW_LEN - password.length);
        frame.appendField(TAG.TOUCH, Buffer.from([touchPolicyToByte(touchPolicy)]));

        await this.#send(frame, 'store credential');
    }

    /**
     * Delete a credential by label.
     * @throws HsmAuthError with `retries` set when the management key is wrong
     */
    async deleteCredential(managementKey: BytesLike, label: Label): Promise<void> {
        const frame = new CommandFrame(INS.DELETE);
        frame.appendField(TAG.MGMKEY, encodeManagementKey(managementKey));
        frame.appendField(TAG.LABEL, encodeLabel(label));

        await this.#send(frame, 'delete credential');
    }

    /**
     * List stored credentials.
     * @param capacity - Maximum number of entries to accept; more is a MemoryError
     */
    async listCredentials(capacity?: number): Promise<CredentialEntry[]> {
        if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 0)) {
            throw invalid('Capacity must be a non-negative integer');
        }

        const response = await this.#send(new CommandFrame(INS.LIST), 'list keys');
        try {
            return parseCredentialList(response.buffer, capacity);
        } catch (error: unknown) {
            if (error instanceof HsmAuthError) {
                this.#logger.info(error.message);
            }
            throw error;
        }
    }

    /**
     * Derive session keys from a stored credential.
     *
     * For asymmetric credentials the card's public key is sent, and the card
     * cryptogram only when it is longer than 8 bytes. Any host cryptogram
     * appended by the card is rejected as a length mismatch.
     *
     * @throws HsmAuthError with `retries` set when the credential password is wrong
     */
    async calculateSessionKeys(options: CalculateOptions): Promise<SessionKeys> {
        const label = encodeLabel(options.label);
        const context = toBuffer(options.context);
        const cardPublicKey = options.cardPublicKey ? toBuffer(options.cardPublicKey) : Buffer.alloc(0);
        const cardCryptogram = options.cardCryptogram ? toBuffer(options.cardCryptogram) : Buffer.alloc(0);
        const password = encodePassword(options.password);

        if (context.length > 2 * ECP256_PUBKEY_LEN) {
            throw invalid(`Context must be at most ${String(2 * ECP256_PUBKEY_LEN)} bytes`);
        }
        if (cardPublicKey.length > ECP256_PUBKEY_LEN) {
            throw invalid(`Card public key must be at most ${String(ECP256_PUBKEY_LEN)} bytes`);
        }
        if (cardCryptogram.length > SESSION_KEY_LEN) {
            throw invalid(`Card cryptogram must be at most ${String(SESSION_KEY_LEN)} bytes`);
        }

        const frame = new CommandFrame(INS.CALCULATE);
        frame.appendField(TAG.LABEL, label);
        frame.appendField(TAG.CONTEXT, context);
        if (cardPublicKey.length > 0) {
            frame.appendField(TAG.PUBKEY, cardPublicKey);
        }
        if (cardCryptogram.length > CARD_CRYPTO_LEN) {
            frame.appendField(TAG.RESPONSE, cardCryptogram);
        }
        frame.appendField(TAG.PW, password, PW_LEN - password.length);

        const response = await this.#send(frame, 'derive keys');
        try {
            return parseSessionKeys(response.buffer);
        } catch (error: unknown) {
            if (error instanceof HsmAuthError) {
                this.#logger.info(error.message);
            }
            throw error;
        }
    }

    /**
     * Get a challenge for a credential: the card's ephemeral public key for
     * asymmetric credentials, an 8-byte card challenge for symmetric ones.
     */
    async getChallenge(label: Label): Promise<Buffer> {
        const frame = new CommandFrame(INS.GET_CHALLENGE);
        frame.appendField(TAG.LABEL, encodeLabel(label));

        const response = await this.#send(frame, 'get challenge');
        return Buffer.from(response.buffer);
    }

    /**
     * Get the public key of an asymmetric credential (uncompressed point)
     */
    async getPublicKey(label: Label): Promise<Buffer> {
        const frame = new CommandFrame(INS.GET_PUBKEY);
        frame.appendField(TAG.LABEL, encodeLabel(label));

        const response = await this.#send(frame, 'get pubkey');
        return Buffer.from(response.buffer);
    }

    /**
     * Remaining attempts for the management key
     */
    async getManagementKeyRetries(): Promise<number> {
        const response = await this.#send(
            new CommandFrame(INS.GET_MGMKEY_RETRIES),
            'get Management key retries'
        );
        const retries = response.buffer[0];
        if (retries === undefined) {
            throw new HsmAuthError('GenericError', 'Empty response to management key retries');
        }
        return retries;
    }

    /**
     * Replace the management key.
     * @throws HsmAuthError with `retries` set when the current key is wrong
     */
    async putManagementKey(currentKey: BytesLike, newKey: BytesLike): Promise<void> {
        const frame = new CommandFrame(INS.PUT_MGMKEY);
        frame.appendField(TAG.MGMKEY, encodeManagementKey(currentKey));
        frame.appendField(TAG.MGMKEY, encodeManagementKey(newKey, 'New management key'));

        await this.#send(frame, 'store Management key');
    }

    /**
     * Factory reset: deletes every credential and restores the default management key
     */
    async reset(): Promise<void> {
        await this.#send(new CommandFrame(INS.RESET, P1_RESET, P2_RESET), 'reset');
    }
}

/**
 * Factory function to create an HsmAuthApplication instance
 */
export function createHsmAuthApplication(
    card: SmartCard,
    options: HsmAuthApplicationOptions = {}
): HsmAuthApplication {
    return new HsmAuthApplication(card, options);
}

export default createHsmAuthApplication;
