/**
 * CLI command implementations
 */

import { PW_LEN } from './constants.js';
import { HsmAuthError, describeErrorKind } from './errors.js';
import type {
    Algorithm,
    CalculateOptions,
    CredentialEntry,
    SessionKeys,
    StoreCredentialOptions,
    TouchPolicy,
} from './types.js';

/**
 * Context for command execution
 */
export interface CommandContext {
    output: (message: string) => void;
    error: (message: string) => void;
    readerName: string | undefined;
    format: string | undefined;
    verbose: number;
}

/**
 * Minimal Session interface for dependency injection
 */
interface SessionLike {
    listReaders(): Promise<string[]>;
}

/**
 * Minimal HsmAuthApplication interface for dependency injection
 */
export interface AppLike {
    getVersion?(): Promise<string>;
    listCredentials?(capacity?: number): Promise<CredentialEntry[]>;
    storeCredential?(options: StoreCredentialOptions): Promise<void>;
    deleteCredential?(managementKey: Buffer, label: string): Promise<void>;
    calculateSessionKeys?(options: CalculateOptions): Promise<SessionKeys>;
    getChallenge?(label: string): Promise<Buffer>;
    getPublicKey?(label: string): Promise<Buffer>;
    getManagementKeyRetries?(): Promise<number>;
    putManagementKey?(currentKey: Buffer, newKey: Buffer): Promise<void>;
    reset?(): Promise<void>;
}

/**
 * Options for commands (for dependency injection in tests)
 */
export interface CommandOptions {
    session?: SessionLike;
    app?: AppLike;
}

/**
 * Secrets and credential attributes given as flags
 */
export interface CredentialFlags {
    managementKey: string | undefined;
    newManagementKey: string | undefined;
    password: string | undefined;
    touch: string | undefined;
    cardPublicKey: string | undefined;
    cardCryptogram: string | undefined;
}

/** Factory default management key: 16 zero bytes */
export const DEFAULT_MANAGEMENT_KEY = '00'.repeat(PW_LEN);

/**
 * Parse hex string to buffer, allowing spaces, colons and dashes
 */
export function parseHex(value: string): Buffer | null {
    const cleaned = value.replace(/[\s:-]/g, '');

    if (!/^[0-9a-fA-F]*$/.test(cleaned) || cleaned.length % 2 !== 0) {
        return null;
    }

    return Buffer.from(cleaned, 'hex');
}

function parseAlgorithm(value: string): Algorithm | null {
    switch (value.toLowerCase()) {
        case 'aes128':
        case 'aes128-yubico-authentication':
            return 'aes128';
        case 'ecp256':
        case 'ecp256-yubico-authentication':
            return 'ecp256';
        default:
            return null;
    }
}

function parseTouch(value: string | undefined): TouchPolicy | null {
    switch (value?.toLowerCase()) {
        case undefined:
        case 'off':
        case '0':
            return 'off';
        case 'on':
        case '1':
            return 'on';
        default:
            return null;
    }
}

/**
 * Report a failed operation. Errors that are not applet errors propagate.
 */
function reportFailure(ctx: CommandContext, action: string, error: unknown): number {
    if (!(error instanceof HsmAuthError)) {
        throw error;
    }

    let message = `${action} failed: ${describeErrorKind(error.kind)}`;
    if (error.kind === 'WrongCredential' && error.retries !== undefined) {
        message += error.retries === 0
            ? ' (blocked)'
            : `, ${String(error.retries)} attempt(s) remaining`;
    }
    ctx.error(message);
    if (ctx.verbose > 0) {
        ctx.error(`  ${error.message}`);
    }
    return 1;
}

function managementKeyFrom(ctx: CommandContext, value: string | undefined, flag: string): Buffer | null {
    const key = parseHex(value ?? DEFAULT_MANAGEMENT_KEY);
    if (key?.length !== PW_LEN) {
        ctx.error(`Invalid ${flag}. It must be ${String(PW_LEN)} bytes in hex.`);
        return null;
    }
    return key;
}

/**
 * List available PC/SC readers
 */
export async function listReaders(ctx: CommandContext, options: CommandOptions = {}): Promise<number> {
    const session = options.session;
    if (!session) {
        ctx.error('PC/SC session not available');
        return 1;
    }

    let readers: string[];
    try {
        readers = await session.listReaders();
    } catch (error: unknown) {
        return reportFailure(ctx, 'Listing readers', error);
    }

    if (ctx.format === 'json') {
        ctx.output(JSON.stringify(readers, null, 2));
        return 0;
    }

    if (readers.length === 0) {
        ctx.output('No readers found');
        return 0;
    }

    ctx.output(`Found ${String(readers.length)} reader(s):\n`);
    for (const reader of readers) {
        ctx.output(`  ${reader}`);
    }
    return 0;
}

/**
 * Show the applet version
 */
export async function showAppletVersion(ctx: CommandContext, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.getVersion) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        const version = await app.getVersion();
        ctx.output(ctx.format === 'json' ? JSON.stringify({ version }) : `Version ${version}`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Getting version', error);
    }
}

/**
 * List stored credentials
 */
export async function listCredentials(ctx: CommandContext, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.listCredentials) {
        ctx.error('Applet not available');
        return 1;
    }

    let entries: CredentialEntry[];
    try {
        entries = await app.listCredentials();
    } catch (error: unknown) {
        return reportFailure(ctx, 'Listing credentials', error);
    }

    if (ctx.format === 'json') {
        const json = entries.map(({ labelBytes, ...entry }) => ({ ...entry, labelHex: labelBytes.toString('hex') }));
        ctx.output(JSON.stringify(json, null, 2));
        return 0;
    }

    if (entries.length === 0) {
        ctx.output('No credentials found');
        return 0;
    }

    ctx.output(`Found ${String(entries.length)} credential(s):\n`);
    for (const entry of entries) {
        const algorithm = entry.algorithm ?? `unknown (${String(entry.algorithmId)})`;
        ctx.output(
            `  ${entry.label}  algorithm: ${algorithm}, touch: ${entry.touchPolicy}, retries: ${String(entry.counter)}`
        );
    }
    return 0;
}

/**
 * Store a credential
 */
export async function putCredential(
    ctx: CommandContext,
    label: string,
    algorithmArg: string,
    keyHex: string,
    flags: CredentialFlags,
    options: CommandOptions = {}
): Promise<number> {
    const algorithm = parseAlgorithm(algorithmArg);
    if (!algorithm) {
        ctx.error(`Invalid algorithm '${algorithmArg}'. Use aes128 or ecp256.`);
        return 1;
    }

    const key = parseHex(keyHex);
    if (!key) {
        ctx.error('Invalid key format. The key must be in hex.');
        return 1;
    }

    const touchPolicy = parseTouch(flags.touch);
    if (!touchPolicy) {
        ctx.error(`Invalid touch policy '${String(flags.touch)}'. Use on or off.`);
        return 1;
    }

    if (flags.password === undefined) {
        ctx.error('A credential password is required (--password)');
        return 1;
    }

    const managementKey = managementKeyFrom(ctx, flags.managementKey, 'management key');
    if (!managementKey) return 1;

    const app = options.app;
    if (!app?.storeCredential) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        await app.storeCredential({
            managementKey,
            label,
            algorithm,
            key,
            password: flags.password,
            touchPolicy,
        });
        ctx.output(`Credential '${label}' stored`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Storing credential', error);
    }
}

/**
 * Delete a credential
 */
export async function deleteCredential(
    ctx: CommandContext,
    label: string,
    flags: CredentialFlags,
    options: CommandOptions = {}
): Promise<number> {
    const managementKey = managementKeyFrom(ctx, flags.managementKey, 'management key');
    if (!managementKey) return 1;

    const app = options.app;
    if (!app?.deleteCredential) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        await app.deleteCredential(managementKey, label);
        ctx.output(`Credential '${label}' deleted`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Deleting credential', error);
    }
}

/**
 * Derive session keys
 */
export async function calculateSessionKeys(
    ctx: CommandContext,
    label: string,
    contextHex: string,
    flags: CredentialFlags,
    options: CommandOptions = {}
): Promise<number> {
    const context = parseHex(contextHex);
    if (!context) {
        ctx.error('Invalid context format. The context must be in hex.');
        return 1;
    }

    const cardPublicKey = flags.cardPublicKey !== undefined ? parseHex(flags.cardPublicKey) : undefined;
    if (cardPublicKey === null) {
        ctx.error('Invalid card public key format. It must be in hex.');
        return 1;
    }

    const cardCryptogram = flags.cardCryptogram !== undefined ? parseHex(flags.cardCryptogram) : undefined;
    if (cardCryptogram === null) {
        ctx.error('Invalid card cryptogram format. It must be in hex.');
        return 1;
    }

    if (flags.password === undefined) {
        ctx.error('A credential password is required (--password)');
        return 1;
    }

    const app = options.app;
    if (!app?.calculateSessionKeys) {
        ctx.error('Applet not available');
        return 1;
    }

    let keys: SessionKeys;
    try {
        keys = await app.calculateSessionKeys({
            label,
            context,
            cardPublicKey,
            cardCryptogram,
            password: flags.password,
        });
    } catch (error: unknown) {
        return reportFailure(ctx, 'Deriving session keys', error);
    }

    const hex = {
        encryption: keys.encryption.toString('hex'),
        mac: keys.mac.toString('hex'),
        responseMac: keys.responseMac.toString('hex'),
    };
    if (ctx.format === 'json') {
        ctx.output(JSON.stringify(hex, null, 2));
    } else {
        ctx.output('Session keys:');
        ctx.output(`  S-ENC:  ${hex.encryption}`);
        ctx.output(`  S-MAC:  ${hex.mac}`);
        ctx.output(`  S-RMAC: ${hex.responseMac}`);
    }
    return 0;
}

/**
 * Get a credential challenge
 */
export async function getChallenge(ctx: CommandContext, label: string, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.getChallenge) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        const challenge = await app.getChallenge(label);
        ctx.output(`Challenge: ${challenge.toString('hex')}`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Getting challenge', error);
    }
}

/**
 * Get a credential public key
 */
export async function getPublicKey(ctx: CommandContext, label: string, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.getPublicKey) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        const publicKey = await app.getPublicKey(label);
        ctx.output(`Public key: ${publicKey.toString('hex')}`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Getting public key', error);
    }
}

/**
 * Show management key retries
 */
export async function getRetries(ctx: CommandContext, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.getManagementKeyRetries) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        const retries = await app.getManagementKeyRetries();
        ctx.output(`Management key retries: ${String(retries)}`);
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Getting management key retries', error);
    }
}

/**
 * Change the management key
 */
export async function changeManagementKey(
    ctx: CommandContext,
    flags: CredentialFlags,
    options: CommandOptions = {}
): Promise<number> {
    const currentKey = managementKeyFrom(ctx, flags.managementKey, 'management key');
    if (!currentKey) return 1;

    if (flags.newManagementKey === undefined) {
        ctx.error('A new management key is required (--new-mgmkey)');
        return 1;
    }
    const newKey = managementKeyFrom(ctx, flags.newManagementKey, 'new management key');
    if (!newKey) return 1;

    const app = options.app;
    if (!app?.putManagementKey) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        await app.putManagementKey(currentKey, newKey);
        ctx.output('Management key changed');
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Changing management key', error);
    }
}

/**
 * Factory reset the applet
 */
export async function resetApplet(ctx: CommandContext, options: CommandOptions = {}): Promise<number> {
    const app = options.app;
    if (!app?.reset) {
        ctx.error('Applet not available');
        return 1;
    }

    try {
        await app.reset();
        ctx.output('Applet reset');
        return 0;
    } catch (error: unknown) {
        return reportFailure(ctx, 'Reset', error);
    }
}
