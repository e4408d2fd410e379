import { describe, it, expect, vi } from 'vitest';
import {
    listReaders,
    showAppletVersion,
    listCredentials,
    putCredential,
    deleteCredential,
    calculateSessionKeys,
    getChallenge,
    getPublicKey,
    getRetries,
    changeManagementKey,
    resetApplet,
    parseHex,
    type CommandContext,
    type CredentialFlags,
} from './commands.js';
import { HsmAuthError } from './errors.js';

function createMockContext(format?: string, verbose = 0): { ctx: CommandContext; outputs: string[]; errors: string[] } {
    const outputs: string[] = [];
    const errors: string[] = [];
    return {
        ctx: {
            output: (msg: string) => outputs.push(msg),
            error: (msg: string) => errors.push(msg),
            readerName: undefined,
            format,
            verbose,
        },
        outputs,
        errors,
    };
}

function createFlags(overrides: Partial<CredentialFlags> = {}): CredentialFlags {
    return {
        managementKey: undefined,
        newManagementKey: undefined,
        password: undefined,
        touch: undefined,
        cardPublicKey: undefined,
        cardCryptogram: undefined,
        ...overrides,
    };
}

const AES_KEY_HEX = '00'.repeat(32);

describe('Commands', () => {
    describe('parseHex', () => {
        it('should accept separators', () => {
            expect(parseHex('01:02-03 04')?.toString('hex')).toBe('01020304');
        });

        it('should reject odd lengths and non-hex characters', () => {
            expect(parseHex('123')).toBeNull();
            expect(parseHex('zz')).toBeNull();
        });
    });

    describe('listReaders', () => {
        it('should report when no readers are available', async () => {
            const { ctx, outputs } = createMockContext();
            const session = { listReaders: vi.fn(async () => []) };

            expect(await listReaders(ctx, { session })).toBe(0);
            expect(outputs).toEqual(['No readers found']);
        });

        it('should list available readers', async () => {
            const { ctx, outputs } = createMockContext();
            const session = { listReaders: vi.fn(async () => ['Reader 1', 'Reader 2']) };

            expect(await listReaders(ctx, { session })).toBe(0);
            expect(outputs).toEqual(['Found 2 reader(s):\n', '  Reader 1', '  Reader 2']);
        });

        it('should output JSON when requested', async () => {
            const { ctx, outputs } = createMockContext('json');
            const session = { listReaders: vi.fn(async () => ['Reader 1']) };

            await listReaders(ctx, { session });
            expect(JSON.parse(outputs[0] ?? '')).toEqual(['Reader 1']);
        });

        it('should fail without a session', async () => {
            const { ctx, errors } = createMockContext();

            expect(await listReaders(ctx)).toBe(1);
            expect(errors).toEqual(['PC/SC session not available']);
        });
    });

    describe('showAppletVersion', () => {
        it('should print the version', async () => {
            const { ctx, outputs } = createMockContext();
            const app = { getVersion: vi.fn(async () => '5.7.2') };

            expect(await showAppletVersion(ctx, { app })).toBe(0);
            expect(outputs).toEqual(['Version 5.7.2']);
        });

        it('should fail without an applet', async () => {
            const { ctx, errors } = createMockContext();

            expect(await showAppletVersion(ctx, {})).toBe(1);
            expect(errors).toEqual(['Applet not available']);
        });
    });

    describe('listCredentials', () => {
        it('should print one line per credential', async () => {
            const { ctx, outputs } = createMockContext();
            const app = {
                listCredentials: vi.fn(async () => [
                    {
                        label: 'abc',
                        labelBytes: Buffer.from('abc'),
                        algorithm: 'aes128' as const,
                        algorithmId: 38,
                        touchPolicy: 'on' as const,
                        counter: 8,
                    },
                    {
                        label: 'odd',
                        labelBytes: Buffer.from('odd'),
                        algorithm: undefined,
                        algorithmId: 16,
                        touchPolicy: 'off' as const,
                        counter: 3,
                    },
                ]),
            };

            expect(await listCredentials(ctx, { app })).toBe(0);
            expect(outputs).toEqual([
                'Found 2 credential(s):\n',
                '  abc  algorithm: aes128, touch: on, retries: 8',
                '  odd  algorithm: unknown (16), touch: off, retries: 3',
            ]);
        });

        it('should print label bytes as hex in JSON output', async () => {
            const { ctx, outputs } = createMockContext('json');
            const app = {
                listCredentials: vi.fn(async () => [
                    {
                        label: 'abc',
                        labelBytes: Buffer.from('abc'),
                        algorithm: 'aes128' as const,
                        algorithmId: 38,
                        touchPolicy: 'off' as const,
                        counter: 8,
                    },
                ]),
            };

            await listCredentials(ctx, { app });
            expect(JSON.parse(outputs[0] ?? '')).toEqual([
                { label: 'abc', algorithm: 'aes128', algorithmId: 38, touchPolicy: 'off', counter: 8, labelHex: '616263' },
            ]);
        });

        it('should report an empty store', async () => {
            const { ctx, outputs } = createMockContext();
            const app = { listCredentials: vi.fn(async () => []) };

            await listCredentials(ctx, { app });
            expect(outputs).toEqual(['No credentials found']);
        });

        it('should report applet errors', async () => {
            const { ctx, errors } = createMockContext();
            const app = {
                listCredentials: vi.fn(async () => {
                    throw new HsmAuthError('MemoryError');
                }),
            };

            expect(await listCredentials(ctx, { app })).toBe(1);
            expect(errors).toEqual(['Listing credentials failed: Error allocating memory']);
        });
    });

    describe('putCredential', () => {
        it('should store a credential with the default management key', async () => {
            const { ctx, outputs } = createMockContext();
            const storeCredential = vi.fn(async () => undefined);

            const result = await putCredential(
                ctx,
                'abc',
                'aes128',
                AES_KEY_HEX,
                createFlags({ password: 'test-secret' }),
                { app: { storeCredential } }
            );

            expect(result).toBe(0);
            expect(outputs).toEqual(["Credential 'abc' stored"]);
            expect(storeCredential).toHaveBeenCalledWith({
                managementKey: Buffer.alloc(16),
                label: 'abc',
                algorithm: 'aes128',
                key: Buffer.alloc(32),
                password: 'test-secret',
                touchPolicy: 'off',
            });
        });

        it('should pass the touch policy', async () => {
            const { ctx } = createMockContext();
            const storeCredential = vi.fn(async () => undefined);

            await putCredential(ctx, 'abc', 'ecp256', 'aa'.repeat(32), createFlags({ password: '', touch: 'on' }), {
                app: { storeCredential },
            });
            expect(storeCredential).toHaveBeenCalledWith(
                expect.objectContaining({ algorithm: 'ecp256', touchPolicy: 'on' })
            );
        });

        it('should reject an unknown algorithm', async () => {
            const { ctx, errors } = createMockContext();
            const storeCredential = vi.fn(async () => undefined);

            const result = await putCredential(ctx, 'abc', 'rsa', AES_KEY_HEX, createFlags({ password: 'x' }), {
                app: { storeCredential },
            });
            expect(result).toBe(1);
            expect(errors).toEqual(["Invalid algorithm 'rsa'. Use aes128 or ecp256."]);
            expect(storeCredential).not.toHaveBeenCalled();
        });

        it('should reject an invalid touch policy', async () => {
            const { ctx, errors } = createMockContext();

            await putCredential(ctx, 'abc', 'aes128', AES_KEY_HEX, createFlags({ password: 'x', touch: 'maybe' }), {});
            expect(errors).toEqual(["Invalid touch policy 'maybe'. Use on or off."]);
        });

        it('should require a password', async () => {
            const { ctx, errors } = createMockContext();

            expect(await putCredential(ctx, 'abc', 'aes128', AES_KEY_HEX, createFlags(), {})).toBe(1);
            expect(errors).toEqual(['A credential password is required (--password)']);
        });

        it('should report remaining attempts for a wrong management key', async () => {
            const { ctx, errors } = createMockContext();
            const storeCredential = vi.fn(async () => {
                throw new HsmAuthError('WrongCredential', 'Wrong key', { sw: 0x63c2, retries: 2 });
            });

            await putCredential(ctx, 'abc', 'aes128', AES_KEY_HEX, createFlags({ password: 'x' }), {
                app: { storeCredential },
            });
            expect(errors).toEqual([
                'Storing credential failed: Wrong Password/Authentication key, 2 attempt(s) remaining',
            ]);
        });

        it('should report a blocked management key with details when verbose', async () => {
            const { ctx, errors } = createMockContext(undefined, 1);
            const storeCredential = vi.fn(async () => {
                throw new HsmAuthError('WrongCredential', 'Wrong key', { sw: 0x63c0, retries: 0 });
            });

            await putCredential(ctx, 'abc', 'aes128', AES_KEY_HEX, createFlags({ password: 'x' }), {
                app: { storeCredential },
            });
            expect(errors).toEqual([
                'Storing credential failed: Wrong Password/Authentication key (blocked)',
                '  Wrong key',
            ]);
        });

        it('should let other errors propagate', async () => {
            const { ctx } = createMockContext();
            const storeCredential = vi.fn(async () => {
                throw new Error('boom');
            });

            await expect(
                putCredential(ctx, 'abc', 'aes128', AES_KEY_HEX, createFlags({ password: 'x' }), {
                    app: { storeCredential },
                })
            ).rejects.toThrow('boom');
        });
    });

    describe('deleteCredential', () => {
        it('should delete with the given management key', async () => {
            const { ctx, outputs } = createMockContext();
            const remove = vi.fn(async () => undefined);

            const result = await deleteCredential(ctx, 'abc', createFlags({ managementKey: '01'.repeat(16) }), {
                app: { deleteCredential: remove },
            });
            expect(result).toBe(0);
            expect(outputs).toEqual(["Credential 'abc' deleted"]);
            expect(remove).toHaveBeenCalledWith(Buffer.alloc(16, 0x01), 'abc');
        });

        it('should reject a malformed management key', async () => {
            const { ctx, errors } = createMockContext();

            expect(await deleteCredential(ctx, 'abc', createFlags({ managementKey: 'zz' }), {})).toBe(1);
            expect(errors).toEqual(['Invalid management key. It must be 16 bytes in hex.']);
        });
    });

    describe('calculateSessionKeys', () => {
        const keys = {
            encryption: Buffer.alloc(16, 0x01),
            mac: Buffer.alloc(16, 0x02),
            responseMac: Buffer.alloc(16, 0x03),
        };

        it('should print the derived keys', async () => {
            const { ctx, outputs } = createMockContext();
            const calculate = vi.fn(async () => keys);

            const result = await calculateSessionKeys(ctx, 'abc', '11'.repeat(16), createFlags({ password: 'pw' }), {
                app: { calculateSessionKeys: calculate },
            });

            expect(result).toBe(0);
            expect(outputs).toEqual([
                'Session keys:',
                `  S-ENC:  ${'01'.repeat(16)}`,
                `  S-MAC:  ${'02'.repeat(16)}`,
                `  S-RMAC: ${'03'.repeat(16)}`,
            ]);
            expect(calculate).toHaveBeenCalledWith({
                label: 'abc',
                context: Buffer.alloc(16, 0x11),
                cardPublicKey: undefined,
                cardCryptogram: undefined,
                password: 'pw',
            });
        });

        it('should output JSON when requested', async () => {
            const { ctx, outputs } = createMockContext('json');

            await calculateSessionKeys(ctx, 'abc', '00', createFlags({ password: 'pw' }), {
                app: { calculateSessionKeys: vi.fn(async () => keys) },
            });
            expect(JSON.parse(outputs[0] ?? '')).toEqual({
                encryption: '01'.repeat(16),
                mac: '02'.repeat(16),
                responseMac: '03'.repeat(16),
            });
        });

        it('should reject a malformed context', async () => {
            const { ctx, errors } = createMockContext();

            expect(await calculateSessionKeys(ctx, 'abc', 'xyz', createFlags({ password: 'pw' }), {})).toBe(1);
            expect(errors).toEqual(['Invalid context format. The context must be in hex.']);
        });

        it('should reject a malformed card public key', async () => {
            const { ctx, errors } = createMockContext();

            await calculateSessionKeys(ctx, 'abc', '00', createFlags({ password: 'pw', cardPublicKey: '0' }), {});
            expect(errors).toEqual(['Invalid card public key format. It must be in hex.']);
        });
    });

    describe('getChallenge', () => {
        it('should print the challenge in hex', async () => {
            const { ctx, outputs } = createMockContext();
            const app = { getChallenge: vi.fn(async () => Buffer.from('0102030405060708', 'hex')) };

            expect(await getChallenge(ctx, 'abc', { app })).toBe(0);
            expect(outputs).toEqual(['Challenge: 0102030405060708']);
        });
    });

    describe('getPublicKey', () => {
        it('should report a missing credential', async () => {
            const { ctx, errors } = createMockContext();
            const app = {
                getPublicKey: vi.fn(async () => {
                    throw new HsmAuthError('EntryNotFound');
                }),
            };

            expect(await getPublicKey(ctx, 'abc', { app })).toBe(1);
            expect(errors).toEqual(['Getting public key failed: Entry not found']);
        });
    });

    describe('getRetries', () => {
        it('should print the retry counter', async () => {
            const { ctx, outputs } = createMockContext();
            const app = { getManagementKeyRetries: vi.fn(async () => 8) };

            expect(await getRetries(ctx, { app })).toBe(0);
            expect(outputs).toEqual(['Management key retries: 8']);
        });
    });

    describe('changeManagementKey', () => {
        it('should require a new key', async () => {
            const { ctx, errors } = createMockContext();

            expect(await changeManagementKey(ctx, createFlags(), {})).toBe(1);
            expect(errors).toEqual(['A new management key is required (--new-mgmkey)']);
        });

        it('should send both keys', async () => {
            const { ctx, outputs } = createMockContext();
            const putManagementKey = vi.fn(async () => undefined);

            const result = await changeManagementKey(ctx, createFlags({ newManagementKey: '02'.repeat(16) }), {
                app: { putManagementKey },
            });
            expect(result).toBe(0);
            expect(outputs).toEqual(['Management key changed']);
            expect(putManagementKey).toHaveBeenCalledWith(Buffer.alloc(16), Buffer.alloc(16, 0x02));
        });

        it('should reject a short new key', async () => {
            const { ctx, errors } = createMockContext();

            await changeManagementKey(ctx, createFlags({ newManagementKey: '02' }), {});
            expect(errors).toEqual(['Invalid new management key. It must be 16 bytes in hex.']);
        });
    });

    describe('resetApplet', () => {
        it('should reset the applet', async () => {
            const { ctx, outputs } = createMockContext();
            const app = { reset: vi.fn(async () => undefined) };

            expect(await resetApplet(ctx, { app })).toBe(0);
            expect(outputs).toEqual(['Applet reset']);
            expect(app.reset).toHaveBeenCalledTimes(1);
        });
    });
});
