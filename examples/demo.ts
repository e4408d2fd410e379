/**
 * HSM authentication demo
 *
 * Connects to the first YubiKey-like reader, prints the applet version and
 * stored credentials, then derives session keys for a symmetric credential
 * when a label, context and password are given:
 *
 *   npm run demo -- <label> <context hex> <password>
 */

import { randomBytes } from 'node:crypto';
import { HsmAuthApplication, HsmAuthError, Session, describeErrorKind } from '../src/index.js';

async function main(): Promise<void> {
    const [label, contextHex, password] = process.argv.slice(2);
    const session = new Session({ verbose: 1 });

    await session.connect('YubiKey');
    console.log(`Connected to ${String(session.readerName)}`);

    try {
        const app = new HsmAuthApplication(session, { logger: session.logger });
        console.log(`Applet version ${await app.getVersion()}`);

        for (const entry of await app.listCredentials()) {
            console.log(`  ${entry.label} (${entry.algorithm ?? 'unknown'}), ${String(entry.counter)} retries`);
        }

        if (label && password !== undefined) {
            // host challenge followed by card challenge
            const context = contextHex ? Buffer.from(contextHex, 'hex') : randomBytes(16);
            const keys = await app.calculateSessionKeys({ label, context, password });
            console.log(`S-ENC  ${keys.encryption.toString('hex')}`);
            console.log(`S-MAC  ${keys.mac.toString('hex')}`);
            console.log(`S-RMAC ${keys.responseMac.toString('hex')}`);
        }
    } finally {
        session.disconnect();
    }
}

main().catch((error: unknown) => {
    if (error instanceof HsmAuthError) {
        console.error(`${describeErrorKind(error.kind)}: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exitCode = 1;
});
