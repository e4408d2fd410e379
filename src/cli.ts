#!/usr/bin/env node
import { parseArgs as nodeParseArgs } from 'node:util';
import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
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
    type CommandContext,
    type CommandOptions,
    type CredentialFlags,
} from './commands.js';
import { DEFAULT_READER } from './constants.js';
import { HsmAuthError, describeErrorKind } from './errors.js';
import { HsmAuthApplication } from './hsm-auth-application.js';
import { Session } from './session.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const APP_COMMANDS = new Set([
    'version',
    'list',
    'put',
    'delete',
    'calculate',
    'challenge',
    'pubkey',
    'retries',
    'change-mgmkey',
    'reset',
]);

interface ParsedOptions {
    help: boolean;
    version: boolean;
    format: string | undefined;
    verbose: number;
    reader: string | undefined;
    credential: CredentialFlags;
}

interface ParsedArgs {
    options: ParsedOptions;
    positionals: string[];
}

/**
 * Parse command line arguments.
 * `HSMAUTH_READER` and `HSMAUTH_VERBOSE` supply defaults for `--reader` and `--verbose`.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
    const { values, positionals } = nodeParseArgs({
        args,
        options: {
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },
            format: { type: 'string', short: 'f' },
            verbose: { type: 'boolean', multiple: true },
            reader: { type: 'string', short: 'r' },
            mgmkey: { type: 'string', short: 'k' },
            'new-mgmkey': { type: 'string' },
            password: { type: 'string', short: 'p' },
            touch: { type: 'string', short: 't' },
            'card-pubkey': { type: 'string' },
            'card-cryptogram': { type: 'string' },
        },
        allowPositionals: true,
    });

    const envVerbose = Number.parseInt(env['HSMAUTH_VERBOSE'] ?? '', 10);

    return {
        options: {
            help: values.help ?? false,
            version: values.version ?? false,
            format: values.format,
            verbose: values.verbose?.length ?? (Number.isNaN(envVerbose) ? 0 : envVerbose),
            reader: values.reader ?? env['HSMAUTH_READER'],
            credential: {
                managementKey: values.mgmkey,
                newManagementKey: values['new-mgmkey'],
                password: values.password,
                touch: values.touch,
                cardPublicKey: values['card-pubkey'],
                cardCryptogram: values['card-cryptogram'],
            },
        },
        positionals,
    };
}

/**
 * Show help text
 */
export function showHelp(): string {
    return `hsmauth - Manage HSM authentication credentials on a smart card

Usage: hsmauth [options] <command> [arguments]

Commands:
  readers                          List available PC/SC readers
  version                          Show the applet version
  list                             List stored credentials
  put <label> <algorithm> <key>    Store a credential (algorithm: aes128, ecp256)
  delete <label>                   Delete a credential
  calculate <label> <context>      Derive session keys
  challenge <label>                Get a challenge for a credential
  pubkey <label>                   Get the public key of a credential
  retries                          Show management key retries
  change-mgmkey                    Change the management key
  reset                            Factory reset the applet

Options:
  -h, --help                 Show this help message
  -v, --version              Show version number
  -f, --format <type>        Output format: text, json (default: text)
  --verbose                  Show diagnostics; repeat to dump APDUs
  -r, --reader <name>        Use the first reader whose name contains <name> (default: ${DEFAULT_READER})
  -k, --mgmkey <hex>         Management key (default: 16 zero bytes)
  --new-mgmkey <hex>         New management key for change-mgmkey
  -p, --password <text>      Credential password
  -t, --touch <on|off>       Touch policy for put (default: off)
  --card-pubkey <hex>        Card public key for calculate
  --card-cryptogram <hex>    Card cryptogram for calculate

Environment:
  HSMAUTH_READER             Default for --reader
  HSMAUTH_VERBOSE            Default verbosity level

Examples:
  hsmauth readers
  hsmauth list --format json
  hsmauth put default aes128 <32-byte hex> --password password
  hsmauth calculate default <context hex> --password password
  hsmauth change-mgmkey --mgmkey <hex> --new-mgmkey <hex>
`;
}

/**
 * Get package version
 */
export function showVersion(): string {
    try {
        const packagePath = join(__dirname, '..', 'package.json');
        const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
        return '0.0.0';
    } catch {
        return '0.0.0';
    }
}

/**
 * Create command context from parsed options
 */
function createContext(options: ParsedOptions): CommandContext {
    return {
        output: (msg: string) => {
            console.log(msg);
        },
        error: (msg: string) => {
            console.error(msg);
        },
        readerName: options.reader,
        format: options.format,
        verbose: options.verbose,
    };
}

/**
 * Run a command. Commands that talk to the applet connect a session first
 * unless `options.app` is supplied.
 */
export async function runCommand(
    command: string,
    args: string[],
    ctx: CommandContext,
    flags: CredentialFlags,
    options: CommandOptions = {}
): Promise<number> {
    if (command === 'readers') {
        if (options.session) {
            return listReaders(ctx, options);
        }
        const session = new Session({ verbose: ctx.verbose, log: ctx.error });
        try {
            return await listReaders(ctx, { session });
        } finally {
            session.disconnect();
        }
    }

    if (!APP_COMMANDS.has(command)) {
        ctx.error(`Unknown command '${command}'. Run 'hsmauth --help' for usage.`);
        return 1;
    }

    if (options.app) {
        return runAppCommand(command, args, ctx, flags, options);
    }

    const session = new Session({ verbose: ctx.verbose, log: ctx.error });
    try {
        await session.connect(ctx.readerName ?? DEFAULT_READER);
    } catch (error: unknown) {
        if (error instanceof HsmAuthError) {
            ctx.error(`Unable to connect: ${describeErrorKind(error.kind)} (${error.message})`);
            return 1;
        }
        throw error;
    }

    try {
        const app = new HsmAuthApplication(session, { logger: session.logger });
        return await runAppCommand(command, args, ctx, flags, { ...options, app });
    } finally {
        session.disconnect();
    }
}

async function runAppCommand(
    command: string,
    args: string[],
    ctx: CommandContext,
    flags: CredentialFlags,
    options: CommandOptions
): Promise<number> {
    switch (command) {
        case 'version':
            return showAppletVersion(ctx, options);
        case 'list':
            return listCredentials(ctx, options);
        case 'put': {
            const [label, algorithm, key] = args;
            if (!label || !algorithm || !key) {
                ctx.error('Usage: hsmauth put <label> <algorithm> <key>');
                return 1;
            }
            return putCredential(ctx, label, algorithm, key, flags, options);
        }
        case 'delete': {
            const label = args[0];
            if (!label) {
                ctx.error('Usage: hsmauth delete <label>');
                return 1;
            }
            return deleteCredential(ctx, label, flags, options);
        }
        case 'calculate': {
            const [label, context] = args;
            if (!label || context === undefined) {
                ctx.error('Usage: hsmauth calculate <label> <context>');
                return 1;
            }
            return calculateSessionKeys(ctx, label, context, flags, options);
        }
        case 'challenge': {
            const label = args[0];
            if (!label) {
                ctx.error('Usage: hsmauth challenge <label>');
                return 1;
            }
            return getChallenge(ctx, label, options);
        }
        case 'pubkey': {
            const label = args[0];
            if (!label) {
                ctx.error('Usage: hsmauth pubkey <label>');
                return 1;
            }
            return getPublicKey(ctx, label, options);
        }
        case 'retries':
            return getRetries(ctx, options);
        case 'change-mgmkey':
            return changeManagementKey(ctx, flags, options);
        case 'reset':
            return resetApplet(ctx, options);
        default:
            ctx.error(`Unknown command '${command}'. Run 'hsmauth --help' for usage.`);
            return 1;
    }
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    if (args.options.help) {
        console.log(showHelp());
        return;
    }

    if (args.options.version) {
        console.log(showVersion());
        return;
    }

    const command = args.positionals[0];

    if (!command) {
        console.log(showHelp());
        process.exitCode = 1;
        return;
    }

    const ctx = createContext(args.options);
    const commandArgs = args.positionals.slice(1);
    process.exitCode = await runCommand(command, commandArgs, ctx, args.options.credential);
}

function isEntryPoint(): boolean {
    const script = process.argv[1];
    if (!script) return false;
    try {
        return realpathSync(script) === __filename;
    } catch {
        return false;
    }
}

if (isEntryPoint()) {
    main().catch((error: unknown) => {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    });
}
