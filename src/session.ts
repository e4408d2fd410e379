import { buildSelectApdu, parseResponse } from './apdu.js';
import { HSMAUTH_AID, SW } from './constants.js';
import { HsmAuthError, formatSw } from './errors.js';
import { createLogger, dumpHex, type Logger } from './logger.js';
import type { SmartCard, TransmitOptions } from './types.js';

/**
 * Minimal connected card interface from the smartcard package
 */
export interface PcscCard {
    transmit(command: Buffer, options?: TransmitOptions): Promise<Buffer>;
    disconnect(disposition?: number): void;
}

/**
 * Minimal reader interface from the smartcard package
 */
export interface PcscReader {
    name: string;
    connect(shareMode: number, protocol: number): Promise<PcscCard>;
}

/**
 * Minimal PC/SC context interface from the smartcard package
 */
export interface PcscContext {
    listReaders(): PcscReader[];
    close(): void;
}

/**
 * PC/SC constants the session needs, taken from the smartcard package
 */
export interface PcscConstants {
    shareShared: number;
    protocolT1: number;
    resetCard: number;
}

export interface PcscBinding {
    createContext(): PcscContext;
    constants: PcscConstants;
}

export interface SessionOptions {
    /** 0 silent, 1 diagnostics, 2 also APDU dumps */
    verbose?: number | undefined;
    /** Where diagnostics go, defaults to stderr */
    log?: ((message: string) => void) | undefined;
    /** PC/SC binding, defaults to the smartcard package */
    pcsc?: (() => Promise<PcscBinding>) | undefined;
}

/**
 * Load the smartcard package (lazy import to avoid loading native module in tests)
 */
async function loadSmartcard(): Promise<PcscBinding> {
    const smartcard = await import('smartcard');
    return {
        createContext: () => new smartcard.Context(),
        constants: {
            shareShared: smartcard.SCARD_SHARE_SHARED,
            protocolT1: smartcard.SCARD_PROTOCOL_T1,
            resetCard: smartcard.SCARD_RESET_CARD,
        },
    };
}

/**
 * A connection to the applet through one PC/SC reader.
 *
 * The session owns its context and card handle; use one session per
 * concurrent caller.
 */
export class Session implements SmartCard {
    readonly #logger: Logger;
    readonly #loadBinding: () => Promise<PcscBinding>;
    #binding: PcscBinding | undefined;
    #context: PcscContext | undefined;
    #card: PcscCard | undefined;
    #readerName: string | undefined;

    constructor(options: SessionOptions = {}) {
        this.#logger = createLogger({ verbose: options.verbose, sink: options.log });
        this.#loadBinding = options.pcsc ?? loadSmartcard;
    }

    /** Logger shared with applications built on this session */
    get logger(): Logger {
        return this.#logger;
    }

    get connected(): boolean {
        return this.#card !== undefined;
    }

    /** Name of the connected reader */
    get readerName(): string | undefined {
        return this.#readerName;
    }

    async #establishContext(): Promise<{ context: PcscContext; binding: PcscBinding }> {
        try {
            const binding = this.#binding ?? (await this.#loadBinding());
            this.#binding = binding;
            const context = this.#context ?? binding.createContext();
            this.#context = context;
            return { context, binding };
        } catch (error: unknown) {
            if (error instanceof HsmAuthError) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            this.#logger.info(`error: establishing PC/SC context failed: ${reason}`);
            throw new HsmAuthError('TransportError', `Unable to establish PC/SC context: ${reason}`, {
                cause: error,
            });
        }
    }

    #releaseContext(): void {
        const context = this.#context;
        this.#context = undefined;
        context?.close();
    }

    #listReaders(context: PcscContext): PcscReader[] {
        try {
            return context.listReaders();
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            this.#logger.info(`error: listing readers failed: ${reason}`);
            this.#releaseContext();
            throw new HsmAuthError('TransportError', `Unable to list readers: ${reason}`, {
                cause: error,
            });
        }
    }

    /**
     * Names of the readers currently attached
     */
    async listReaders(): Promise<string[]> {
        const { context } = await this.#establishContext();
        return this.#listReaders(context).map((reader) => reader.name);
    }

    /**
     * Connect to the first reader whose name contains `wanted`
     * (case-insensitive) and that answers SELECT for the applet.
     * Without `wanted` every reader is tried in order.
     */
    async connect(wanted?: string): Promise<void> {
        if (this.#card) {
            this.disconnect();
        }

        const { context, binding } = await this.#establishContext();
        const readers = this.#listReaders(context);
        const filter = wanted?.toLowerCase();

        for (const reader of readers) {
            if (filter && !reader.name.toLowerCase().includes(filter)) {
                this.#logger.info(`skipping reader '${reader.name}' since it doesn't match '${String(wanted)}'`);
                continue;
            }

            this.#logger.info(`trying to connect to reader '${reader.name}'`);

            let card: PcscCard;
            try {
                card = await reader.connect(binding.constants.shareShared, binding.constants.protocolT1);
            } catch (error: unknown) {
                const reason = error instanceof Error ? error.message : String(error);
                this.#logger.info(`connect failed: ${reason}`);
                continue;
            }

            let sw: number;
            try {
                sw = parseResponse(await this.#exchange(card, buildSelectApdu(HSMAUTH_AID))).sw;
            } catch (error: unknown) {
                const reason = error instanceof Error ? error.message : String(error);
                this.#logger.info(`Failed communicating with card: '${reason}'`);
                card.disconnect(binding.constants.resetCard);
                continue;
            }

            if (sw === SW.SUCCESS) {
                this.#card = card;
                this.#readerName = reader.name;
                return;
            }

            this.#logger.info(`Failed selecting application: ${formatSw(sw)}`);
            card.disconnect(binding.constants.resetCard);
        }

        this.#logger.info('error: no usable reader found');
        this.#releaseContext();
        throw new HsmAuthError('TransportError', 'No usable reader found');
    }

    /**
     * Reset and release the card, then close the context. Safe to call twice.
     */
    disconnect(): void {
        const card = this.#card;
        this.#card = undefined;
        this.#readerName = undefined;
        try {
            if (card && this.#binding) {
                card.disconnect(this.#binding.constants.resetCard);
            }
        } catch (error: unknown) {
            const reason = error instanceof Error ? error.message : String(error);
            this.#logger.info(`error: disconnecting card failed: ${reason}`);
        } finally {
            this.#releaseContext();
        }
    }

    async #exchange(card: PcscCard, apdu: Buffer, options?: TransmitOptions): Promise<Buffer> {
        this.#logger.trace(`> ${dumpHex(apdu)}`);
        const response = await card.transmit(apdu, options);
        this.#logger.trace(`< ${dumpHex(response)}`);
        return response;
    }

    /**
     * Exchange one APDU with the connected card
     */
    async transmit(apdu: Buffer, options?: TransmitOptions): Promise<Buffer> {
        const card = this.#card;
        if (!card) {
            throw new HsmAuthError('TransportError', 'Not connected');
        }
        return this.#exchange(card, apdu, options);
    }
}
