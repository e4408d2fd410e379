/**
 * Verbosity-gated diagnostics.
 *
 * Level 1 reports failed commands and reader selection, level 2 also dumps
 * every APDU exchanged with the card.
 */
export interface Logger {
    info(message: string): void;
    trace(message: string): void;
}

export interface LoggerOptions {
    verbose?: number | undefined;
    sink?: ((message: string) => void) | undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const verbose = options.verbose ?? 0;
    const sink = options.sink ?? ((message: string) => {
        console.error(message);
    });

    return {
        info: (message: string) => {
            if (verbose >= 1) sink(message);
        },
        trace: (message: string) => {
            if (verbose >= 2) sink(message);
        },
    };
}

/**
 * Hex dump with a space between bytes, as printed in APDU traces
 */
export function dumpHex(buffer: Uint8Array): string {
    return Array.from(buffer, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
}
