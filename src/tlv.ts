import { HsmAuthError } from './errors.js';

/**
 * A decoded tag-length-value record
 */
export interface TlvRecord {
    tag: number;
    value: Buffer;
}

/**
 * Encode a TLV length header.
 *
 * - 0x00-0x7f: one byte
 * - 0x80-0xff: 0x81 followed by the length
 * - 0x100-0xffff: 0x82 followed by the big-endian length
 */
export function encodeLength(length: number): Buffer {
    if (!Number.isInteger(length) || length < 0 || length > 0xffff) {
        throw new RangeError('Length must be an integer between 0 and 65535');
    }
    if (length > 0xff) {
        return Buffer.from([0x82, length >> 8, length & 0xff]);
    }
    if (length > 0x7f) {
        return Buffer.from([0x81, length]);
    }
    return Buffer.from([length]);
}

/**
 * Read a length header at `offset`.
 * Returns the decoded length and the number of header bytes consumed.
 */
function readLength(buffer: Buffer, offset: number): { length: number; size: number } {
    const first = buffer[offset];
    if (first === undefined) {
        throw new HsmAuthError('GenericError', `Missing length at offset ${String(offset)}`);
    }
    if (first <= 0x7f) {
        return { length: first, size: 1 };
    }
    if (first === 0x81) {
        const byte = buffer[offset + 1];
        if (byte === undefined) {
            throw new HsmAuthError('GenericError', 'Truncated length header');
        }
        return { length: byte, size: 2 };
    }
    if (first === 0x82) {
        const hi = buffer[offset + 1];
        const lo = buffer[offset + 2];
        if (hi === undefined || lo === undefined) {
            throw new HsmAuthError('GenericError', 'Truncated length header');
        }
        return { length: (hi << 8) | lo, size: 3 };
    }
    throw new HsmAuthError(
        'GenericError',
        `Unsupported length encoding 0x${first.toString(16)} at offset ${String(offset)}`
    );
}

/**
 * Decode a buffer of consecutive single-byte-tag TLV records.
 * The records must cover the buffer exactly.
 */
export function decodeRecords(buffer: Buffer): TlvRecord[] {
    const records: TlvRecord[] = [];
    let i = 0;
    while (i < buffer.length) {
        const tag = buffer[i];
        if (tag === undefined) break;
        i += 1;

        const { length, size } = readLength(buffer, i);
        i += size;

        if (i + length > buffer.length) {
            throw new HsmAuthError(
                'GenericError',
                `Record 0x${tag.toString(16)} declares ${String(length)} bytes but only ${String(buffer.length - i)} remain`
            );
        }
        records.push({ tag, value: Buffer.from(buffer.subarray(i, i + length)) });
        i += length;
    }
    return records;
}
