import { MAX_DATA_LEN, SW } from './constants.js';
import { HsmAuthError } from './errors.js';
import { encodeLength } from './tlv.js';
import type { CardResponse } from './types.js';

/**
 * Short APDU under construction. The data field grows one TLV field at a
 * time and never exceeds 255 bytes.
 *
 * @example
 * ```typescript
 * const frame = new CommandFrame(INS.DELETE);
 * frame.appendField(TAG.MGMKEY, managementKey);
 * frame.appendField(TAG.LABEL, Buffer.from('default'));
 * await card.transmit(frame.toBuffer());
 * ```
 */
export class CommandFrame {
    readonly ins: number;
    readonly p1: number;
    readonly p2: number;
    readonly #chunks: Buffer[] = [];
    #length = 0;

    constructor(ins: number, p1 = 0x00, p2 = 0x00) {
        this.ins = ins;
        this.p1 = p1;
        this.p2 = p2;
    }

    /** Bytes currently in the data field */
    get length(): number {
        return this.#length;
    }

    /** Bytes still available in the data field */
    get remaining(): number {
        return MAX_DATA_LEN - this.#length;
    }

    /**
     * Append `tag`, the encoded length of `value` plus padding, `value`, and
     * `padLength` zero bytes.
     * @throws HsmAuthError (InvalidParams) if the field does not fit; the frame is unchanged
     */
    appendField(tag: number, value: Uint8Array, padLength = 0): this {
        if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
            throw new RangeError('Tag must be a single byte');
        }
        if (!Number.isInteger(padLength) || padLength < 0) {
            throw new RangeError('Padding must be a non-negative integer');
        }

        const header = encodeLength(value.length + padLength);
        const total = 1 + header.length + value.length + padLength;
        if (total > this.remaining) {
            throw new HsmAuthError(
                'InvalidParams',
                `Field 0x${tag.toString(16)} needs ${String(total)} bytes, only ${String(this.remaining)} left in command`
            );
        }

        this.#chunks.push(Buffer.from([tag]), header, Buffer.from(value), Buffer.alloc(padLength));
        this.#length += total;
        return this;
    }

    /** Data field only */
    get data(): Buffer {
        return Buffer.concat(this.#chunks, this.#length);
    }

    /**
     * Serialize as `CLA INS P1 P2 Lc data`
     */
    toBuffer(): Buffer {
        return Buffer.concat([
            Buffer.from([
                0x00, // CLA
                this.ins,
                this.p1,
                this.p2,
                this.#length, // Lc
            ]),
            this.data,
        ]);
    }
}

/**
 * Split a raw card response into payload and status word.
 * Responses shorter than two bytes carry no status word and report 0.
 */
export function parseResponse(response: Buffer): CardResponse {
    if (response.length < 2) {
        return {
            buffer: Buffer.alloc(0),
            sw: 0,
            sw1: 0,
            sw2: 0,
            isOk: () => false,
        };
    }

    const sw1 = response[response.length - 2] ?? 0;
    const sw2 = response[response.length - 1] ?? 0;
    const sw = (sw1 << 8) | sw2;

    return {
        buffer: response.subarray(0, response.length - 2),
        sw,
        sw1,
        sw2,
        isOk: () => sw === SW.SUCCESS,
    };
}

/**
 * Build a SELECT by DF name APDU
 */
export function buildSelectApdu(aid: Buffer): Buffer {
    return Buffer.from([
        0x00, // CLA
        0xa4, // INS: SELECT
        0x04, // P1: Select by DF name
        0x00, // P2: First or only occurrence
        aid.length, // Lc
        ...aid,
    ]);
}
