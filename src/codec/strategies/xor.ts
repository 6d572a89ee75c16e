/**
 * Gorilla-style XOR float encoding.
 *
 * Based on Facebook's Gorilla TSDB paper, over full 64-bit IEEE-754 words.
 *
 * Layout: first value (f64 LE), then per following value a control bit:
 *   0                      -> same bits as the previous value
 *   1 | lz(6) | sig(6) | v -> xor = v << (64 - lz - sig)
 * A 64-bit significant field is written as 0 in its 6-bit slot.
 */

import { BitReader, BitWriter } from '../bit-stream.js';
import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError, CorruptXorStreamError } from '../errors.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import type { ValueCodec } from './strategy.js';

const FIELD_BITS = 6;

export function encodeXor(values: readonly number[]): Uint8Array {
    if (values.length === 0) return new Uint8Array(0);

    const bits = new BitWriter();
    let prev = FieldMath.floatToBits(values[0]);

    for (let i = 1; i < values.length; i++) {
        const current = FieldMath.floatToBits(values[i]);
        const xor = current ^ prev;

        if (xor === 0n) {
            bits.writeBit(0);
        } else {
            // xor !== 0 guarantees at least one significant bit
            const leadingZeros = FieldMath.countLeadingZeros64(xor);
            const trailingZeros = FieldMath.countTrailingZeros64(xor);
            const significantBits = 64 - leadingZeros - trailingZeros;

            bits.writeBit(1);
            bits.writeBits(leadingZeros, FIELD_BITS);
            bits.writeBits(significantBits & 0x3F, FIELD_BITS);
            bits.writeBits(xor >> BigInt(trailingZeros), significantBits);
        }
        prev = current;
    }

    const out = new ByteWriter();
    out.writeF64(values[0]);
    out.writeBytes(bits.flush());
    return out.finish();
}

/**
 * Decode exactly `count` values. Reading stops at the target count; running
 * out of bits first is an InsufficientBitsError.
 */
export function decodeXor(data: Uint8Array, count: number): number[] {
    const reader = new ByteReader(data, 'XOR values');
    if (count === 0) {
        reader.expectEnd();
        return [];
    }

    const first = reader.readF64();
    const bits = new BitReader(reader.readBytes(reader.remaining));
    const values: number[] = [first];
    let prev = FieldMath.floatToBits(first);

    while (values.length < count) {
        if (bits.readBit() === 1) {
            const leadingZeros = bits.readSmall(FIELD_BITS);
            const field = bits.readSmall(FIELD_BITS);
            const significantBits = field === 0 ? 64 : field;
            const trailingZeros = 64 - leadingZeros - significantBits;
            if (trailingZeros < 0) {
                throw new CorruptXorStreamError(
                    `Impossible XOR field at value ${values.length}: leading=${leadingZeros}, significant=${significantBits}`
                );
            }
            prev ^= bits.readBits(significantBits) << BigInt(trailingZeros);
        }
        values.push(FieldMath.bitsToFloat(prev));
    }

    if (bits.remainingBits >= 8) {
        throw new CorruptPayloadError(`XOR values: ${bits.remainingBits} bits left after ${count} values`);
    }
    return values;
}

export const XorCodec: ValueCodec = {
    method: ValueMethod.XOR,
    name: 'XOR',
    accepts: () => true,
    encode: (values) => encodeXor(values),
    decode: decodeXor,
};
