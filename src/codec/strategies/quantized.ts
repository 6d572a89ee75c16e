import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError } from '../errors.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import type { ValueCodec } from './strategy.js';

/** Narrowest index width, in bytes, that addresses `size` entries. */
export function indexWidth(size: number): 1 | 2 | 4 {
    if (size <= 0x100) return 1;
    if (size <= 0x10000) return 2;
    return 4;
}

/**
 * dict size | dictionary (f64*) | width (u8) | count | index*
 *
 * Entries are keyed by their bits, in order of first appearance.
 */
export const QuantizedCodec: ValueCodec = {
    method: ValueMethod.QUANTIZED,
    name: 'QUANTIZED',
    accepts: () => true,
    encode(values) {
        const slots = new Map<bigint, number>();
        const dictionary: number[] = [];
        const indices: number[] = [];

        for (const v of values) {
            const key = FieldMath.floatToBits(v);
            let slot = slots.get(key);
            if (slot === undefined) {
                slot = dictionary.length;
                slots.set(key, slot);
                dictionary.push(v);
            }
            indices.push(slot);
        }

        const width = indexWidth(dictionary.length);
        const out = new ByteWriter();
        out.writeVarint(dictionary.length);
        for (const v of dictionary) out.writeF64(v);
        out.writeU8(width);
        out.writeVarint(values.length);
        for (const index of indices) {
            if (width === 1) out.writeU8(index);
            else if (width === 2) {
                out.writeU8(index);
                out.writeU8(index >>> 8);
            } else out.writeU32(index);
        }
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'QUANTIZED values');
        const size = reader.readCount(count, 'dictionary size');
        const dictionary: number[] = [];
        for (let i = 0; i < size; i++) dictionary.push(reader.readF64());

        const width = reader.readU8();
        if (width !== 1 && width !== 2 && width !== 4) {
            throw new CorruptPayloadError(`QUANTIZED values: invalid index width ${width}`);
        }
        reader.expectCount(count);

        const values: number[] = [];
        for (let i = 0; i < count; i++) {
            let index: number;
            if (width === 1) index = reader.readU8();
            else if (width === 2) index = reader.readU8() | (reader.readU8() << 8);
            else index = reader.readU32();

            if (index >= size) {
                throw new CorruptPayloadError(`QUANTIZED values: index ${index} outside dictionary of ${size}`);
            }
            values.push(dictionary[index]);
        }
        reader.expectEnd();
        return values;
    },
};
