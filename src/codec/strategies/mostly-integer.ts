import { ByteReader, ByteWriter } from '../byte-stream.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import { applyPatches, collectPatches, readPatches, writePatches } from './patches.js';
import type { ValueCodec } from './strategy.js';

/**
 * count | integer part* | fraction count | (index_gap, f64 fraction)* | patches
 *
 * Values outside the safe-integer range, non-finite values and -0 keep an
 * integer part of 0 and land in the patch list.
 */
export const MostlyIntegerCodec: ValueCodec = {
    method: ValueMethod.MOSTLY_INTEGER,
    name: 'MOSTLY_INTEGER',
    accepts: () => true,
    encode(values) {
        const integers: number[] = [];
        const fractions: Array<{ index: number, value: number }> = [];
        const reconstructed: number[] = [];

        values.forEach((v, index) => {
            const whole = Math.trunc(v);
            const integer = FieldMath.isSafeIntegerValue(whole) ? whole : 0;
            integers.push(integer);

            const fraction = integer === whole ? v - whole : 0;
            if (fraction !== 0 && fraction === fraction) {
                fractions.push({ index, value: fraction });
                reconstructed.push(integer + fraction);
            } else {
                reconstructed.push(integer);
            }
        });

        const out = new ByteWriter();
        out.writeVarint(values.length);
        for (const i of integers) out.writeVarint(i);
        out.writeVarint(fractions.length);
        let next = 0;
        for (const { index, value } of fractions) {
            out.writeVarint(index - next);
            out.writeF64(value);
            next = index + 1;
        }
        writePatches(out, collectPatches(values, reconstructed));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'MOSTLY_INTEGER values');
        reader.expectCount(count);

        const values: number[] = [];
        for (let i = 0; i < count; i++) values.push(Number(reader.readVarint()));

        const fractionCount = reader.readCount(count, 'fraction count');
        let next = 0;
        for (let i = 0; i < fractionCount; i++) {
            const index = next + reader.readCount(count - 1 - next, 'fraction index gap');
            values[index] += reader.readF64();
            next = index + 1;
        }

        const patches = readPatches(reader, count);
        reader.expectEnd();
        return applyPatches(values, patches);
    },
};
