import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError } from '../errors.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import type { ValueCodec } from './strategy.js';

const SENTINEL = -1;
const MAX_EXPONENT = 1023;

/**
 * count | exponent* | f64 per sentinel
 *
 * Values equal to 2^k (k >= 0) are stored as k; anything else is -1 and
 * goes to the literal fallback list in order.
 */
export const PowerOfTwoCodec: ValueCodec = {
    method: ValueMethod.POWER_OF_2,
    name: 'POWER_OF_2',
    accepts: () => true,
    encode(values) {
        const fallback: number[] = [];
        const out = new ByteWriter();
        out.writeVarint(values.length);
        for (const v of values) {
            const exponent = FieldMath.powerOfTwoExponent(v);
            if (exponent === null) {
                out.writeVarint(SENTINEL);
                fallback.push(v);
            } else {
                out.writeVarint(exponent);
            }
        }
        for (const v of fallback) out.writeF64(v);
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'POWER_OF_2 values');
        reader.expectCount(count);

        const exponents: number[] = [];
        for (let i = 0; i < count; i++) {
            const exponent = Number(reader.readVarint());
            if (exponent < SENTINEL || exponent > MAX_EXPONENT) {
                throw new CorruptPayloadError(`POWER_OF_2 values: exponent ${exponent} out of range`);
            }
            exponents.push(exponent);
        }

        const values = exponents.map(e => (e === SENTINEL ? reader.readF64() : 2 ** e));
        reader.expectEnd();
        return values;
    },
};
