import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError } from '../errors.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import type { ValueCodec } from './strategy.js';

function allBitEqual(values: readonly number[]): boolean {
    return values.length > 0 && values.every(v => FieldMath.sameBits(v, values[0]));
}

/** value (f64) | count (u64): 16 bytes whatever the length. */
export const ConstantCodec: ValueCodec = {
    method: ValueMethod.CONSTANT,
    name: 'CONSTANT',
    accepts: (values) => allBitEqual(values),
    encode(values) {
        if (!allBitEqual(values)) {
            throw new RangeError('CONSTANT encoding requires a non-empty run of bit-identical values');
        }
        const out = new ByteWriter();
        out.writeF64(values[0]);
        out.writeU64(BigInt(values.length));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'CONSTANT values');
        const value = reader.readF64();
        const stored = reader.readU64();
        reader.expectEnd();
        if (stored !== BigInt(count)) {
            throw new CorruptPayloadError(`CONSTANT values hold ${stored} points, block declares ${count}`);
        }
        return new Array<number>(count).fill(value);
    },
};
