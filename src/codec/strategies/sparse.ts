import { ByteReader, ByteWriter } from '../byte-stream.js';
import { FieldMath } from '../field-math.js';
import { ValueMethod } from '../format.js';
import type { ValueCodec } from './strategy.js';

/** Anything but +0 is stored, so -0 survives. */
export function isStoredNonZero(value: number): boolean {
    return !FieldMath.sameBits(value, 0);
}

export function nonZeroRatio(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.filter(isStoredNonZero).length / values.length;
}

/**
 * length | nnz | index_gap* | f64*
 *
 * Index gaps are delta-encoded: the first is the index itself, each later one
 * is `index - previous - 1`.
 */
export const SparseCodec: ValueCodec = {
    method: ValueMethod.SPARSE,
    name: 'SPARSE',
    accepts: () => true,
    encode(values) {
        const indices: number[] = [];
        values.forEach((v, i) => {
            if (isStoredNonZero(v)) indices.push(i);
        });

        const out = new ByteWriter();
        out.writeVarint(values.length);
        out.writeVarint(indices.length);
        let next = 0;
        for (const index of indices) {
            out.writeVarint(index - next);
            next = index + 1;
        }
        for (const index of indices) out.writeF64(values[index]);
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'SPARSE values');
        reader.expectCount(count);
        const nnz = reader.readCount(count, 'non-zero count');

        const indices: number[] = [];
        let next = 0;
        for (let i = 0; i < nnz; i++) {
            const index = next + reader.readCount(count - 1 - next, 'index gap');
            indices.push(index);
            next = index + 1;
        }

        const values = new Array<number>(count).fill(0);
        for (const index of indices) values[index] = reader.readF64();
        reader.expectEnd();
        return values;
    },
};
