import type { ByteReader, ByteWriter } from '../byte-stream.js';
import { FieldMath } from '../field-math.js';

/**
 * Literal override for a position whose arithmetic reconstruction is not
 * bit-identical to the input.
 */
export interface Patch {
    index: number;
    value: number;
}

/**
 * Positions where `reconstructed` differs in bits from `values`. Strategies
 * build `reconstructed` with the decoder's own arithmetic.
 */
export function collectPatches(values: readonly number[], reconstructed: readonly number[]): Patch[] {
    const patches: Patch[] = [];
    for (let i = 0; i < values.length; i++) {
        if (!FieldMath.sameBits(values[i], reconstructed[i])) {
            patches.push({ index: i, value: values[i] });
        }
    }
    return patches;
}

/** count | (index_gap, f64)* where index_gap = index - previous_index - 1. */
export function writePatches(out: ByteWriter, patches: readonly Patch[]): void {
    out.writeVarint(patches.length);
    let next = 0;
    for (const { index, value } of patches) {
        out.writeVarint(index - next);
        out.writeF64(value);
        next = index + 1;
    }
}

export function readPatches(reader: ByteReader, count: number): Patch[] {
    const n = reader.readCount(count, 'patch count');
    const patches: Patch[] = [];
    let next = 0;
    for (let i = 0; i < n; i++) {
        const index = next + reader.readCount(count - 1 - next, 'patch index gap');
        patches.push({ index, value: reader.readF64() });
        next = index + 1;
    }
    return patches;
}

export function applyPatches(values: number[], patches: readonly Patch[]): number[] {
    for (const { index, value } of patches) values[index] = value;
    return values;
}
