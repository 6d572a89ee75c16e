import { ByteReader, ByteWriter } from '../byte-stream.js';
import { ValueMethod } from '../format.js';
import { applyPatches, collectPatches, readPatches, writePatches } from './patches.js';
import type { ValueCodec } from './strategy.js';

const MIN_PRECISION = 1e-6;
const PRECISION_STEPS = 1000;
// Quantized deviations beyond this are left to the patch list.
const MAX_QUANTUM = 2 ** 31;

/**
 * base (f64) | precision (f64) | count | round(deviation / precision)* | patches
 */
export const NearConstantCodec: ValueCodec = {
    method: ValueMethod.NEAR_CONSTANT,
    name: 'NEAR_CONSTANT',
    accepts: () => true,
    encode(values) {
        const base = values.length > 0 ? values[0] : 0;
        const deviations = values.map(v => v - base);

        let maxAbs = 0;
        for (const d of deviations) {
            if (Number.isFinite(d) && Math.abs(d) > maxAbs) maxAbs = Math.abs(d);
        }
        const precision = Math.max(MIN_PRECISION, maxAbs / PRECISION_STEPS);

        const quanta = deviations.map(d => {
            const q = Math.round(d / precision);
            return Number.isFinite(q) && Math.abs(q) <= MAX_QUANTUM ? q : 0;
        });
        const reconstructed = quanta.map(q => base + q * precision);

        const out = new ByteWriter();
        out.writeF64(base);
        out.writeF64(precision);
        out.writeVarint(values.length);
        for (const q of quanta) out.writeVarint(q);
        writePatches(out, collectPatches(values, reconstructed));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'NEAR_CONSTANT values');
        const base = reader.readF64();
        const precision = reader.readF64();
        reader.expectCount(count);
        const values: number[] = [];
        for (let i = 0; i < count; i++) {
            values.push(base + Number(reader.readVarint()) * precision);
        }
        const patches = readPatches(reader, count);
        reader.expectEnd();
        return applyPatches(values, patches);
    },
};
