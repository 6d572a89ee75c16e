import { ByteReader, ByteWriter } from '../byte-stream.js';
import { ValueMethod } from '../format.js';
import { applyPatches, collectPatches, readPatches, writePatches } from './patches.js';
import type { ValueCodec } from './strategy.js';

function expand(start: number, delta: number, count: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) values.push(start + i * delta);
    return values;
}

/** start (f64) | delta (f64) | count | patches; value i is start + i * delta. */
export const LinearCodec: ValueCodec = {
    method: ValueMethod.LINEAR,
    name: 'LINEAR',
    accepts: () => true,
    encode(values) {
        const start = values.length > 0 ? values[0] : 0;
        const delta = values.length > 1 ? values[1] - values[0] : 0;

        const out = new ByteWriter();
        out.writeF64(start);
        out.writeF64(delta);
        out.writeVarint(values.length);
        writePatches(out, collectPatches(values, expand(start, delta, values.length)));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'LINEAR values');
        const start = reader.readF64();
        const delta = reader.readF64();
        reader.expectCount(count);
        const patches = readPatches(reader, count);
        reader.expectEnd();
        return applyPatches(expand(start, delta, count), patches);
    },
};
