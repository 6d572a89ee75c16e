import { decodeRLE, encodeRLE } from '../../codec-utils.js';
import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError } from '../errors.js';
import { FieldMath } from '../field-math.js';
import { DeltaMode, ValueMethod } from '../format.js';
import { collectPatches, readPatches, writePatches } from './patches.js';
import type { ValueCodec } from './strategy.js';

/**
 * first (f64) | mode (u8) | body | patches
 *
 * PLAIN body:    one f64 delta per following value.
 * ZERO_RUN body: RLE of repeat(0)/change(1) markers, then the f64 deltas of
 *                the changes only. Chosen when repeats dominate.
 *
 * The decoder applies patches as it walks, so later deltas start from the
 * exact value.
 */
export const DeltaCodec: ValueCodec = {
    method: ValueMethod.DELTA,
    name: 'DELTA',
    accepts: () => true,
    encode(values, { thresholds }) {
        if (values.length === 0) return new Uint8Array(0);

        const n = values.length;
        const deltas: number[] = [];
        const markers: bigint[] = [];
        for (let i = 1; i < n; i++) {
            deltas.push(values[i] - values[i - 1]);
            markers.push(FieldMath.sameBits(values[i], values[i - 1]) ? 0n : 1n);
        }

        const repeats = markers.filter(m => m === 0n).length;
        const mode = n > 1 && repeats / (n - 1) > thresholds.deltaZeroRunRatio ? DeltaMode.ZERO_RUN : DeltaMode.PLAIN;

        const reconstructed: number[] = [values[0]];
        for (let i = 1; i < n; i++) {
            const repeat = mode === DeltaMode.ZERO_RUN && markers[i - 1] === 0n;
            reconstructed.push(repeat ? values[i - 1] : values[i - 1] + deltas[i - 1]);
        }

        const out = new ByteWriter();
        out.writeF64(values[0]);
        out.writeU8(mode);
        if (mode === DeltaMode.PLAIN) {
            for (const d of deltas) out.writeF64(d);
        } else {
            out.writeSized(encodeRLE(markers));
            deltas.forEach((d, i) => {
                if (markers[i] === 1n) out.writeF64(d);
            });
        }
        writePatches(out, collectPatches(values, reconstructed));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'DELTA values');
        if (count === 0) {
            reader.expectEnd();
            return [];
        }

        const first = reader.readF64();
        const mode = reader.readU8();
        // null marks a repeat of the previous value
        const steps: Array<number | null> = [];

        if (mode === DeltaMode.PLAIN) {
            for (let i = 1; i < count; i++) steps.push(reader.readF64());
        } else if (mode === DeltaMode.ZERO_RUN) {
            const markers = decodeRLE(reader.readSized(), count - 1);
            if (markers.length !== count - 1) {
                throw new CorruptPayloadError(`DELTA values: ${markers.length} markers for ${count - 1} deltas`);
            }
            for (const marker of markers) {
                if (marker === 0n) steps.push(null);
                else if (marker === 1n) steps.push(reader.readF64());
                else throw new CorruptPayloadError(`DELTA values: invalid marker ${marker}`);
            }
        } else {
            throw new CorruptPayloadError(`DELTA values: unknown mode ${mode}`);
        }

        const patches = new Map(readPatches(reader, count).map(p => [p.index, p.value]));
        reader.expectEnd();

        const values: number[] = [patches.get(0) ?? first];
        for (let i = 1; i < count; i++) {
            const prev = values[i - 1];
            const step = steps[i - 1];
            values.push(patches.get(i) ?? (step === null ? prev : prev + step));
        }
        return values;
    },
};
