import { ByteReader, ByteWriter } from '../byte-stream.js';
import { CorruptPayloadError } from '../errors.js';
import { ValueMethod } from '../format.js';
import { applyPatches, collectPatches, readPatches, writePatches } from './patches.js';
import type { ValueCodec } from './strategy.js';
import { decodeXor, encodeXor } from './xor.js';

/**
 * period | count | base pattern (f64 x period) | sized XOR stream of deviations | patches
 *
 * Deviations are taken against the repeating base, so an exact cycle turns
 * into a run of zeros that costs one bit per value in the XOR stream.
 */
export const PeriodicCodec: ValueCodec = {
    method: ValueMethod.PERIODIC,
    name: 'PERIODIC',
    accepts: () => true,
    encode(values, { period = 1 }) {
        const p = Math.min(Math.max(1, Math.floor(period)), values.length);
        const base = values.slice(0, p);
        const deviations: number[] = [];
        const reconstructed = [...base];

        for (let i = p; i < values.length; i++) {
            const deviation = values[i] - base[i % p];
            deviations.push(deviation);
            reconstructed.push(base[i % p] + deviation);
        }

        const out = new ByteWriter();
        out.writeVarint(p);
        out.writeVarint(values.length);
        for (const v of base) out.writeF64(v);
        out.writeSized(encodeXor(deviations));
        writePatches(out, collectPatches(values, reconstructed));
        return out.finish();
    },
    decode(data, count) {
        const reader = new ByteReader(data, 'PERIODIC values');
        const period = reader.readCount(count, 'period');
        if (period === 0 && count > 0) {
            throw new CorruptPayloadError('PERIODIC values: zero period');
        }
        reader.expectCount(count);

        const values: number[] = [];
        for (let i = 0; i < period; i++) values.push(reader.readF64());

        const deviations = decodeXor(reader.readSized(), count - period);
        for (let i = period; i < count; i++) {
            values.push(values[i % period] + deviations[i - period]);
        }

        const patches = readPatches(reader, count);
        reader.expectEnd();
        return applyPatches(values, patches);
    },
};
