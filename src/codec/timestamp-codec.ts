import { decodeRLE, encodeRLE } from '../codec-utils.js';
import { ByteReader, ByteWriter } from './byte-stream.js';
import { CorruptPayloadError, TruncatedPayloadError, UnknownMethodTagError } from './errors.js';
import { FieldMath } from './field-math.js';
import { TimestampMethod, isTimestampMethod } from './format.js';
import type { TimestampPayload } from './types.js';

export interface TimestampCodec {
    readonly method: TimestampMethod;
    readonly name: string;
    encode(timestamps: readonly bigint[]): Uint8Array;
    decode(data: Uint8Array, count: number): bigint[];
}

function expectCount(method: TimestampMethod, count: number, expected: number): void {
    if (count !== expected) {
        throw new CorruptPayloadError(`${TimestampMethod[method]} timestamps hold ${expected} points, block declares ${count}`);
    }
}

const EmptyCodec: TimestampCodec = {
    method: TimestampMethod.EMPTY,
    name: 'EMPTY',
    encode() {
        return new Uint8Array(0);
    },
    decode(data, count) {
        expectCount(TimestampMethod.EMPTY, count, 0);
        new ByteReader(data, 'EMPTY timestamps').expectEnd();
        return [];
    },
};

const SingleCodec: TimestampCodec = {
    method: TimestampMethod.SINGLE,
    name: 'SINGLE',
    encode(timestamps) {
        const out = new ByteWriter();
        out.writeI64(timestamps[0]);
        return out.finish();
    },
    decode(data, count) {
        expectCount(TimestampMethod.SINGLE, count, 1);
        const reader = new ByteReader(data, 'SINGLE timestamps');
        const t0 = reader.readI64();
        reader.expectEnd();
        return [t0];
    },
};

const PairCodec: TimestampCodec = {
    method: TimestampMethod.PAIR,
    name: 'PAIR',
    encode(timestamps) {
        const out = new ByteWriter();
        out.writeI64(timestamps[0]);
        out.writeVarint(timestamps[1] - timestamps[0]);
        return out.finish();
    },
    decode(data, count) {
        expectCount(TimestampMethod.PAIR, count, 2);
        const reader = new ByteReader(data, 'PAIR timestamps');
        const t0 = reader.readI64();
        const delta = reader.readVarint();
        reader.expectEnd();
        return [t0, t0 + delta];
    },
};

/**
 * initial (i64) | first_delta (varint) | RLE+varint stream of the double-deltas
 *
 * The stream runs to the end of the payload. Constant-interval series collapse
 * to one all-zero run whatever their length.
 */
const DoubleDeltaCodec: TimestampCodec = {
    method: TimestampMethod.DOUBLE_DELTA,
    name: 'DOUBLE_DELTA',
    encode(timestamps) {
        const { initial, firstDelta, doubleDeltas } = FieldMath.computeDoubleDeltas(timestamps);

        const out = new ByteWriter();
        out.writeI64(initial);
        out.writeVarint(firstDelta);
        out.writeBytes(encodeRLE(doubleDeltas));
        return out.finish();
    },
    decode(data, count) {
        if (count < 3) {
            throw new CorruptPayloadError(`DOUBLE_DELTA timestamps need at least 3 points, block declares ${count}`);
        }
        const reader = new ByteReader(data, 'DOUBLE_DELTA timestamps');
        const initial = reader.readI64();
        const firstDelta = reader.readVarint();

        const expected = count - 2;
        const doubleDeltas = decodeRLE(reader.readBytes(reader.remaining), expected);
        // Runs past the count are rejected by decodeRLE; a short stream ended early.
        if (doubleDeltas.length !== expected) {
            throw new TruncatedPayloadError(`DOUBLE_DELTA timestamps: runs cover ${doubleDeltas.length} deltas, expected ${expected}`);
        }
        return FieldMath.decodeDoubleDeltas(initial, firstDelta, doubleDeltas);
    },
};

export const TIMESTAMP_CODECS: Readonly<Record<TimestampMethod, TimestampCodec>> = Object.freeze({
    [TimestampMethod.EMPTY]: EmptyCodec,
    [TimestampMethod.SINGLE]: SingleCodec,
    [TimestampMethod.PAIR]: PairCodec,
    [TimestampMethod.DOUBLE_DELTA]: DoubleDeltaCodec,
});

export function getTimestampCodec(tag: number): TimestampCodec {
    if (!isTimestampMethod(tag)) throw new UnknownMethodTagError('timestamp', tag);
    return TIMESTAMP_CODECS[tag];
}

export function selectTimestampMethod(count: number): TimestampMethod {
    if (count === 0) return TimestampMethod.EMPTY;
    if (count === 1) return TimestampMethod.SINGLE;
    if (count === 2) return TimestampMethod.PAIR;
    return TimestampMethod.DOUBLE_DELTA;
}

export function encodeTimestamps(timestamps: readonly bigint[]): TimestampPayload {
    const method = selectTimestampMethod(timestamps.length);
    return { method, bytes: TIMESTAMP_CODECS[method].encode(timestamps) };
}

export function decodeTimestamps(payload: { method: number, bytes: Uint8Array }, count: number): bigint[] {
    return getTimestampCodec(payload.method).decode(payload.bytes, count);
}
