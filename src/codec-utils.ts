/**
 * Shared integer helpers for block encoding/decoding.
 *
 * Zigzag + LEB128 varints and run-length pairs. Integers travel as `bigint`
 * so the full signed 64-bit range (and the deltas between its extremes)
 * round-trips without precision loss.
 */

import { CorruptPayloadError, TruncatedPayloadError, TruncatedVarintError } from './codec/errors.js';

export type IntLike = bigint | number;

export interface RunPair<T> {
    value: T;
    count: number;
}

/** Map signed to unsigned so small negatives stay small: 0, -1, 1, -2 -> 0, 1, 2, 3. */
export function zigzagEncode(value: bigint): bigint {
    return value >= 0n ? value * 2n : (-value * 2n) - 1n;
}

export function zigzagDecode(zigzag: bigint): bigint {
    return (zigzag % 2n === 0n) ? (zigzag / 2n) : -((zigzag + 1n) / 2n);
}

/**
 * Append one zigzag varint to `out`. Low 7-bit group first, high bit set on
 * every byte but the last.
 */
export function writeVarint(out: number[], value: IntLike): void {
    let n = zigzagEncode(typeof value === 'bigint' ? value : BigInt(value));
    while (n >= 0x80n) {
        out.push(Number(n & 0x7Fn) | 0x80);
        n >>= 7n;
    }
    out.push(Number(n));
}

/**
 * Encode integers with zigzag + variable-length encoding
 * Small magnitudes = 1 byte, int64 extremes = 10 bytes
 */
export function encodeVarint(values: readonly IntLike[]): Uint8Array {
    const buffer: number[] = [];
    for (const val of values) writeVarint(buffer, val);
    return new Uint8Array(buffer);
}

export function decodeVarintAt(data: Uint8Array, start: number): { value: bigint, nextPos: number } {
    let i = start;
    let zigzag = 0n;
    let shift = 0n;

    while (true) {
        if (i >= data.length) throw new TruncatedVarintError(start);
        const byte = data[i++];
        zigzag |= BigInt(byte & 0x7F) << shift;
        if ((byte & 0x80) === 0) break;
        shift += 7n;
    }

    return { value: zigzagDecode(zigzag), nextPos: i };
}

/**
 * Decode every varint in `data`. A final byte with the continuation bit set
 * is a truncation, not a short read.
 */
export function decodeVarint(data: Uint8Array): bigint[] {
    const values: bigint[] = [];
    let pos = 0;
    while (pos < data.length) {
        const { value, nextPos } = decodeVarintAt(data, pos);
        values.push(value);
        pos = nextPos;
    }
    return values;
}

/**
 * Collapse maximal runs of identical adjacent values into (value, count) pairs.
 * Numbers compare with Object.is, so 0 and -0 never share a run.
 */
export function runLengthEncode<T extends IntLike>(values: readonly T[]): RunPair<T>[] {
    const runs: RunPair<T>[] = [];
    let i = 0;

    while (i < values.length) {
        const value = values[i];
        let count = 1;
        while (i + count < values.length && Object.is(values[i + count], value)) {
            count++;
        }
        runs.push({ value, count });
        i += count;
    }

    return runs;
}

export function runLengthDecode<T>(pairs: readonly RunPair<T>[]): T[] {
    const values: T[] = [];
    for (const { value, count } of pairs) {
        for (let j = 0; j < count; j++) values.push(value);
    }
    return values;
}

/**
 * RLE + Varint: flattened `value, count, value, count, ...` stream.
 */
export function encodeRLE(values: readonly bigint[]): Uint8Array {
    const flat: bigint[] = [];
    for (const { value, count } of runLengthEncode(values)) {
        flat.push(value, BigInt(count));
    }
    return encodeVarint(flat);
}

/**
 * Decode RLE + Varint. `maxLength` bounds the expansion so a corrupt count
 * cannot allocate without limit. A stream that stops between a value and its
 * count is truncated.
 */
export function decodeRLE(data: Uint8Array, maxLength: number = Number.MAX_SAFE_INTEGER): bigint[] {
    const flat = decodeVarint(data);
    if (flat.length % 2 !== 0) {
        throw new TruncatedPayloadError(`RLE stream ends after a value with no run count (${flat.length} varints)`);
    }

    const pairs: RunPair<bigint>[] = [];
    let total = 0;
    for (let i = 0; i < flat.length; i += 2) {
        const count = flat[i + 1];
        if (count < 1n || count > BigInt(maxLength - total)) {
            throw new CorruptPayloadError(`RLE run count ${count} out of range`);
        }
        total += Number(count);
        pairs.push({ value: flat[i], count: Number(count) });
    }
    return runLengthDecode(pairs);
}
