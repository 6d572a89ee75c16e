import { DEFAULT_MAX_POINTS, enforcePointLimit, packBlock, unpackBlock } from './block-frame.js';
import { RoundTripMismatchError } from './errors.js';
import { FieldMath } from './field-math.js';
import { RAW_BYTES_PER_POINT, TimestampMethod, ValueMethod } from './format.js';
import { describeDetection } from './pattern-detector.js';
import { decodeTimestamps, encodeTimestamps } from './timestamp-codec.js';
import { type Block, type CodecLogger, type CodecOptions, DETECTOR_PRESETS, type DetectorThresholds, type Sample, type Series, resolveThresholds } from './types.js';
import { decodeValues, encodeValues, type ValueEncoding } from './value-codec.js';

export interface SeriesColumns {
    timestamps: bigint[];
    values: number[];
}

export type RoundTripResult =
    | { ok: true; block: Block }
    | { ok: false; block: Block; index: number; reason: string };

export function splitColumns(series: Series): SeriesColumns {
    const timestamps: bigint[] = [];
    const values: number[] = [];
    for (const { timestamp, value } of series) {
        timestamps.push(timestamp);
        values.push(value);
    }
    return { timestamps, values };
}

export function zipColumns({ timestamps, values }: SeriesColumns): Sample[] {
    return timestamps.map((timestamp, i) => ({ timestamp, value: values[i] }));
}

function assembleBlock(timestamps: readonly bigint[], encoding: ValueEncoding): Block {
    return Object.freeze({
        pointCount: timestamps.length,
        timestamps: Object.freeze(encodeTimestamps(timestamps)),
        values: Object.freeze(encoding.payload),
    });
}

export function encodeColumns(timestamps: readonly bigint[], values: readonly number[], thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): Block {
    if (timestamps.length !== values.length) {
        throw new RangeError(`Column length mismatch: ${timestamps.length} timestamps, ${values.length} values`);
    }
    return assembleBlock(timestamps, encodeValues(values, thresholds));
}

export function encodeBlock(series: Series, thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): Block {
    const { timestamps, values } = splitColumns(series);
    return encodeColumns(timestamps, values, thresholds);
}

/** Throws LimitExceededError before decoding a block that declares more than `maxPoints`. */
export function decodeColumns(block: Block, maxPoints: number = DEFAULT_MAX_POINTS): SeriesColumns {
    enforcePointLimit(block.pointCount, maxPoints);
    return {
        timestamps: decodeTimestamps(block.timestamps, block.pointCount),
        values: decodeValues(block.values, block.pointCount),
    };
}

export function decodeBlock(block: Block, maxPoints: number = DEFAULT_MAX_POINTS): Sample[] {
    return zipColumns(decodeColumns(block, maxPoints));
}

/**
 * First difference between two series: integer equality on timestamps,
 * IEEE-754 bit equality on values.
 */
export function compareSeries(expected: Series, actual: Series): { index: number, reason: string } | null {
    const n = Math.min(expected.length, actual.length);
    for (let i = 0; i < n; i++) {
        if (expected[i].timestamp !== actual[i].timestamp) {
            return { index: i, reason: `timestamp ${actual[i].timestamp} !== ${expected[i].timestamp}` };
        }
        if (!FieldMath.sameBits(expected[i].value, actual[i].value)) {
            return { index: i, reason: `value ${actual[i].value} differs in bits from ${expected[i].value}` };
        }
    }
    if (expected.length !== actual.length) {
        return { index: n, reason: `length ${actual.length} !== ${expected.length}` };
    }
    return null;
}

export function verifyRoundTrip(series: Series, thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): RoundTripResult {
    const block = encodeBlock(series, thresholds);
    const mismatch = compareSeries(series, decodeBlock(block, block.pointCount));
    return mismatch === null ? { ok: true, block } : { ok: false, block, ...mismatch };
}

export function assertRoundTrip(series: Series, thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): Block {
    const result = verifyRoundTrip(series, thresholds);
    if (!result.ok) {
        throw new RoundTripMismatchError(`Round-trip mismatch at point ${result.index}: ${result.reason}`, result.index);
    }
    return result.block;
}

export interface BlockStats {
    point_count: number;
    raw_bytes: number;
    timestamp_bytes: number;
    value_bytes: number;
    encoded_bytes: number;
    ratio: number;
    bytes_per_point: number;
}

/** Sizes against the uncompressed 16 bytes per sample. */
export function blockStats(block: Block): BlockStats {
    const raw = block.pointCount * RAW_BYTES_PER_POINT;
    const encoded = block.timestamps.bytes.length + block.values.bytes.length;
    return {
        point_count: block.pointCount,
        raw_bytes: raw,
        timestamp_bytes: block.timestamps.bytes.length,
        value_bytes: block.values.bytes.length,
        encoded_bytes: encoded,
        ratio: raw / (encoded || 1),
        bytes_per_point: block.pointCount > 0 ? encoded / block.pointCount : 0,
    };
}

type ResolvedOptions = Required<Omit<CodecOptions, 'thresholds' | 'preset'>> & { thresholds: Readonly<DetectorThresholds> };

/**
 * Configured entry point. Holds only its options; every call is independent.
 */
export class BlockCodec {
    protected readonly options: ResolvedOptions;

    constructor(options: CodecOptions = {}) {
        this.options = {
            runId: options.runId ?? `run_${Date.now()}_${Math.random().toString(36).slice(2, 7)}`,
            logger: options.logger ?? null,
            verify: options.verify ?? false,
            outerCodec: options.outerCodec ?? 'zstd',
            compressionLevel: options.compressionLevel ?? 3,
            maxPoints: options.maxPoints ?? DEFAULT_MAX_POINTS,
            thresholds: resolveThresholds(options),
        };
    }

    get thresholds(): Readonly<DetectorThresholds> {
        return this.options.thresholds;
    }

    encode(series: Series): Block {
        const { timestamps, values } = splitColumns(series);
        return this.encodeColumns(timestamps, values);
    }

    encodeColumns(timestamps: readonly bigint[], values: readonly number[]): Block {
        if (timestamps.length !== values.length) {
            throw new RangeError(`Column length mismatch: ${timestamps.length} timestamps, ${values.length} values`);
        }
        const encoding = encodeValues(values, this.options.thresholds);
        const block = assembleBlock(timestamps, encoding);
        this.logSelection(block, encoding);

        if (this.options.verify) {
            const decoded = decodeColumns(block, block.pointCount);
            const mismatch = compareSeries(
                zipColumns({ timestamps: [...timestamps], values: [...values] }),
                zipColumns(decoded)
            );
            if (mismatch !== null) {
                const message = `[${this.options.runId}] round-trip mismatch at point ${mismatch.index}: ${mismatch.reason}`;
                this.log('error', message);
                throw new RoundTripMismatchError(message, mismatch.index);
            }
        }
        return block;
    }

    decode(block: Block): Sample[] {
        return decodeBlock(block, this.options.maxPoints);
    }

    decodeColumns(block: Block): SeriesColumns {
        return decodeColumns(block, this.options.maxPoints);
    }

    verify(series: Series): RoundTripResult {
        return verifyRoundTrip(series, this.options.thresholds);
    }

    /** Each series is encoded on its own; keys keep their insertion order. */
    encodeSeriesSet(set: ReadonlyMap<string, Series>): Map<string, Block> {
        const blocks = new Map<string, Block>();
        for (const [key, series] of set) blocks.set(key, this.encode(series));
        return blocks;
    }

    decodeSeriesSet(blocks: ReadonlyMap<string, Block>): Map<string, Sample[]> {
        const set = new Map<string, Sample[]>();
        for (const [key, block] of blocks) set.set(key, this.decode(block));
        return set;
    }

    /** Encodes, frames and applies the configured outer codec. */
    async pack(series: Series): Promise<Uint8Array> {
        return packBlock(this.encode(series), this.options.outerCodec, this.options.compressionLevel);
    }

    async unpack(data: Uint8Array, maxRawBytes?: number): Promise<Sample[]> {
        return this.decode(await unpackBlock(data, maxRawBytes, this.options.maxPoints));
    }

    private logSelection(block: Block, encoding: ValueEncoding): void {
        const candidates = encoding.candidates.length > 0
            ? ` candidates=${encoding.candidates.map(c => `${ValueMethod[c.method]}:${c.bytes.length}B`).join(',')}`
            : '';
        this.log('debug',
            `[${this.options.runId}] block n=${block.pointCount} pattern=${describeDetection(encoding.detection)}` +
            ` values=${ValueMethod[block.values.method]}(${block.values.bytes.length}B)${candidates}` +
            ` timestamps=${TimestampMethod[block.timestamps.method]}(${block.timestamps.bytes.length}B)`
        );
    }

    protected log(level: keyof CodecLogger, message: string): void {
        this.options.logger?.[level]?.(message);
    }
}
