import type { TimestampMethod, ValueMethod } from './format.js';

export interface Sample {
    readonly timestamp: bigint;
    readonly value: number;
}

/** Ordered samples. Callers supply ascending timestamps; the codec does not check. */
export type Series = readonly Sample[];

export interface EncodedPayload<M extends number> {
    readonly method: M;
    readonly bytes: Uint8Array;
}

export type TimestampPayload = EncodedPayload<TimestampMethod>;
export type ValuePayload = EncodedPayload<ValueMethod>;

export interface Block {
    readonly pointCount: number;
    readonly timestamps: TimestampPayload;
    readonly values: ValuePayload;
}

export type CodecLogger = {
    debug?: (msg: string) => void;
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export interface DetectorThresholds {
    /** `max - min` below this is NEAR_CONSTANT. */
    nearConstantRange: number;
    /** Exact-zero fraction above this is SPARSE. */
    sparseZeroRatio: number;
    /** The SPARSE strategy applies only when the non-zero fraction is below this. */
    sparseNonZeroRatio: number;
    powerOfTwoRatio: number;
    integerRatio: number;
    periodCandidates: readonly number[];
    /** Absolute tolerance for an exact periodic match. */
    periodicTolerance: number;
    /**
     * Mean absolute lag-period difference, relative to the value range, that
     * still counts as periodic. `null` disables the approximate check.
     */
    periodicRelativeDiff: number | null;
    /** The approximate periodic check needs at least this many values. */
    periodicMinLength: number;
    linearVariance: number;
    quantizedMaxUnique: number;
    quantizedUniqueDivisor: number;
    quantizedMaxSteps: number;
    smoothVariance: number;
    /** DELTA switches to its zero-run layout above this zero-delta fraction. */
    deltaZeroRunRatio: number;
}

/**
 * Threshold presets. The two variants of the detector disagree on a few
 * cutoffs; `standard` is the default.
 *
 * - `standard`: strict sparse cutoff, exact periodic matching only
 * - `enhanced`: looser sparse cutoff, approximate periodic matching
 */
export type DetectorPreset = 'standard' | 'enhanced';

const BASE_THRESHOLDS: DetectorThresholds = {
    nearConstantRange: 1e-6,
    sparseZeroRatio: 0.5,
    sparseNonZeroRatio: 0.3,
    powerOfTwoRatio: 0.7,
    integerRatio: 0.8,
    periodCandidates: [2, 3, 4, 5, 6, 8, 12, 24, 60, 300],
    periodicTolerance: 1e-10,
    periodicRelativeDiff: null,
    periodicMinLength: 20,
    linearVariance: 1e-10,
    quantizedMaxUnique: 50,
    quantizedUniqueDivisor: 5,
    quantizedMaxSteps: 3,
    smoothVariance: 100,
    deltaZeroRunRatio: 0.7,
};

export const DETECTOR_PRESETS: Record<DetectorPreset, Readonly<DetectorThresholds>> = {
    standard: Object.freeze({ ...BASE_THRESHOLDS }),
    enhanced: Object.freeze({ ...BASE_THRESHOLDS, sparseZeroRatio: 0.3, periodicRelativeDiff: 0.1 }),
};

export type OuterCodecName = 'none' | 'zstd';

export type CodecOptions = {
    /** Threshold preset (default `standard`). */
    preset?: DetectorPreset;
    /** Individual threshold overrides, applied on top of the preset. */
    thresholds?: Partial<DetectorThresholds>;
    /** Optional logger hook for codec selection messages; nothing in src/ writes to the console. */
    logger?: CodecLogger | null;
    /** Decode every block right after encoding it and throw RoundTripMismatchError on any difference. */
    verify?: boolean;
    /** Outer codec applied by `pack` (default `zstd`). */
    outerCodec?: OuterCodecName;
    /** Zstd compression level (1-22) for `pack`. Default: 3. */
    compressionLevel?: number;
    /** Largest point count `decode` and `unpack` expand. Default: 4 Mi points (64 MiB raw). */
    maxPoints?: number;
    /** Stable identifier prefixed to log lines (useful for tests). */
    runId?: string;
};

export function resolveThresholds(options: Pick<CodecOptions, 'preset' | 'thresholds'> = {}): Readonly<DetectorThresholds> {
    const preset = DETECTOR_PRESETS[options.preset ?? 'standard'];
    if (!options.thresholds) return preset;
    return Object.freeze({ ...preset, ...options.thresholds });
}
