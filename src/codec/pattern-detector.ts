import { FieldMath } from './field-math.js';
import { DETECTOR_PRESETS, type DetectorThresholds } from './types.js';

export enum Pattern {
    SPARSE = 'SPARSE',
    CONSTANT = 'CONSTANT',
    NEAR_CONSTANT = 'NEAR_CONSTANT',
    POWER_OF_2 = 'POWER_OF_2',
    MOSTLY_INTEGER = 'MOSTLY_INTEGER',
    PERIODIC = 'PERIODIC',
    LINEAR = 'LINEAR',
    QUANTIZED = 'QUANTIZED',
    QUANTIZED_STEPPED = 'QUANTIZED_STEPPED',
    SMOOTH = 'SMOOTH',
    RANDOM = 'RANDOM',
}

export type Detection =
    | { pattern: Exclude<Pattern, Pattern.PERIODIC> }
    | { pattern: Pattern.PERIODIC; period: number };

export interface SeriesMetrics {
    length: number;
    /** NaN when any value is NaN. */
    range: number;
    all_bit_equal: boolean;
    zero_ratio: number;
    power_of_two_ratio: number;
    integer_ratio: number;
    unique_count: number;
    /** Variance of first differences. */
    diff_variance: number;
    /** Mean squared distance from the first value. */
    variance_from_first: number;
}

const EMPTY_METRICS: SeriesMetrics = {
    length: 0,
    range: 0,
    all_bit_equal: true,
    zero_ratio: 0,
    power_of_two_ratio: 0,
    integer_ratio: 0,
    unique_count: 0,
    diff_variance: 0,
    variance_from_first: 0,
};

function computeRange(values: readonly number[]): number {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        if (v !== v) return NaN;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    return max - min;
}

function computeDiffVariance(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const diffs: number[] = [];
    let sum = 0;
    for (let i = 1; i < values.length; i++) {
        const d = values[i] - values[i - 1];
        diffs.push(d);
        sum += d;
    }
    const mean = sum / diffs.length;
    let sq = 0;
    for (const d of diffs) sq += (d - mean) ** 2;
    return sq / diffs.length;
}

/**
 * Deterministic metric calculation over a value column.
 */
export function calculateSeriesMetrics(values: readonly number[]): SeriesMetrics {
    if (values.length === 0) return { ...EMPTY_METRICS };

    const n = values.length;
    const first = values[0];
    const uniqueBits = new Set<bigint>();
    let allBitEqual = true;
    let zeros = 0;
    let powers = 0;
    let integers = 0;
    let sqFromFirst = 0;

    for (const v of values) {
        uniqueBits.add(FieldMath.floatToBits(v));
        if (allBitEqual && !FieldMath.sameBits(v, first)) allBitEqual = false;
        if (v === 0) zeros++;
        if (FieldMath.powerOfTwoExponent(v) !== null) powers++;
        if (v === Math.trunc(v)) integers++;
        sqFromFirst += (v - first) ** 2;
    }

    return {
        length: n,
        range: computeRange(values),
        all_bit_equal: allBitEqual,
        zero_ratio: zeros / n,
        power_of_two_ratio: powers / n,
        integer_ratio: integers / n,
        unique_count: uniqueBits.size,
        diff_variance: computeDiffVariance(values),
        variance_from_first: sqFromFirst / n,
    };
}

function matchesPeriodExactly(values: readonly number[], period: number, tolerance: number): boolean {
    for (let i = period; i < values.length; i++) {
        if (!(Math.abs(values[i] - values[i % period]) <= tolerance)) return false;
    }
    return true;
}

function meanLagDifference(values: readonly number[], period: number): number {
    let sum = 0;
    for (let i = period; i < values.length; i++) {
        sum += Math.abs(values[i] - values[i - period]);
    }
    return sum / (values.length - period);
}

/**
 * First candidate period whose later windows repeat the first one.
 * Periods are bounded so at least three full cycles are present.
 */
export function detectPeriod(values: readonly number[], thresholds: DetectorThresholds, range: number): number | null {
    const relative = thresholds.periodicRelativeDiff;
    const approximate = relative !== null && values.length >= thresholds.periodicMinLength && range > 0;

    for (const period of thresholds.periodCandidates) {
        if (period * 3 > values.length) continue;
        if (matchesPeriodExactly(values, period, thresholds.periodicTolerance)) return period;
        if (approximate && meanLagDifference(values, period) / range < relative) return period;
    }
    return null;
}

function isStepped(values: readonly number[], maxSteps: number): boolean {
    const sorted = [...new Set(values)].sort((a, b) => a - b);
    if (sorted.length < 3) return false;
    const gaps = new Set<number>();
    for (let i = 1; i < sorted.length; i++) {
        gaps.add(sorted[i] - sorted[i - 1]);
    }
    return gaps.size <= maxSteps;
}

/**
 * Classify a value column. First match wins; the result only picks a value
 * strategy, every strategy round-trips whatever it is given.
 */
export function classifyPattern(values: readonly number[], thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): Detection {
    if (values.length < 3) return { pattern: Pattern.SPARSE };

    const m = calculateSeriesMetrics(values);

    if (m.all_bit_equal) return { pattern: Pattern.CONSTANT };
    if (m.range < thresholds.nearConstantRange) return { pattern: Pattern.NEAR_CONSTANT };
    if (m.zero_ratio > thresholds.sparseZeroRatio) return { pattern: Pattern.SPARSE };

    // Ahead of the power-of-two and integer checks: integer cycles are PERIODIC.
    const period = detectPeriod(values, thresholds, m.range);
    if (period !== null) return { pattern: Pattern.PERIODIC, period };

    if (m.power_of_two_ratio > thresholds.powerOfTwoRatio) return { pattern: Pattern.POWER_OF_2 };
    if (m.integer_ratio > thresholds.integerRatio) return { pattern: Pattern.MOSTLY_INTEGER };
    if (m.diff_variance < thresholds.linearVariance) return { pattern: Pattern.LINEAR };

    const uniqueLimit = Math.min(thresholds.quantizedMaxUnique, Math.floor(m.length / thresholds.quantizedUniqueDivisor));
    if (m.unique_count <= uniqueLimit) {
        return { pattern: isStepped(values, thresholds.quantizedMaxSteps) ? Pattern.QUANTIZED_STEPPED : Pattern.QUANTIZED };
    }

    if (m.variance_from_first < thresholds.smoothVariance) return { pattern: Pattern.SMOOTH };
    return { pattern: Pattern.RANDOM };
}

export function describeDetection(detection: Detection): string {
    return detection.pattern === Pattern.PERIODIC ? `PERIODIC(${detection.period})` : detection.pattern;
}
