import { UnknownMethodTagError } from './errors.js';
import { ValueMethod, isValueMethod } from './format.js';
import { Pattern, classifyPattern, type Detection } from './pattern-detector.js';
import { ConstantCodec } from './strategies/constant.js';
import { DeltaCodec } from './strategies/delta.js';
import { LinearCodec } from './strategies/linear.js';
import { MostlyIntegerCodec } from './strategies/mostly-integer.js';
import { NearConstantCodec } from './strategies/near-constant.js';
import { PeriodicCodec } from './strategies/periodic.js';
import { PowerOfTwoCodec } from './strategies/power-of-two.js';
import { QuantizedCodec } from './strategies/quantized.js';
import { SparseCodec, nonZeroRatio } from './strategies/sparse.js';
import type { EncodeContext, ValueCodec } from './strategies/strategy.js';
import { XorCodec } from './strategies/xor.js';
import { DETECTOR_PRESETS, type DetectorThresholds, type ValuePayload } from './types.js';

/**
 * Registry of value strategies, one per method tag. Built once and frozen;
 * a tag that is ever written must stay here for its blocks to be readable.
 */
export const VALUE_CODECS: Readonly<Record<ValueMethod, ValueCodec>> = Object.freeze({
    [ValueMethod.CONSTANT]: ConstantCodec,
    [ValueMethod.NEAR_CONSTANT]: NearConstantCodec,
    [ValueMethod.POWER_OF_2]: PowerOfTwoCodec,
    [ValueMethod.MOSTLY_INTEGER]: MostlyIntegerCodec,
    [ValueMethod.LINEAR]: LinearCodec,
    [ValueMethod.PERIODIC]: PeriodicCodec,
    [ValueMethod.QUANTIZED]: QuantizedCodec,
    [ValueMethod.SPARSE]: SparseCodec,
    [ValueMethod.XOR]: XorCodec,
    [ValueMethod.DELTA]: DeltaCodec,
});

/** Competitors of the general path, in tie-break order. */
export const GENERAL_PATH: readonly ValueMethod[] = [ValueMethod.XOR, ValueMethod.DELTA];

export function getValueCodec(tag: number): ValueCodec {
    if (!isValueMethod(tag)) throw new UnknownMethodTagError('value', tag);
    return VALUE_CODECS[tag];
}

/**
 * Smallest payload by byte length; the earliest candidate wins ties.
 */
export function selectSmaller<P extends { readonly bytes: Uint8Array }>(candidates: readonly P[]): P {
    if (candidates.length === 0) {
        throw new RangeError('selectSmaller needs at least one candidate');
    }
    let best = candidates[0];
    for (const candidate of candidates.slice(1)) {
        if (candidate.bytes.length < best.bytes.length) best = candidate;
    }
    return best;
}

/**
 * Strategy for a detection, or null when the general path decides.
 */
export function strategyFor(detection: Detection, values: readonly number[], thresholds: DetectorThresholds): ValueMethod | null {
    switch (detection.pattern) {
        case Pattern.CONSTANT:
            return ValueMethod.CONSTANT;
        case Pattern.NEAR_CONSTANT:
            return ValueMethod.NEAR_CONSTANT;
        case Pattern.POWER_OF_2:
            return ValueMethod.POWER_OF_2;
        case Pattern.MOSTLY_INTEGER:
            return ValueMethod.MOSTLY_INTEGER;
        case Pattern.LINEAR:
            return ValueMethod.LINEAR;
        case Pattern.PERIODIC:
            return ValueMethod.PERIODIC;
        case Pattern.QUANTIZED:
        case Pattern.QUANTIZED_STEPPED:
            return ValueMethod.QUANTIZED;
        case Pattern.SPARSE:
            return nonZeroRatio(values) < thresholds.sparseNonZeroRatio ? ValueMethod.SPARSE : null;
        case Pattern.SMOOTH:
        case Pattern.RANDOM:
            return null;
        default: {
            const unreachable: never = detection;
            return unreachable;
        }
    }
}

export interface ValueEncoding {
    payload: ValuePayload;
    detection: Detection;
    /** General-path attempts, empty when a pattern strategy encoded directly. */
    candidates: ValuePayload[];
}

export function encodeWith(method: ValueMethod, values: readonly number[], context: EncodeContext): ValuePayload {
    return { method, bytes: VALUE_CODECS[method].encode(values, context) };
}

/** Both competitors always run; the smaller payload wins. */
export function encodeGeneral(values: readonly number[], thresholds: DetectorThresholds = DETECTOR_PRESETS.standard): { chosen: ValuePayload, candidates: ValuePayload[] } {
    const context: EncodeContext = { thresholds };
    const candidates = GENERAL_PATH.map(method => encodeWith(method, values, context));
    return { chosen: selectSmaller(candidates), candidates };
}

export function encodeValues(
    values: readonly number[],
    thresholds: DetectorThresholds = DETECTOR_PRESETS.standard,
    detection: Detection = classifyPattern(values, thresholds)
): ValueEncoding {
    const method = strategyFor(detection, values, thresholds);
    if (method === null) {
        const { chosen, candidates } = encodeGeneral(values, thresholds);
        return { payload: chosen, detection, candidates };
    }

    const context: EncodeContext = {
        thresholds,
        period: detection.pattern === Pattern.PERIODIC ? detection.period : undefined,
    };
    return { payload: encodeWith(method, values, context), detection, candidates: [] };
}

export function decodeValues(payload: { method: number, bytes: Uint8Array }, count: number): number[] {
    return getValueCodec(payload.method).decode(payload.bytes, count);
}
