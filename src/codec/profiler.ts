/**
 * CodecProfiler: runs every value strategy over a sample and reports what
 * each one costs next to what the dispatcher would pick.
 *
 * The codec does not depend on this module.
 */

import { createHash } from 'node:crypto';
import { FieldMath } from './field-math.js';
import { ValueMethod } from './format.js';
import { Pattern, classifyPattern, describeDetection, type Detection } from './pattern-detector.js';
import type { EncodeContext } from './strategies/strategy.js';
import { resolveThresholds, type CodecOptions } from './types.js';
import { VALUE_CODECS, encodeValues } from './value-codec.js';

export interface StrategyTrial {
    method: ValueMethod;
    name: string;
    outputBytes: number;
    /** Raw f64 bytes over encoded bytes. */
    ratio: number;
    encodeMs: number;
}

export interface ProfileMeta {
    /** SHA-256 prefix over the bits of the first values (sample fingerprint) */
    sampleHash: string;
    sampleSize: number;
    /** ISO 8601 timestamp */
    date: string;
}

export interface ProfileResult {
    detection: Detection;
    /** Human-readable form of `detection`, e.g. `PERIODIC(3)` */
    pattern: string;
    /** Method `encodeValues` selects for this sample */
    chosen: ValueMethod;
    chosenBytes: number;
    /** Smallest trial; may differ from `chosen` */
    best: StrategyTrial;
    /** Every accepted strategy, smallest first, ties by method tag */
    trials: StrategyTrial[];
    meta: ProfileMeta;
}

const HASHED_VALUES = 200;

export class CodecProfiler {
    static profile(values: readonly number[], options: Pick<CodecOptions, 'preset' | 'thresholds'> = {}): ProfileResult {
        if (values.length === 0) {
            throw new RangeError('CodecProfiler: sample must not be empty');
        }

        const thresholds = resolveThresholds(options);
        const detection = classifyPattern(values, thresholds);
        const context: EncodeContext = {
            thresholds,
            period: detection.pattern === Pattern.PERIODIC ? detection.period : undefined,
        };
        const rawBytes = values.length * 8;

        const trials: StrategyTrial[] = [];
        for (const codec of Object.values(VALUE_CODECS)) {
            if (!codec.accepts(values, context)) continue;

            const t0 = performance.now();
            const bytes = codec.encode(values, context);
            const encodeMs = performance.now() - t0;

            trials.push({
                method: codec.method,
                name: codec.name,
                outputBytes: bytes.length,
                ratio: rawBytes / (bytes.length || 1),
                encodeMs,
            });
        }
        trials.sort((a, b) => a.outputBytes - b.outputBytes || a.method - b.method);

        const { payload } = encodeValues(values, thresholds, detection);

        return {
            detection,
            pattern: describeDetection(detection),
            chosen: payload.method,
            chosenBytes: payload.bytes.length,
            best: trials[0],
            trials,
            meta: {
                sampleHash: CodecProfiler.computeSampleHash(values),
                sampleSize: values.length,
                date: new Date().toISOString(),
            },
        };
    }

    private static computeSampleHash(values: readonly number[]): string {
        const hash = createHash('sha256');
        for (const v of values.slice(0, HASHED_VALUES)) {
            hash.update(FieldMath.floatToBits(v).toString(16));
            hash.update(',');
        }
        return hash.digest('hex').slice(0, 16);
    }
}
