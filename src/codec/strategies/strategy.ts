import type { ValueMethod } from '../format.js';
import type { DetectorThresholds } from '../types.js';

export interface EncodeContext {
    readonly thresholds: Readonly<DetectorThresholds>;
    /** Cycle length found by the detector; only PERIODIC reads it. */
    readonly period?: number;
}

export interface ValueCodec {
    readonly method: ValueMethod;
    readonly name: string;
    /**
     * Whether `encode` can represent `values`. Only CONSTANT is partial; every
     * other strategy takes any input and stays exact.
     */
    accepts(values: readonly number[], context: EncodeContext): boolean;
    encode(values: readonly number[], context: EncodeContext): Uint8Array;
    decode(data: Uint8Array, count: number): number[];
}
