const F64 = new Float64Array(1);
const U64 = new BigUint64Array(F64.buffer);

const SAFE_INTEGER_LIMIT = 2 ** 53;

export interface DoubleDeltaParts {
    initial: bigint;
    firstDelta: bigint;
    doubleDeltas: bigint[];
}

export class FieldMath {
    /**
     * Split timestamps into initial value, first delta and delta-of-deltas.
     * Requires at least two timestamps.
     */
    static computeDoubleDeltas(timestamps: readonly bigint[]): DoubleDeltaParts {
        const initial = timestamps[0];
        const firstDelta = timestamps[1] - timestamps[0];
        const doubleDeltas: bigint[] = [];

        let prevDelta = firstDelta;
        for (let i = 2; i < timestamps.length; i++) {
            const currentDelta = timestamps[i] - timestamps[i - 1];
            doubleDeltas.push(currentDelta - prevDelta);
            prevDelta = currentDelta;
        }

        return { initial, firstDelta, doubleDeltas };
    }

    /**
     * Walk forward from the initial timestamp: each double-delta adjusts the
     * running delta, each timestamp is the previous plus that delta.
     */
    static decodeDoubleDeltas(initial: bigint, firstDelta: bigint, doubleDeltas: readonly bigint[]): bigint[] {
        const timestamps: bigint[] = [initial, initial + firstDelta];
        let prev = initial + firstDelta;
        let delta = firstDelta;

        for (const dd of doubleDeltas) {
            delta += dd;
            prev += delta;
            timestamps.push(prev);
        }

        return timestamps;
    }

    static floatToBits(value: number): bigint {
        F64[0] = value;
        return U64[0];
    }

    static bitsToFloat(bits: bigint): number {
        U64[0] = BigInt.asUintN(64, bits);
        return F64[0];
    }

    /** IEEE-754 bit equality: distinguishes 0 from -0 and compares NaN payloads. */
    static sameBits(a: number, b: number): boolean {
        if (a === b) return a !== 0 || Object.is(a, b);
        if (a !== a && b !== b) return FieldMath.floatToBits(a) === FieldMath.floatToBits(b);
        return false;
    }

    /**
     * Exponent `k >= 0` when `value` is exactly `2^k`, otherwise null.
     * Reads the bits directly; `Math.log2` rounds.
     */
    static powerOfTwoExponent(value: number): number | null {
        if (!(value >= 1) || value === Infinity) return null;
        const bits = FieldMath.floatToBits(value);
        const mantissa = bits & 0xF_FFFF_FFFF_FFFFn;
        if (mantissa !== 0n) return null;
        return Number(bits >> 52n) - 1023;
    }

    /** Integer-valued and representable as a safe integer, excluding -0. */
    static isSafeIntegerValue(value: number): boolean {
        return Number.isInteger(value) && Math.abs(value) < SAFE_INTEGER_LIMIT && !Object.is(value, -0);
    }

    static countLeadingZeros64(value: bigint): number {
        const high = Number((value >> 32n) & 0xFFFF_FFFFn);
        if (high !== 0) return Math.clz32(high);
        return 32 + Math.clz32(Number(value & 0xFFFF_FFFFn));
    }

    static countTrailingZeros64(value: bigint): number {
        if (value === 0n) return 64;
        const low = Number(value & 0xFFFF_FFFFn);
        if (low !== 0) return 31 - Math.clz32(low & -low);
        const high = Number((value >> 32n) & 0xFFFF_FFFFn);
        return 32 + (31 - Math.clz32(high & -high));
    }
}
