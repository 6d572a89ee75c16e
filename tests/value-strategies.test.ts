import { CorruptPayloadError, UnknownMethodTagError } from '../src/codec/errors.js';
import { ValueMethod } from '../src/codec/format.js';
import { indexWidth } from '../src/codec/strategies/quantized.js';
import type { EncodeContext } from '../src/codec/strategies/strategy.js';
import { DETECTOR_PRESETS } from '../src/codec/types.js';
import { VALUE_CODECS, decodeValues, encodeValues, encodeWith, getValueCodec } from '../src/codec/value-codec.js';
import { Pattern } from '../src/codec/pattern-detector.js';
import { expectSameBits, repeat, seededFloats } from './helpers/test-utils.js';

const context: EncodeContext = { thresholds: DETECTOR_PRESETS.standard };

const DATASETS: Record<string, number[]> = {
    empty: [],
    single: [3.25],
    constant: [50, 50, 50, 50, 50],
    nearConstant: [1, 1 + 1e-9, 1 + 2e-9, 1],
    sparse: [0, 0, 0, 5.5, 0, 0, -0, 0, 0, 1e-300],
    powers: [1, 2, 4, 8, 0.5, 3, 2 ** 1023, 1024],
    integers: [3, 7, -10, 15, 22.5, 31, 2 ** 53, -(2 ** 60), 61, 70],
    linear: [0.1, 0.2, 0.30000000000000004, 0.4, 0.5],
    periodic: repeat([1.1, 2.2, 3.3], 10),
    quantized: repeat([0.1, 0.35, 0.9], 7).reverse(),
    random: seededFloats(64, 11),
    special: [NaN, Infinity, -Infinity, -0, 0, Number.MIN_VALUE, -Number.MAX_VALUE, 1e-310],
};

describe('value strategies', () => {
    for (const codec of Object.values(VALUE_CODECS)) {
        describe(codec.name, () => {
            for (const [name, values] of Object.entries(DATASETS)) {
                it(`round-trips ${name}`, () => {
                    const ctx: EncodeContext = { ...context, period: 3 };
                    if (!codec.accepts(values, ctx)) {
                        expect(codec.method).toBe(ValueMethod.CONSTANT);
                        return;
                    }
                    expectSameBits(codec.decode(codec.encode(values, ctx), values.length), values);
                });
            }
        });
    }
});

describe('CONSTANT', () => {
    it('stores value and count in exactly 16 bytes', () => {
        for (const n of [3, 100, 100_000]) {
            const values = new Array<number>(n).fill(50);
            const { payload } = encodeValues(values);
            expect(payload.method).toBe(ValueMethod.CONSTANT);
            expect(payload.bytes.length).toBe(16);
            expect(decodeValues(payload, n)).toEqual(values);
        }
    });

    it('refuses input it cannot represent', () => {
        expect(VALUE_CODECS[ValueMethod.CONSTANT].accepts([1, 2], context)).toBe(false);
        expect(VALUE_CODECS[ValueMethod.CONSTANT].accepts([], context)).toBe(false);
        expect(() => VALUE_CODECS[ValueMethod.CONSTANT].encode([0, -0], context)).toThrow(RangeError);
    });

    it('rejects a stored count that disagrees with the block', () => {
        const { payload } = encodeValues([9, 9, 9]);
        expect(() => decodeValues(payload, 4)).toThrow(CorruptPayloadError);
    });
});

describe('NEAR_CONSTANT', () => {
    it('patches -0 where base + quantum * precision yields +0', () => {
        const values = [0, -0, 0, 0];
        const { payload } = encodeValues(values);
        expect(payload.method).toBe(ValueMethod.NEAR_CONSTANT);
        expectSameBits(decodeValues(payload, 4), values);
    });
});

describe('LINEAR', () => {
    it('needs no patches for an exact progression', () => {
        const values = [0.5, 1.0, 1.5, 2.0, 2.5];
        const { payload } = encodeValues(values);
        expect(payload.method).toBe(ValueMethod.LINEAR);
        // start(8) + delta(8) + count(1) + patch count(1)
        expect(payload.bytes.length).toBe(18);
        expectSameBits(decodeValues(payload, 5), values);
    });
});

describe('PERIODIC', () => {
    it('encodes with the detected period', () => {
        const values = repeat([1, 2, 3], 20);
        const { payload, detection } = encodeValues(values);
        expect(detection).toEqual({ pattern: Pattern.PERIODIC, period: 3 });
        expect(payload.method).toBe(ValueMethod.PERIODIC);
        expect(payload.bytes[0]).toBe(6); // zigzag(3)
        expectSameBits(decodeValues(payload, values.length), values);
    });

    it('rejects a zero period for a non-empty block', () => {
        const bytes = encodeWith(ValueMethod.PERIODIC, [], context).bytes;
        expect(Array.from(bytes)).toEqual([0, 0, 0, 0]);
        expect(() => decodeValues({ method: ValueMethod.PERIODIC, bytes }, 0)).not.toThrow();
        expect(() => decodeValues({ method: ValueMethod.PERIODIC, bytes: new Uint8Array([0, 2, 0, 0]) }, 1)).toThrow(CorruptPayloadError);
    });
});

describe('SPARSE', () => {
    it('is used only below the non-zero ratio', () => {
        expect(encodeValues([0, 0, 0, 5, 0, 0]).payload.method).toBe(ValueMethod.SPARSE);
        // SPARSE pattern with 2/6 non-zero falls through to the general path
        const general = encodeValues([0, 0, 0, 1.5, 2.5, 0]).payload.method;
        expect([ValueMethod.XOR, ValueMethod.DELTA]).toContain(general);
    });

    it('keeps -0 as a stored value', () => {
        const values = [0, -0, 0, 0, 0, 0, 0];
        const bytes = encodeWith(ValueMethod.SPARSE, values, context).bytes;
        // length, nnz=1, gap=1, f64
        expect(bytes.length).toBe(11);
        expectSameBits(decodeValues({ method: ValueMethod.SPARSE, bytes }, 7), values);
    });

    it('rejects an index past the end', () => {
        // length 2, nnz 1, gap 2
        const bytes = new Uint8Array([4, 2, 4, 0, 0, 0, 0, 0, 0, 0xF0, 0x3F]);
        expect(() => decodeValues({ method: ValueMethod.SPARSE, bytes }, 2)).toThrow(CorruptPayloadError);
    });
});

describe('QUANTIZED', () => {
    it('chooses the narrowest index width', () => {
        expect(indexWidth(1)).toBe(1);
        expect(indexWidth(256)).toBe(1);
        expect(indexWidth(257)).toBe(2);
        expect(indexWidth(65_536)).toBe(2);
        expect(indexWidth(65_537)).toBe(4);
    });

    it('round-trips a dictionary that needs two-byte indices', () => {
        const values = Array.from({ length: 600 }, (_, i) => (i % 300) / 8);
        const bytes = encodeWith(ValueMethod.QUANTIZED, values, context).bytes;
        // dict size varint(300) = 2 bytes, 300 entries, width byte
        expect(bytes[2 + 300 * 8]).toBe(2);
        expectSameBits(decodeValues({ method: ValueMethod.QUANTIZED, bytes }, 600), values);
    });

    it('rejects an index outside the dictionary', () => {
        const bytes = encodeWith(ValueMethod.QUANTIZED, [0.5, 0.5, 1.5], context).bytes;
        const corrupt = bytes.slice();
        corrupt[corrupt.length - 1] = 7;
        expect(() => decodeValues({ method: ValueMethod.QUANTIZED, bytes: corrupt }, 3)).toThrow(CorruptPayloadError);
    });
});

describe('POWER_OF_2', () => {
    it('stores non-powers as literals after a -1 sentinel', () => {
        const values = [1, 2, 0.5, 4];
        const bytes = encodeWith(ValueMethod.POWER_OF_2, values, context).bytes;
        // count, exponents 0, 1, -1, 2, one literal
        expect(Array.from(bytes.subarray(0, 5))).toEqual([8, 0, 2, 1, 4]);
        expect(bytes.length).toBe(13);
        expectSameBits(decodeValues({ method: ValueMethod.POWER_OF_2, bytes }, 4), values);
    });
});

describe('registry', () => {
    it('resolves every value tag and rejects unknown ones', () => {
        for (const method of [16, 17, 18, 19, 20, 21, 22, 23, 24, 25]) {
            expect(getValueCodec(method).method).toBe(method);
        }
        expect(() => getValueCodec(3)).toThrow(UnknownMethodTagError);
        expect(() => decodeValues({ method: 99, bytes: new Uint8Array(0) }, 0)).toThrow(UnknownMethodTagError);
    });

    it('is frozen', () => {
        expect(Object.isFrozen(VALUE_CODECS)).toBe(true);
    });
});
