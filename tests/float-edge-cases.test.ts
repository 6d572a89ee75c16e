import { decodeBlock, encodeBlock } from '../src/codec/block.js';
import { ValueMethod } from '../src/codec/format.js';
import { SeriesCodec } from '../src/index.js';
import { expectSameSeries, makeSeries } from './helpers/test-utils.js';

describe('float edge-cases', () => {
    it('round-trips special IEEE-754 values (NaN, ±Infinity, -0)', () => {
        const series = makeSeries([NaN, Infinity, -Infinity, -0, 0, NaN, -0]);
        expectSameSeries(decodeBlock(encodeBlock(series)), series);
    });

    it('round-trips extreme finite floats (MAX_VALUE, MIN_VALUE/subnormal)', () => {
        const series = makeSeries([
            Number.MAX_VALUE, -Number.MAX_VALUE, Number.MIN_VALUE, -Number.MIN_VALUE, 1e-308, 2.2250738585072014e-308,
        ]);
        expectSameSeries(decodeBlock(encodeBlock(series)), series);
    });

    it('round-trips values beyond the safe-integer range', () => {
        const series = makeSeries([2 ** 53, 2 ** 53 + 2, 2 ** 60, -(2 ** 62), 9007199254740991, 1e21]);
        expectSameSeries(decodeBlock(encodeBlock(series)), series);
    });

    it('keeps a run of -0 bit-exact through CONSTANT', () => {
        const series = makeSeries([-0, -0, -0, -0]);
        const block = encodeBlock(series);
        expect(block.values.method).toBe(ValueMethod.CONSTANT);
        expect(Object.is(decodeBlock(block)[2].value, -0)).toBe(true);
    });

    it('keeps a NaN hidden in an integer column', () => {
        const series = makeSeries([1, 3, 5, 7, 9, 11, 13, 15, 17, 19, NaN]);
        const block = encodeBlock(series);
        expect(block.values.method).toBe(ValueMethod.MOSTLY_INTEGER);
        expectSameSeries(decodeBlock(block), series);
    });

    it('reproduces linear values whose float steps drift', () => {
        const values = Array.from({ length: 30 }, (_, i) => 0.1 * i);
        const series = makeSeries(values);
        const block = encodeBlock(series);
        expect(block.values.method).toBe(ValueMethod.LINEAR);
        expectSameSeries(decodeBlock(block), series);
    });

    it('verifies through the public namespace', () => {
        const series = makeSeries([0.1, 0.2, 0.3, NaN, -0]);
        expect(() => SeriesCodec.verify(series)).not.toThrow();
        expectSameSeries(SeriesCodec.decode(SeriesCodec.encode(series)), series);
    });
});
