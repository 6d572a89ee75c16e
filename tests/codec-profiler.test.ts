import { ValueMethod } from '../src/codec/format.js';
import { CodecProfiler } from '../src/codec/profiler.js';
import { Pattern } from '../src/codec/pattern-detector.js';
import { repeat } from './helpers/test-utils.js';

describe('CodecProfiler', () => {
    it('reports every accepted strategy, smallest first', () => {
        const result = CodecProfiler.profile(new Array<number>(10).fill(50));

        expect(result.detection).toEqual({ pattern: Pattern.CONSTANT });
        expect(result.chosen).toBe(ValueMethod.CONSTANT);
        expect(result.chosenBytes).toBe(16);

        expect(result.trials).toHaveLength(10);
        expect(result.trials.slice(0, 3).map(t => [t.name, t.outputBytes])).toEqual([
            ['XOR', 10],
            ['MOSTLY_INTEGER', 13],
            ['DELTA', 13],
        ]);
        expect(result.best).toBe(result.trials[0]);
        expect(result.best.ratio).toBe(8);

        const sizes = result.trials.map(t => t.outputBytes);
        expect(sizes).toEqual([...sizes].sort((a, b) => a - b));
    });

    it('skips strategies that cannot represent the sample', () => {
        const result = CodecProfiler.profile([1.5, 2.5, 4.5]);
        expect(result.trials.map(t => t.method)).not.toContain(ValueMethod.CONSTANT);
        expect(result.trials).toHaveLength(9);
    });

    it('profiles PERIODIC with the detected period', () => {
        const result = CodecProfiler.profile(repeat([1, 2, 3], 20));
        expect(result.pattern).toBe('PERIODIC(3)');
        expect(result.chosen).toBe(ValueMethod.PERIODIC);
    });

    it('fingerprints the sample deterministically', () => {
        const a = CodecProfiler.profile([1, 2, 3, 5]);
        const b = CodecProfiler.profile([1, 2, 3, 5]);
        const c = CodecProfiler.profile([1, 2, 3, 6]);
        expect(a.meta.sampleHash).toMatch(/^[0-9a-f]{16}$/);
        expect(a.meta.sampleHash).toBe(b.meta.sampleHash);
        expect(a.meta.sampleHash).not.toBe(c.meta.sampleHash);
        expect(a.meta.sampleSize).toBe(4);
        expect(Number.isNaN(Date.parse(a.meta.date))).toBe(false);
    });

    it('honours the preset', () => {
        const values = repeat([10, 20, 30], 8);
        values[12] = 10.01;
        expect(CodecProfiler.profile(values).pattern).toBe(Pattern.MOSTLY_INTEGER);
        expect(CodecProfiler.profile(values, { preset: 'enhanced' }).pattern).toBe('PERIODIC(3)');
    });

    it('rejects an empty sample', () => {
        expect(() => CodecProfiler.profile([])).toThrow(RangeError);
    });
});
