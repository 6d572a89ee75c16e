import { Pattern, calculateSeriesMetrics, classifyPattern, describeDetection, detectPeriod } from '../src/codec/pattern-detector.js';
import { DETECTOR_PRESETS, resolveThresholds } from '../src/codec/types.js';
import { repeat, seededFloats } from './helpers/test-utils.js';

const enhanced = DETECTOR_PRESETS.enhanced;

// Index sequence with no period among the candidates that fit in 30 values
const SCRAMBLE = [0, 3, 1, 4, 2, 2, 0, 4, 1, 3, 3, 0, 2, 4, 1, 1, 4, 0, 3, 2, 4, 4, 1, 0, 2, 3, 1, 2, 0, 3];

describe('classifyPattern', () => {
    it('treats series shorter than three as SPARSE', () => {
        expect(classifyPattern([]).pattern).toBe(Pattern.SPARSE);
        expect(classifyPattern([1.5]).pattern).toBe(Pattern.SPARSE);
        expect(classifyPattern([1.5, 2.5]).pattern).toBe(Pattern.SPARSE);
    });

    it('detects bit-identical runs as CONSTANT', () => {
        expect(classifyPattern([7, 7, 7, 7]).pattern).toBe(Pattern.CONSTANT);
        expect(classifyPattern([NaN, NaN, NaN]).pattern).toBe(Pattern.CONSTANT);
    });

    it('does not treat 0 and -0 as CONSTANT', () => {
        expect(classifyPattern([0, -0, 0, 0]).pattern).toBe(Pattern.NEAR_CONSTANT);
    });

    it('detects NEAR_CONSTANT below a 1e-6 range', () => {
        expect(classifyPattern([1, 1 + 1e-9, 1 + 2e-9, 1]).pattern).toBe(Pattern.NEAR_CONSTANT);
    });

    it('detects SPARSE above the zero ratio', () => {
        expect(classifyPattern([0, 0, 0, 5, 0, 0]).pattern).toBe(Pattern.SPARSE);
    });

    it('detects a repeated [1, 2, 3] as PERIODIC(3)', () => {
        const detection = classifyPattern(repeat([1, 2, 3], 20));
        expect(detection).toEqual({ pattern: Pattern.PERIODIC, period: 3 });
        expect(describeDetection(detection)).toBe('PERIODIC(3)');
    });

    it('detects POWER_OF_2', () => {
        expect(classifyPattern([1, 2, 4, 8, 16, 1024, 32, 64]).pattern).toBe(Pattern.POWER_OF_2);
    });

    it('detects MOSTLY_INTEGER', () => {
        expect(classifyPattern([3, 7, 10, 15, 22, 31, 40, 55, 61, 70]).pattern).toBe(Pattern.MOSTLY_INTEGER);
    });

    it('detects LINEAR', () => {
        expect(classifyPattern([0.5, 1.0, 1.5, 2.0, 2.5]).pattern).toBe(Pattern.LINEAR);
    });

    it('detects QUANTIZED and QUANTIZED_STEPPED', () => {
        const levels = [0.1, 0.35, 0.9, 1.7, 3.3];
        expect(classifyPattern(SCRAMBLE.map(i => levels[i])).pattern).toBe(Pattern.QUANTIZED);

        const steps = [0.5, 1.5, 2.5];
        expect(classifyPattern(SCRAMBLE.map(i => steps[i % 3])).pattern).toBe(Pattern.QUANTIZED_STEPPED);
    });

    it('separates SMOOTH from RANDOM by variance from the first value', () => {
        const smooth = [10.1, 10.35, 10.2, 10.6, 10.45, 10.3, 10.55, 10.15, 10.4, 10.25];
        expect(classifyPattern(smooth).pattern).toBe(Pattern.SMOOTH);

        const random = [0.5, 120.25, -75.125, 300.5, 12.75, -210.5, 99.125, 450.25, -33.5, 180.75];
        expect(classifyPattern(random).pattern).toBe(Pattern.RANDOM);
        expect(classifyPattern(seededFloats(200, 7)).pattern).toBe(Pattern.RANDOM);
    });

    it('falls through to RANDOM when NaN poisons every metric', () => {
        const values = [NaN, Infinity, -Infinity, -0, 0, Number.MIN_VALUE, Number.MAX_VALUE];
        expect(classifyPattern(values).pattern).toBe(Pattern.RANDOM);
    });
});

describe('detector presets', () => {
    it('uses a looser sparse cutoff in the enhanced preset', () => {
        const values = [0, 0, 1, 2, 3, 4, 5, 0, 0, 6];
        expect(classifyPattern(values).pattern).toBe(Pattern.MOSTLY_INTEGER);
        expect(classifyPattern(values, enhanced).pattern).toBe(Pattern.SPARSE);
    });

    it('matches noisy cycles approximately only in the enhanced preset', () => {
        const values = repeat([10, 20, 30], 8);
        values[12] = 10.01;
        expect(classifyPattern(values).pattern).toBe(Pattern.MOSTLY_INTEGER);
        expect(classifyPattern(values, enhanced)).toEqual({ pattern: Pattern.PERIODIC, period: 3 });
    });

    it('lets explicit thresholds override the preset', () => {
        const thresholds = resolveThresholds({ preset: 'enhanced', thresholds: { sparseZeroRatio: 0.9 } });
        expect(thresholds.sparseZeroRatio).toBe(0.9);
        expect(thresholds.periodicRelativeDiff).toBe(0.1);
        expect(resolveThresholds()).toBe(DETECTOR_PRESETS.standard);
    });
});

describe('detectPeriod', () => {
    it('requires three full cycles', () => {
        const values = repeat([1, 2, 3, 4], 2);
        expect(detectPeriod(values, DETECTOR_PRESETS.standard, 3)).toBeNull();
        expect(detectPeriod(repeat([1, 2, 3, 4], 3), DETECTOR_PRESETS.standard, 3)).toBe(4);
    });

    it('returns the first matching candidate', () => {
        // period 2 also repeats every 4 and 6
        expect(detectPeriod(repeat([5, 9], 12), DETECTOR_PRESETS.standard, 4)).toBe(2);
    });
});

describe('calculateSeriesMetrics', () => {
    it('computes ratios and spreads', () => {
        const m = calculateSeriesMetrics([0, 1, 2, 4, 0.5]);
        expect(m.length).toBe(5);
        expect(m.range).toBe(4);
        expect(m.all_bit_equal).toBe(false);
        expect(m.zero_ratio).toBe(0.2);
        expect(m.power_of_two_ratio).toBe(0.6);
        expect(m.integer_ratio).toBe(0.8);
        expect(m.unique_count).toBe(5);
    });

    it('counts 0 and -0 as distinct values', () => {
        expect(calculateSeriesMetrics([0, -0, 0]).unique_count).toBe(2);
    });

    it('reports a NaN range when any value is NaN', () => {
        expect(calculateSeriesMetrics([1, NaN, 3]).range).toBeNaN();
    });
});
