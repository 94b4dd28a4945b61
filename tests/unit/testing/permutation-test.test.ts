import { describe, it, expect } from 'vitest';
import { RegressionTester } from '../../../src/testing/permutation-test.js';
import { InsufficientSampleError, InvalidResampleCountError } from '../../../src/api/errors.js';

describe('RegressionTester.permutationTest', () => {
  it('enumerates every relabeling when that is cheaper than resampling', () => {
    const tester = new RegressionTester({ seed: 1 });

    const result = tester.permutationTest([1, 2, 3], [4, 5, 6], 20);

    expect(result.method).toBe('exact');
    expect(result.permutations).toBe(20);
    // Only {1,2,3} and {4,5,6} as sample A reach |difference| = 3
    expect(result.extremeCount).toBe(2);
    expect(result.pValue).toBeCloseTo(0.1, 12);
    expect(result.meanDifference).toBe(3);
  });

  it('reports p = 1 for identical samples', () => {
    const tester = new RegressionTester({ seed: 1 });

    const result = tester.permutationTest([1, 2, 3], [1, 2, 3], 100);

    expect(result.method).toBe('exact');
    expect(result.pValue).toBe(1);
    expect(result.meanDifference).toBe(0);
  });

  it('does not depend on the scale of the measurements', () => {
    const tester = new RegressionTester({ seed: 1 });

    const result = tester.permutationTest([1e-10, 2e-10, 3e-10], [4e-10, 5e-10, 6e-10], 20);

    expect(result.method).toBe('exact');
    expect(result.extremeCount).toBe(2);
    expect(result.pValue).toBeCloseTo(0.1, 12);
  });

  it('handles single-measurement samples', () => {
    const tester = new RegressionTester({ seed: 1 });

    const result = tester.permutationTest([5], [5], 10);

    expect(result.permutations).toBe(2);
    expect(result.pValue).toBe(1);
  });

  it('is symmetric in the sign of the difference', () => {
    const tester = new RegressionTester({ seed: 1 });

    const up = tester.permutationTest([1, 2, 3], [4, 5, 6], 1000);
    const down = tester.permutationTest([4, 5, 6], [1, 2, 3], 1000);

    expect(down.meanDifference).toBe(-3);
    expect(down.pValue).toBe(up.pValue);
  });

  it('falls back to resampling when fewer resamples than relabelings are requested', () => {
    const tester = new RegressionTester({ seed: 1 });

    const result = tester.permutationTest([1, 2, 3], [4, 5, 6], 19);

    expect(result.method).toBe('monte-carlo');
    expect(result.permutations).toBe(19);
    expect(result.pValue).toBeGreaterThan(0);
    expect(result.pValue).toBeLessThanOrEqual(1);
  });

  it('falls back to resampling above the exact threshold', () => {
    const tester = new RegressionTester({ seed: 1, exactThreshold: 10 });

    const result = tester.permutationTest([1, 2, 3], [4, 5, 6], 100);

    expect(result.method).toBe('monte-carlo');
    expect(result.permutations).toBe(100);
  });

  it('never reports p = 0 from resampling', () => {
    const tester = new RegressionTester({ seed: 42 });
    const baseline = new Array<number>(50).fill(0);
    const candidate = new Array<number>(50).fill(100);

    const result = tester.permutationTest(baseline, candidate, 999);

    expect(result.method).toBe('monte-carlo');
    expect(result.meanDifference).toBe(100);
    expect(result.extremeCount).toBe(0);
    expect(result.pValue).toBe(1 / 1000);
  });

  it('is reproducible for a fixed seed', () => {
    const dataA = [1, 2, 3, 4, 5];
    const dataB = [3, 4, 5, 6, 7, 8];

    const first = new RegressionTester({ seed: 7 }).permutationTest(dataA, dataB, 50);
    const second = new RegressionTester({ seed: 7 }).permutationTest(dataA, dataB, 50);

    expect(first.method).toBe('monte-carlo');
    expect(second.extremeCount).toBe(first.extremeCount);
    expect(second.pValue).toBe(first.pValue);
  });

  it('rejects empty samples', () => {
    const tester = new RegressionTester();

    expect(() => tester.permutationTest([], [1], 10)).toThrow(InsufficientSampleError);
    expect(() => tester.permutationTest([1], [], 10)).toThrow('Sample B is empty');
  });

  it('rejects resample counts that are not positive integers', () => {
    const tester = new RegressionTester();

    expect(() => tester.permutationTest([1], [2], 0)).toThrow(InvalidResampleCountError);
    expect(() => tester.permutationTest([1], [2], -5)).toThrow(InvalidResampleCountError);
    expect(() => tester.permutationTest([1], [2], 1.5)).toThrow(
      'Resample count must be a positive integer (got 1.5)'
    );
  });
});

describe('RegressionTester.statistic', () => {
  it('returns the logged statistic when no resample count is set', () => {
    const tester = new RegressionTester();

    const statistic = tester.statistic({
      dataA: [1, 2, 3],
      dataB: [4, 5, 6],
      precomputedPValue: 0.42,
      precomputedMeanDifference: 2.5,
    });

    expect(statistic).toEqual({ pValue: 0.42, meanDifference: 2.5 });
  });

  it('recomputes the statistic when a resample count is set', () => {
    const tester = new RegressionTester({ seed: 3 });

    const statistic = tester.statistic({
      dataA: [1, 2, 3],
      dataB: [4, 5, 6],
      precomputedPValue: 0.42,
      precomputedMeanDifference: 2.5,
      resampleCount: 100,
    });

    expect(statistic.meanDifference).toBe(3);
    expect(statistic.pValue).toBeCloseTo(0.1, 12);
  });

  it('rejects empty samples even with a logged statistic', () => {
    const tester = new RegressionTester();

    expect(() =>
      tester.statistic({ dataA: [], dataB: [1], precomputedPValue: 0.5, precomputedMeanDifference: 0 })
    ).toThrow(InsufficientSampleError);
  });
});
