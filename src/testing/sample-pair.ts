/**
 * Sample Pair
 *
 * One executed A/B test run: the baseline and candidate measurements plus
 * what the harness logged about them. The statistic is computed on first
 * read and then kept for the lifetime of the object.
 */

import type { RegressionStatistic, SamplePairInit } from '../types/samples.js';
import { safeAverage } from '../utils/math-helpers.js';
import { RegressionTester } from './permutation-test.js';

const sharedTester = new RegressionTester();

export class SamplePair {
  readonly dataA: readonly number[];
  readonly dataB: readonly number[];
  readonly precomputedPValue: number;
  readonly precomputedMeanDifference: number;
  readonly buildNumber: number;
  readonly unit: string;
  readonly metric: string;
  readonly resampleCount?: number;

  private readonly tester: RegressionTester;
  private computed?: RegressionStatistic;

  constructor(init: SamplePairInit, tester: RegressionTester = sharedTester) {
    this.dataA = init.dataA;
    this.dataB = init.dataB;
    this.precomputedPValue = init.precomputedPValue;
    this.precomputedMeanDifference = init.precomputedMeanDifference;
    this.buildNumber = init.buildNumber;
    this.unit = init.unit;
    this.metric = init.metric;
    this.resampleCount = init.resampleCount;
    this.tester = tester;
  }

  /**
   * Compute the statistic if it has not been computed yet.
   *
   * A throwing tester leaves the pair uncomputed, so a later call retries.
   */
  ensureStatistic(): RegressionStatistic {
    if (this.computed === undefined) {
      this.computed = this.tester.statistic(this);
    }
    return this.computed;
  }

  get isComputed(): boolean {
    return this.computed !== undefined;
  }

  get pValue(): number {
    return this.ensureStatistic().pValue;
  }

  get meanDifference(): number {
    return this.ensureStatistic().meanDifference;
  }

  /**
   * Mean difference as a fraction of the baseline mean.
   */
  get relativeMeanDifference(): number {
    return this.meanDifference / safeAverage(this.dataA, NaN);
  }

  get meanA(): number {
    return safeAverage(this.dataA, NaN);
  }

  get meanB(): number {
    return safeAverage(this.dataB, NaN);
  }
}
