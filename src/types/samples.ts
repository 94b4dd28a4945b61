/**
 * Sample pair shapes shared by ingestion, the regression tester and reporting.
 */

/**
 * Constructor input for one executed A/B test run.
 */
export interface SamplePairInit {
  /** Baseline measurements */
  dataA: readonly number[];

  /** Candidate measurements */
  dataB: readonly number[];

  /** p-value computed by the benchmarking harness at log time */
  precomputedPValue: number;

  /** Difference of means (B - A) computed at log time */
  precomputedMeanDifference: number;

  /** CI run that produced the result; used to pick a run, not to order them */
  buildNumber: number;

  unit: string;
  metric: string;

  /** When set, the precomputed statistics are replaced by a fresh permutation test */
  resampleCount?: number;
}

/**
 * What the regression tester needs to know about a sample pair.
 */
export type StatisticSource = Pick<
  SamplePairInit,
  'dataA' | 'dataB' | 'precomputedPValue' | 'precomputedMeanDifference' | 'resampleCount'
>;

export interface RegressionStatistic {
  pValue: number;
  meanDifference: number;
}
