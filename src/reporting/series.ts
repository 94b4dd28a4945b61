/**
 * Reporting projections
 *
 * Reduce retained sample pairs to the numeric series a renderer draws.
 * Nothing here computes statistics beyond reading what the sample pairs
 * already carry.
 */

import type { SamplePair } from '../testing/sample-pair.js';
import { safeAverage } from '../utils/math-helpers.js';
import { formatPercent, formatWithReducedUnit } from './format.js';

/** p-value below which a result counts as significant */
export const SIGNIFICANCE_P_VALUE = 0.01;

/**
 * Horizontal threshold of the volcano plot. Plotting 1/p on a log axis
 * shows -log(p), so p = 0.01 sits at y = 100.
 */
export const VOLCANO_THRESHOLD_Y = 1 / SIGNIFICANCE_P_VALUE;

export interface VolcanoPoint {
  /** Mean difference, relative to the baseline mean when normalising */
  x: number;
  /** 1 / p-value */
  y: number;
  buildNumber: number;
  metric: string;
}

export interface VolcanoSeries {
  points: VolcanoPoint[];
  relative: boolean;
  /** 'Percent' for relative series, otherwise the unit shared by the sample pairs */
  unit: string;
  thresholdY: number;
  /** Ascending p-values, as used by step-down multiple-comparison corrections */
  sortedPValues: number[];
  /** Ascending absolute mean differences */
  sortedAbsMeanDifferences: number[];
  /** Mean of |x| over all points (relative series only) */
  averageAbsRegression?: number;
  /** Mean of every individual measurement of every pair (absolute series only) */
  averageValue?: number;
  /** Set when the pairs do not share one unit */
  mixedUnits: boolean;
}

export type HistogramKind = 'p-value' | 'regression';

export interface HistogramSeries {
  kind: HistogramKind;
  values: number[];
  /** Vertical marker; the significance level for p-value histograms */
  thresholdX?: number;
}

export interface SingleRunSeries {
  buildNumber: number;
  metric: string;
  unit: string;
  dataA: readonly number[];
  dataB: readonly number[];
  pValue: number;
  meanDifference: number;
  relativeMeanDifference: number;
  formattedMeanA: string;
  formattedMeanB: string;
  formattedMeanDifference: string;
  formattedRelativeDifference: string;
}

export interface VolcanoOptions {
  /** Normalise mean differences by the baseline mean (default: false) */
  relative?: boolean;
}

export function volcanoSeries(pairs: readonly SamplePair[], options: VolcanoOptions = {}): VolcanoSeries {
  const relative = options.relative ?? false;
  const units = new Set(pairs.map((pair) => pair.unit));

  const points = pairs.map((pair) => ({
    x: relative ? pair.relativeMeanDifference : pair.meanDifference,
    y: 1 / pair.pValue,
    buildNumber: pair.buildNumber,
    metric: pair.metric,
  }));

  const series: VolcanoSeries = {
    points,
    relative,
    unit: relative ? 'Percent' : (pairs[0]?.unit ?? 'None'),
    thresholdY: VOLCANO_THRESHOLD_Y,
    sortedPValues: pairs.map((pair) => pair.pValue).sort((a, b) => a - b),
    sortedAbsMeanDifferences: pairs.map((pair) => Math.abs(pair.meanDifference)).sort((a, b) => a - b),
    mixedUnits: units.size > 1,
  };

  if (pairs.length > 0) {
    if (relative) {
      series.averageAbsRegression = safeAverage(points.map((point) => Math.abs(point.x)));
    } else {
      series.averageValue = safeAverage(pairs.flatMap((pair) => [...pair.dataA, ...pair.dataB]));
    }
  }

  return series;
}

export function histogramSeries(pairs: readonly SamplePair[], kind: HistogramKind): HistogramSeries {
  if (kind === 'regression') {
    return { kind, values: pairs.map((pair) => pair.relativeMeanDifference) };
  }
  return {
    kind,
    values: pairs.map((pair) => pair.pValue),
    thresholdX: SIGNIFICANCE_P_VALUE,
  };
}

export function singleRunSeries(pair: SamplePair): SingleRunSeries {
  const meanA = pair.meanA;

  return {
    buildNumber: pair.buildNumber,
    metric: pair.metric,
    unit: pair.unit,
    dataA: pair.dataA,
    dataB: pair.dataB,
    pValue: pair.pValue,
    meanDifference: pair.meanDifference,
    relativeMeanDifference: pair.relativeMeanDifference,
    formattedMeanA: formatWithReducedUnit(meanA, pair.unit),
    formattedMeanB: formatWithReducedUnit(pair.meanB, pair.unit),
    formattedMeanDifference: formatWithReducedUnit(pair.meanDifference, pair.unit),
    formattedRelativeDifference: formatPercent(pair.relativeMeanDifference),
  };
}
