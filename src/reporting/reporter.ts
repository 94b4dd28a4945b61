/**
 * Reporter collaborator
 *
 * Receives finished series and shows them to the analyst. Calls are fire
 * and forget. ConsoleReporter prints the textual summary of each series;
 * drawing the plots themselves is left to other renderers.
 */

import { formatPercent, formatWithReducedUnit } from './format.js';
import type { HistogramSeries, SingleRunSeries, VolcanoSeries } from './series.js';

export interface ResultReporter {
  volcano(series: VolcanoSeries, label: string): void;
  histogram(series: HistogramSeries, label: string): void;
  singleRun(series: SingleRunSeries): void;
  /** Free-form message for the analyst */
  notice(message: string): void;
}

export type LineWriter = (line: string) => void;

export class ConsoleReporter implements ResultReporter {
  constructor(private readonly write: LineWriter = (line) => console.log(line)) {}

  volcano(series: VolcanoSeries, label: string): void {
    const total = series.points.length;
    if (total === 0) {
      this.write(`No A/B-test results to plot for ${label}.`);
      return;
    }

    this.write(`Volcano plot of ${label}: each point is one test run. Total number of runs: ${total}`);
    if (series.averageAbsRegression !== undefined) {
      this.write(`The average reported regression is ${formatPercent(series.averageAbsRegression)}.`);
    }
    if (series.averageValue !== undefined) {
      this.write(
        `The average value across all runs so far is ${formatWithReducedUnit(series.averageValue, series.unit)}.`
      );
    }
    if (series.mixedUnits) {
      this.write('Warning: results do not share one unit, absolute differences are not comparable.');
    }
    this.write(`Sorted p-values: ${series.sortedPValues.join(', ')}`);
    this.write(`Sorted absolute mean differences: ${series.sortedAbsMeanDifferences.join(', ')}`);

    const significant = series.points.filter((point) => point.y > series.thresholdY).length;
    this.write(`Runs above the significance line (1/p > ${series.thresholdY}): ${significant}`);
  }

  histogram(series: HistogramSeries, label: string): void {
    const what = series.kind === 'p-value' ? 'p-values' : 'relative regressions';
    this.write(`Histogram of ${what} for ${label} (${series.values.length} values)`);
    if (series.values.length === 0) {
      return;
    }

    if (series.thresholdX !== undefined) {
      const threshold = series.thresholdX;
      const below = series.values.filter((value) => value < threshold).length;
      this.write(`${below} of ${series.values.length} below ${threshold}`);
    } else {
      const min = series.values.reduce((acc, value) => Math.min(acc, value), Infinity);
      const max = series.values.reduce((acc, value) => Math.max(acc, value), -Infinity);
      this.write(`Range: ${formatPercent(min)} to ${formatPercent(max)}`);
    }
  }

  singleRun(series: SingleRunSeries): void {
    this.write(
      `Build ${series.buildNumber}: A/B-testing determined that the p-value of the observed change of ` +
        `${series.formattedMeanDifference} from ${series.formattedMeanA} to ${series.formattedMeanB} ` +
        `or ${series.formattedRelativeDifference} being a genuine performance change is ${series.pValue}.`
    );
    this.write(`${series.metric} (${series.unit}) A: ${series.dataA.join(', ')}`);
    this.write(`${series.metric} (${series.unit}) B: ${series.dataB.join(', ')}`);
  }

  notice(message: string): void {
    this.write(message);
  }
}
