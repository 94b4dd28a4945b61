export { formatPercent, formatWithReducedUnit } from './format.js';

export { ConsoleReporter, type LineWriter, type ResultReporter } from './reporter.js';

export {
  SIGNIFICANCE_P_VALUE,
  VOLCANO_THRESHOLD_Y,
  histogramSeries,
  singleRunSeries,
  volcanoSeries,
  type HistogramKind,
  type HistogramSeries,
  type SingleRunSeries,
  type VolcanoOptions,
  type VolcanoPoint,
  type VolcanoSeries,
} from './series.js';

export { describeSpace, type SpaceDescription } from './space.js';
