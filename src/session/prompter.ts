/**
 * Selection collaborator contract
 *
 * Every question the session asks has a closed set of answers, so the
 * session's dispatch is a total function over these unions.
 */

import type { DimensionSelector } from '../reduction/dimension-reduction-engine.js';

export type InvestigationMode = 'HOLISTIC' | 'DEEP';

/** What to do with one metric group during a deep dive */
export type MetricCommand = 'ASK_VOLCANO' | 'ASK_BUILD_DETAIL' | 'CONTINUE' | 'EXIT';

/** Which aggregate view to show during a holistic analysis */
export type AggregateCommand = 'VOLCANO' | 'HISTOGRAM_P' | 'HISTOGRAM_REGRESSION' | 'EXIT';

export interface CommandOption<C extends string> {
  label: string;
  command: C;
}

export interface SelectionPrompter extends DimensionSelector {
  /**
   * Ask for a build number. `null` when the analyst gives none.
   */
  askRunNumber(message?: string): Promise<number | null>;

  /**
   * Offer a fixed menu. `null` when the analyst cancels.
   */
  chooseCommand<C extends string>(
    message: string,
    options: readonly CommandOption<C>[],
    defaultCommand?: C
  ): Promise<C | null>;
}

export const INVESTIGATION_OPTIONS: readonly CommandOption<InvestigationMode>[] = [
  { label: 'Holistic view of p-values distribution of selected metrics', command: 'HOLISTIC' },
  { label: 'One-by-one deep dive into each metric', command: 'DEEP' },
];

export const METRIC_OPTIONS: readonly CommandOption<MetricCommand>[] = [
  { label: 'Display volcano plot of historical A/B-Tests', command: 'ASK_VOLCANO' },
  { label: 'Display data for a specific build', command: 'ASK_BUILD_DETAIL' },
  { label: 'Nothing, take me to next metric', command: 'CONTINUE' },
  { label: 'Exit', command: 'EXIT' },
];

export const AGGREGATE_OPTIONS: readonly CommandOption<AggregateCommand>[] = [
  { label: 'Volcano plot of relative regressions', command: 'VOLCANO' },
  { label: 'Histogram of p-values', command: 'HISTOGRAM_P' },
  { label: 'Histogram of relative regressions', command: 'HISTOGRAM_REGRESSION' },
  { label: 'Exit', command: 'EXIT' },
];
