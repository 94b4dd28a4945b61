/**
 * Analysis Session
 *
 * One interactive pass over an in-memory result set:
 * - group the ingested rows by their dimension tuple
 * - narrow the grouped table with the dimension-reduction engine
 * - deep dive into each retained group, or look at all of them at once
 *
 * Errors raised anywhere in the pass end the session; they are logged and
 * shown to the analyst, and the outcome carries them.
 */

import type { Logger } from 'pino';
import { toAnalysisError, type AnalysisError } from '../api/errors.js';
import {
  flattenRuns,
  groupResults,
  type GroupableRow,
  type ResultGroup,
} from '../grouping/result-grouper.js';
import {
  DimensionReductionEngine,
  type ReductionOutcome,
} from '../reduction/dimension-reduction-engine.js';
import { createSelectionState } from '../reduction/selection-state.js';
import type { ResultReporter } from '../reporting/reporter.js';
import { histogramSeries, singleRunSeries, volcanoSeries } from '../reporting/series.js';
import { describeSpace } from '../reporting/space.js';
import { formatDimensionValue, isPresent } from '../types/dimensions.js';
import {
  AGGREGATE_OPTIONS,
  INVESTIGATION_OPTIONS,
  METRIC_OPTIONS,
  type SelectionPrompter,
} from './prompter.js';

export type SessionStatus = 'completed' | 'aborted' | 'failed';

export interface SessionOutcome {
  status: SessionStatus;
  /** Set once the reduction pass finished */
  reduction?: ReductionOutcome;
  /** Set when the session failed */
  error?: AnalysisError;
}

export interface AnalysisSessionOptions {
  prompter: SelectionPrompter;
  reporter: ResultReporter;

  /** Dimensions resolved before entropy-based selection */
  askFirst?: readonly string[];

  /** Normalise the holistic volcano plot by baseline means (default: true) */
  relativeHolisticVolcano?: boolean;

  logger?: Logger;
}

type LoopResult = 'completed' | 'aborted';

const LABEL_WIDTH = 20;

export class AnalysisSession {
  private readonly prompter: SelectionPrompter;
  private readonly reporter: ResultReporter;
  private readonly askFirst: readonly string[];
  private readonly relativeHolisticVolcano: boolean;
  private readonly logger?: Logger;

  constructor(options: AnalysisSessionOptions) {
    this.prompter = options.prompter;
    this.reporter = options.reporter;
    this.askFirst = options.askFirst ?? [];
    this.relativeHolisticVolcano = options.relativeHolisticVolcano ?? true;
    this.logger = options.logger;
  }

  async run(rows: readonly GroupableRow[], dimensions: readonly string[]): Promise<SessionOutcome> {
    let reduction: ReductionOutcome | undefined;

    try {
      const groups = groupResults(rows, dimensions);
      this.logger?.info({ rows: rows.length, groups: groups.size }, 'Grouped A/B-test results');

      const engine = new DimensionReductionEngine({ askFirst: this.askFirst, logger: this.logger });
      engine.on('dimensionResolved', (resolution) => {
        if (!resolution.prompted) {
          this.reporter.notice(
            `Value of dimension '${resolution.dimension}' is pre-determined to be '${resolution.values.join(', ')}' by previous selections.`
          );
        }
      });

      reduction = await engine.run(createSelectionState(groups.values(), dimensions), this.prompter);
      if (reduction.status === 'aborted') {
        return { status: 'aborted', reduction };
      }

      this.reporter.notice('');
      const mode = await this.prompter.chooseCommand(
        'What kind of investigation do you want to perform?',
        INVESTIGATION_OPTIONS
      );

      const result: LoopResult =
        mode === null
          ? 'aborted'
          : mode === 'DEEP'
            ? await this.deepDive(reduction.state.groups, dimensions)
            : await this.holistic(reduction.state.groups, dimensions);

      return { status: result, reduction };
    } catch (error) {
      const analysisError = toAnalysisError(error);
      this.logger?.error({ err: analysisError.toObject() }, 'Analysis session failed');
      this.reporter.notice(`Error: ${analysisError.message}`);
      return { status: 'failed', reduction, error: analysisError };
    }
  }

  /**
   * Walk the retained groups one by one until the analyst exits.
   */
  private async deepDive(groups: readonly ResultGroup[], dimensions: readonly string[]): Promise<LoopResult> {
    for (const group of groups) {
      this.describeGroup(group, dimensions);

      for (;;) {
        const command = await this.prompter.chooseCommand(
          'What do you want to do with this metric?',
          METRIC_OPTIONS,
          'CONTINUE'
        );

        if (command === null) {
          return 'aborted';
        }
        if (command === 'EXIT') {
          return 'completed';
        }
        if (command === 'CONTINUE') {
          break;
        }
        if (command === 'ASK_VOLCANO') {
          this.reporter.volcano(volcanoSeries(group.runs), groupLabel(group));
        } else {
          await this.showBuild(group);
        }
      }
    }

    return 'completed';
  }

  private describeGroup(group: ResultGroup, dimensions: readonly string[]): void {
    this.reporter.notice('Showing details for A/B-Tests performed with the following parameters:');
    for (const dimension of dimensions) {
      const value = group.values.get(dimension);
      if (value && isPresent(value)) {
        this.reporter.notice(`${dimension.padEnd(LABEL_WIDTH)} ${formatDimensionValue(value)}`);
      }
    }
    this.reporter.notice('');
  }

  private async showBuild(group: ResultGroup): Promise<void> {
    const buildNumber = await this.prompter.askRunNumber();
    if (buildNumber === null) {
      return;
    }

    const run = group.runs.find((candidate) => candidate.buildNumber === buildNumber);
    if (!run) {
      this.reporter.notice(`No data for build number ${buildNumber} found`);
      return;
    }
    this.reporter.singleRun(singleRunSeries(run));
  }

  /**
   * Aggregate views over every run of every retained group.
   */
  private async holistic(groups: readonly ResultGroup[], dimensions: readonly string[]): Promise<LoopResult> {
    const space = describeSpace(groups, dimensions);

    this.reporter.notice(
      'Performing holistic analysis of p-values logged by A/B-Tests matching the following dimensions:'
    );
    for (const { dimension, value } of space.fixed) {
      this.reporter.notice(`${dimension.padEnd(LABEL_WIDTH)} ${value}`);
    }
    this.reporter.notice('');
    this.reporter.notice('This will include p-values across the following space:');
    for (const { dimension, values } of space.varying) {
      this.reporter.notice(`${dimension.padEnd(LABEL_WIDTH)} ${values.join(', ')}`);
    }

    const buildNumber = await this.prompter.askRunNumber(
      "Do you want to limit the analysis to a specific build? (for 'yes', provide build number, for 'no' leave empty)"
    );
    const runs = flattenRuns(groups).filter((run) => buildNumber === null || run.buildNumber === buildNumber);
    const label = buildNumber === null ? 'selected A/B-tests' : `selected A/B-tests of build ${buildNumber}`;

    for (;;) {
      const command = await this.prompter.chooseCommand(
        'What type of aggregate plot are you interested in?',
        AGGREGATE_OPTIONS,
        'EXIT'
      );

      switch (command) {
        case null:
          return 'aborted';
        case 'EXIT':
          return 'completed';
        case 'VOLCANO':
          this.reporter.volcano(volcanoSeries(runs, { relative: this.relativeHolisticVolcano }), label);
          break;
        case 'HISTOGRAM_P':
          this.reporter.histogram(histogramSeries(runs, 'p-value'), label);
          break;
        case 'HISTOGRAM_REGRESSION':
          this.reporter.histogram(histogramSeries(runs, 'regression'), label);
          break;
      }
    }
  }
}

function groupLabel(group: ResultGroup): string {
  const metrics = [...new Set(group.runs.map((run) => run.metric))];
  return metrics.length > 0 ? metrics.join(', ') : 'empty group';
}
