/**
 * Dimension-Reduction Engine
 *
 * Narrows a grouped result table down to one configuration slice with as
 * few questions as possible. Each round picks the dimension to ask about:
 * - ask-first dimensions, in configured order
 * - otherwise the free dimension with the highest entropy (ties go to the
 *   lexicographically first name)
 *
 * Dimensions with a single candidate are resolved without asking. The pass
 * ends once no applicable dimension is left, or when the analyst aborts.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { formatDimensionValue, type DimensionScalar } from '../types/dimensions.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { maximumEntropyDimension, scoreDimensions } from './entropy.js';
import {
  dimensionDomain,
  eliminate,
  retainedRunCount,
  skipDimension,
  type SelectionState,
} from './selection-state.js';

export type ReductionStatus = 'active' | 'resolved' | 'aborted';

/**
 * The part of the selection collaborator the engine talks to.
 */
export interface DimensionSelector {
  /**
   * Ask which of `candidates` to keep. `null` or an empty answer aborts.
   */
  ask(dimension: string, candidates: readonly DimensionScalar[]): Promise<readonly DimensionScalar[] | null>;
}

/**
 * What the engine will do next for a given state.
 */
export type ReductionStep =
  | { kind: 'ask'; dimension: string; candidates: DimensionScalar[]; reason: 'ask-first' | 'max-entropy' }
  | { kind: 'skip'; dimension: string }
  | { kind: 'done' };

export interface ResolvedDimension {
  dimension: string;
  values: readonly DimensionScalar[];
  /** false when the single candidate was taken without asking */
  prompted: boolean;
}

export interface ReductionOutcome {
  status: Exclude<ReductionStatus, 'active'>;
  state: SelectionState;
  /** Dimensions resolved, in order */
  history: ResolvedDimension[];
  /** Set when aborted: the dimension being asked about */
  abortedAt?: string;
}

export interface ReductionEngineEvents {
  dimensionResolved: (resolution: ResolvedDimension, state: SelectionState) => void;
  dimensionSkipped: (dimension: string) => void;
  resolved: (state: SelectionState) => void;
  aborted: (dimension: string, state: SelectionState) => void;
}

export interface DimensionReductionConfig {
  /** Dimensions always resolved first, in this order, regardless of entropy */
  askFirst?: readonly string[];
  logger?: Logger;
}

export class DimensionReductionEngine extends EventEmitter<ReductionEngineEvents> {
  private readonly askFirst: readonly string[];
  private readonly logger?: Logger;

  constructor(config: DimensionReductionConfig = {}) {
    super();
    this.askFirst = config.askFirst ?? [];
    this.logger = config.logger;
  }

  /**
   * Decide the next step without side effects.
   */
  plan(state: SelectionState): ReductionStep {
    for (const dimension of this.askFirst) {
      if (!state.free.includes(dimension)) {
        continue;
      }
      const { values } = dimensionDomain(state.groups, dimension);
      if (values.length === 0) {
        return { kind: 'skip', dimension };
      }
      return { kind: 'ask', dimension, candidates: values, reason: 'ask-first' };
    }

    const dimension = maximumEntropyDimension(state);
    if (dimension === undefined) {
      return { kind: 'done' };
    }

    return {
      kind: 'ask',
      dimension,
      candidates: dimensionDomain(state.groups, dimension).values,
      reason: 'max-entropy',
    };
  }

  /**
   * Run rounds until the table is resolved or the analyst aborts.
   */
  async run(initial: SelectionState, selector: DimensionSelector): Promise<ReductionOutcome> {
    let state = initial;
    const history: ResolvedDimension[] = [];

    for (;;) {
      const step = this.plan(state);

      if (step.kind === 'done') {
        this.logger?.info(
          { retainedGroups: state.groups.length, retainedRuns: retainedRunCount(state), rounds: history.length },
          'Selection resolved'
        );
        this.emit('resolved', state);
        return { status: 'resolved', state, history };
      }

      if (step.kind === 'skip') {
        this.logger?.debug({ dimension: step.dimension }, 'Dimension not applicable to retained results');
        state = skipDimension(state, step.dimension);
        this.emit('dimensionSkipped', step.dimension);
        continue;
      }

      lazyLog(
        this.logger,
        'debug',
        () => ({
          dimension: step.dimension,
          reason: step.reason,
          candidates: step.candidates.length,
          scores: scoreDimensions(state),
        }),
        'Selected dimension'
      );

      let values: readonly DimensionScalar[];
      let prompted: boolean;
      if (step.candidates.length === 1) {
        values = step.candidates;
        prompted = false;
      } else {
        const answer = await selector.ask(step.dimension, step.candidates);
        if (answer === null || answer.length === 0) {
          this.logger?.info({ dimension: step.dimension }, 'Selection aborted');
          this.emit('aborted', step.dimension, state);
          return { status: 'aborted', state, history, abortedAt: step.dimension };
        }
        values = answer;
        prompted = true;
      }

      state = eliminate(state, step.dimension, values);
      const resolution: ResolvedDimension = { dimension: step.dimension, values, prompted };
      history.push(resolution);

      lazyLog(
        this.logger,
        'info',
        () => ({
          dimension: step.dimension,
          values: values.map((value) => formatDimensionValue({ kind: 'present', value })),
          prompted,
          retainedGroups: state.groups.length,
        }),
        'Dimension resolved'
      );
      this.emit('dimensionResolved', resolution, state);
    }
  }
}
