/**
 * Selection State
 *
 * Immutable working state of an interactive narrowing pass. Every
 * elimination returns a new state; nothing is ever rolled back.
 */

import { AmbiguousEliminationError, AnalysisError } from '../api/errors.js';
import {
  compareScalars,
  dimensionValueKey,
  isPresent,
  present,
  type DimensionScalar,
} from '../types/dimensions.js';
import { dimensionValueOf, type ResultGroup } from '../grouping/result-grouper.js';

export interface SelectionState {
  /** Retained rows of the grouped table */
  readonly groups: readonly ResultGroup[];
  /** Dimensions already decided, with the values that were accepted */
  readonly resolved: ReadonlyMap<string, readonly DimensionScalar[]>;
  /** Dimensions not decided yet */
  readonly free: readonly string[];
}

/**
 * Present values of a dimension over a set of groups.
 */
export interface DimensionDomain {
  /** Distinct present values, numbers ascending then strings */
  values: DimensionScalar[];
  /** Whether some group is missing the dimension or has no use for it */
  hasAbsent: boolean;
}

export function createSelectionState(
  groups: Iterable<ResultGroup>,
  dimensions: readonly string[]
): SelectionState {
  return {
    groups: [...groups],
    resolved: new Map(),
    free: [...dimensions],
  };
}

export function dimensionDomain(groups: readonly ResultGroup[], dimension: string): DimensionDomain {
  const values = new Map<string, DimensionScalar>();
  let hasAbsent = false;

  for (const group of groups) {
    const value = dimensionValueOf(group.values, dimension);
    if (isPresent(value)) {
      values.set(dimensionValueKey(value), value.value);
    } else {
      hasAbsent = true;
    }
  }

  return { values: [...values.values()].sort(compareScalars), hasAbsent };
}

export function retainedRunCount(state: SelectionState): number {
  return state.groups.reduce((acc, group) => acc + group.runs.length, 0);
}

/**
 * Keep the groups whose value for `dimension` is one of `chosen`, or that
 * have no value for it at all.
 *
 * @throws AmbiguousEliminationError if `chosen` names a value that is not a
 *   candidate of the current state
 */
export function eliminate(
  state: SelectionState,
  dimension: string,
  chosen: readonly DimensionScalar[]
): SelectionState {
  if (!state.free.includes(dimension)) {
    throw new AnalysisError('InvalidParams', `Dimension '${dimension}' is not free in the current selection`, {
      dimension,
    });
  }
  if (chosen.length === 0) {
    throw new AnalysisError('InvalidParams', `Elimination on '${dimension}' needs at least one accepted value`, {
      dimension,
    });
  }

  const candidates = new Set(
    dimensionDomain(state.groups, dimension).values.map((value) => dimensionValueKey(present(value)))
  );
  const accepted = new Set(chosen.map((value) => dimensionValueKey(present(value))));
  const unknown = chosen.filter((value) => !candidates.has(dimensionValueKey(present(value))));
  if (unknown.length > 0) {
    throw new AmbiguousEliminationError(dimension, unknown);
  }

  const groups = state.groups.filter((group) => {
    const value = dimensionValueOf(group.values, dimension);
    return !isPresent(value) || accepted.has(dimensionValueKey(value));
  });

  const resolved = new Map(state.resolved);
  resolved.set(dimension, [...chosen]);

  return {
    groups,
    resolved,
    free: state.free.filter((name) => name !== dimension),
  };
}

/**
 * Drop a dimension from the free set without filtering, for dimensions
 * that no retained group has a value for.
 */
export function skipDimension(state: SelectionState, dimension: string): SelectionState {
  return {
    groups: state.groups,
    resolved: state.resolved,
    free: state.free.filter((name) => name !== dimension),
  };
}
