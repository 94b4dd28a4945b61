/**
 * Entropy ranking of free dimensions.
 *
 * A dimension's entropy is taken over the number of retained groups per
 * present value. Dimensions without any present value are not applicable
 * and get no score at all; a single present value scores exactly zero.
 */

import { dimensionValueKey, isPresent } from '../types/dimensions.js';
import { dimensionValueOf, type ResultGroup } from '../grouping/result-grouper.js';
import { shannonEntropy } from '../utils/math-helpers.js';
import type { SelectionState } from './selection-state.js';

/** Entropies closer than this are ties */
const TIE_EPSILON = 1e-12;

export interface DimensionScore {
  dimension: string;
  /** undefined when the dimension is not applicable to any retained group */
  entropy: number | undefined;
}

export function dimensionEntropy(groups: readonly ResultGroup[], dimension: string): number | undefined {
  const counts = new Map<string, number>();
  for (const group of groups) {
    const value = dimensionValueOf(group.values, dimension);
    if (isPresent(value)) {
      const key = dimensionValueKey(value);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  if (counts.size === 0) {
    return undefined;
  }
  return shannonEntropy([...counts.values()]);
}

/**
 * Score every free dimension, in lexicographic order of their names.
 */
export function scoreDimensions(state: SelectionState): DimensionScore[] {
  return [...state.free]
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((dimension) => ({ dimension, entropy: dimensionEntropy(state.groups, dimension) }));
}

/**
 * The applicable free dimension with the highest entropy; among equal
 * entropies the lexicographically first name wins.
 */
export function maximumEntropyDimension(state: SelectionState): string | undefined {
  let best: { dimension: string; entropy: number } | undefined;

  for (const score of scoreDimensions(state)) {
    if (score.entropy === undefined) {
      continue;
    }
    if (!best || score.entropy > best.entropy + TIE_EPSILON) {
      best = { dimension: score.dimension, entropy: score.entropy };
    }
  }

  return best?.dimension;
}
