/**
 * Result Grouper
 *
 * Partitions a flat collection of ingested sample pairs into one group per
 * distinct dimension tuple. Values are compared by exact equality; missing
 * and not-applicable markers are group keys of their own.
 */

import {
  NOT_APPLICABLE,
  dimensionValueKey,
  type DimensionValue,
} from '../types/dimensions.js';
import type { SamplePair } from '../testing/sample-pair.js';

export interface GroupableRow {
  dimensions: ReadonlyMap<string, DimensionValue>;
  sample: SamplePair;
}

/**
 * One row of the grouped table.
 */
export interface ResultGroup {
  /** Encoded dimension tuple, unique within one grouping */
  key: string;
  /** Exactly one entry per grouped dimension */
  values: ReadonlyMap<string, DimensionValue>;
  /** Sample pairs sharing the tuple, in ingestion order */
  runs: readonly SamplePair[];
}

/**
 * Value of a dimension for a row or group; dimensions a row never mentions
 * are not applicable to it.
 */
export function dimensionValueOf(
  values: ReadonlyMap<string, DimensionValue>,
  dimension: string
): DimensionValue {
  return values.get(dimension) ?? NOT_APPLICABLE;
}

export function tupleKey(
  values: ReadonlyMap<string, DimensionValue>,
  dimensions: readonly string[]
): string {
  return JSON.stringify(dimensions.map((dimension) => dimensionValueKey(dimensionValueOf(values, dimension))));
}

/**
 * Group rows by their full dimension tuple.
 *
 * The returned map iterates in order of each tuple's first appearance.
 */
export function groupResults(
  rows: readonly GroupableRow[],
  dimensions: readonly string[]
): Map<string, ResultGroup> {
  const buckets = new Map<string, { values: Map<string, DimensionValue>; runs: SamplePair[] }>();

  for (const row of rows) {
    const key = tupleKey(row.dimensions, dimensions);
    let bucket = buckets.get(key);
    if (!bucket) {
      const values = new Map<string, DimensionValue>();
      for (const dimension of dimensions) {
        values.set(dimension, dimensionValueOf(row.dimensions, dimension));
      }
      bucket = { values, runs: [] };
      buckets.set(key, bucket);
    }
    bucket.runs.push(row.sample);
  }

  const groups = new Map<string, ResultGroup>();
  for (const [key, bucket] of buckets) {
    groups.set(key, { key, values: bucket.values, runs: bucket.runs });
  }
  return groups;
}

/**
 * All sample pairs of the given groups, group by group.
 */
export function flattenRuns(groups: Iterable<ResultGroup>): SamplePair[] {
  const runs: SamplePair[] = [];
  for (const group of groups) {
    runs.push(...group.runs);
  }
  return runs;
}
