/**
 * Summary of the configuration space a set of groups spans.
 */

import type { DimensionScalar } from '../types/dimensions.js';
import type { ResultGroup } from '../grouping/result-grouper.js';
import { dimensionDomain } from '../reduction/selection-state.js';

export interface SpaceDescription {
  /** Dimensions with exactly one present value */
  fixed: Array<{ dimension: string; value: DimensionScalar }>;
  /** Dimensions with several present values */
  varying: Array<{ dimension: string; values: DimensionScalar[] }>;
}

export function describeSpace(groups: readonly ResultGroup[], dimensions: readonly string[]): SpaceDescription {
  const description: SpaceDescription = { fixed: [], varying: [] };

  for (const dimension of dimensions) {
    const { values } = dimensionDomain(groups, dimension);
    if (values.length === 1) {
      description.fixed.push({ dimension, value: values[0] });
    } else if (values.length > 1) {
      description.varying.push({ dimension, values });
    }
  }

  return description;
}
