export {
  DimensionReductionEngine,
  type DimensionReductionConfig,
  type DimensionSelector,
  type ReductionEngineEvents,
  type ReductionOutcome,
  type ReductionStatus,
  type ReductionStep,
  type ResolvedDimension,
} from './dimension-reduction-engine.js';

export { dimensionEntropy, maximumEntropyDimension, scoreDimensions, type DimensionScore } from './entropy.js';

export {
  createSelectionState,
  dimensionDomain,
  eliminate,
  retainedRunCount,
  skipDimension,
  type DimensionDomain,
  type SelectionState,
} from './selection-state.js';
