export {
  dimensionValueOf,
  flattenRuns,
  groupResults,
  tupleKey,
  type GroupableRow,
  type ResultGroup,
} from './result-grouper.js';
