export {
  AnalysisError,
  AmbiguousEliminationError,
  ConfigError,
  IngestionError,
  InsufficientSampleError,
  InvalidResampleCountError,
  toAnalysisError,
  type AnalysisErrorCode,
  type AnalysisErrorShape,
} from './api/errors.js';

export * from './testing/index.js';
export * from './grouping/index.js';
export * from './reduction/index.js';
export * from './reporting/index.js';
export * from './ingest/index.js';
export * from './session/index.js';

export { loadConfig, validateConfig, initializeConfig, getConfig, resetConfig, type Environment } from './config/loader.js';
export { DEFAULT_CONFIG, DEFAULT_ASK_FIRST_DIMENSIONS } from './config/defaults.js';
export { createLogger } from './utils/logger-helpers.js';
export { ReadlinePrompter, type ReadlinePrompterOptions } from './cli/readline-prompter.js';

export * from './types/index.js';
