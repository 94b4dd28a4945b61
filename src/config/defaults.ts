/**
 * Default Configuration Constants
 *
 * Used when no config/volcano.yaml is shipped next to the package, and as
 * the fallbacks of the library entry points.
 */

import type { VolcanoConfig } from '../types/schemas/config.js';

/**
 * Permutation Test Configuration
 */
export const PERMUTATION_TEST = {
  /** Largest number of relabelings enumerated exactly */
  EXACT_THRESHOLD: 100_000,
} as const;

/**
 * Dimensions every performance test result has. Asking about them first
 * matches how analysts think about a result: which test, on which host.
 */
export const DEFAULT_ASK_FIRST_DIMENSIONS: readonly string[] = [
  'performance_test',
  'instance',
  'guest_kernel',
  'host_kernel',
];

export const DEFAULT_CONFIG: VolcanoConfig = {
  permutation_test: {
    exact_threshold: PERMUTATION_TEST.EXACT_THRESHOLD,
    resample_rate: null,
    seed: null,
  },
  reduction: {
    ask_first: [...DEFAULT_ASK_FIRST_DIMENSIONS],
  },
  ingest: {
    skip_invalid_records: false,
  },
  reporting: {
    relative_holistic_volcano: true,
  },
  logging: {
    level: 'warn',
  },
};
