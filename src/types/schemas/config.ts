/**
 * Configuration Schemas
 *
 * Zod schemas for validating config/volcano.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { NonEmptyString, PositiveInteger } from './common.js';

/**
 * Permutation test configuration
 */
export const PermutationTestConfigSchema = z.object({
  exact_threshold: PositiveInteger,
  resample_rate: PositiveInteger.nullable(),
  seed: z.number().int('Seed must be an integer').nullable(),
});

/**
 * Dimension reduction configuration
 */
export const ReductionConfigSchema = z
  .object({
    ask_first: z.array(NonEmptyString),
  })
  .refine((data) => new Set(data.ask_first).size === data.ask_first.length, {
    message: 'must not list a dimension twice',
    path: ['ask_first'],
  });

/**
 * Ingestion configuration
 */
export const IngestConfigSchema = z.object({
  skip_invalid_records: z.boolean(),
});

/**
 * Reporting configuration
 */
export const ReportingConfigSchema = z.object({
  relative_holistic_volcano: z.boolean(),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'], {
    errorMap: () => ({ message: 'Level must be one of: fatal, error, warn, info, debug, trace, silent' }),
  }),
});

/**
 * Complete configuration (after environment overrides are merged)
 */
export const VolcanoConfigSchema = z.object({
  permutation_test: PermutationTestConfigSchema,
  reduction: ReductionConfigSchema,
  ingest: IngestConfigSchema,
  reporting: ReportingConfigSchema,
  logging: LoggingConfigSchema,
});

export type VolcanoConfig = z.infer<typeof VolcanoConfigSchema>;
