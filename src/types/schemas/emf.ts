/**
 * A/B-test record schemas
 *
 * The benchmarking harness logs one CloudWatch Embedded Metric Format
 * (EMF) line per A/B test. Besides the fields validated here, a record
 * carries one top-level key per dimension it declares.
 *
 * @module schemas/emf
 */

import { z } from 'zod';
import { FiniteNumber, NonEmptyString, Probability } from './common.js';

/**
 * One metric declared in an EMF directive
 */
export const EmfMetricDefinitionSchema = z
  .object({
    Name: NonEmptyString,
    Unit: z.string().optional(),
  })
  .passthrough();

/**
 * EMF metric directive
 */
export const EmfDirectiveSchema = z
  .object({
    Namespace: z.string().optional(),
    Dimensions: z.array(z.array(z.string())),
    Metrics: z.array(EmfMetricDefinitionSchema),
  })
  .passthrough();

/**
 * `_aws` metadata block
 */
export const EmfMetadataSchema = z
  .object({
    Timestamp: z.number().optional(),
    CloudWatchMetrics: z.array(EmfDirectiveSchema).min(1, 'At least one metric directive is required'),
  })
  .passthrough();

/**
 * One A/B-test result line. The build number is logged as `build_number`
 * or, by older harness versions, as `buildkite_build_number`.
 */
export const AbTestRecordSchema = z
  .object({
    _aws: EmfMetadataSchema,
    metric: NonEmptyString,
    data_a: z.array(FiniteNumber).min(1, 'Must contain at least one measurement'),
    data_b: z.array(FiniteNumber).min(1, 'Must contain at least one measurement'),
    p_value: Probability,
    mean_difference: FiniteNumber,
    build_number: z.number().int('Must be an integer').optional(),
    buildkite_build_number: z.number().int('Must be an integer').optional(),
  })
  .passthrough();

export type EmfDirective = z.infer<typeof EmfDirectiveSchema>;
export type AbTestRecord = z.infer<typeof AbTestRecordSchema>;
