/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Finite number validator (rejects NaN and ±Infinity)
 */
export const FiniteNumber = z.number().finite('Must be a finite number');

/**
 * Probability validator (0-1 range)
 */
export const Probability = z
  .number()
  .min(0, 'Probability must be at least 0')
  .max(1, 'Probability cannot exceed 1');

/**
 * Dimension value as logged: a string or a number
 */
export const DimensionScalarSchema = z.union([z.string(), FiniteNumber]);
