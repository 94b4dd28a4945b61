/**
 * Zod schema exports
 *
 * These schemas validate the two inputs that cross the process boundary:
 * A/B-test log records and the YAML configuration.
 *
 * @example
 * ```typescript
 * import { AbTestRecordSchema } from 'ab-volcano';
 *
 * const result = AbTestRecordSchema.safeParse(JSON.parse(line));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Log record schemas
export * from './emf.js';

// Configuration schemas
export * from './config.js';
