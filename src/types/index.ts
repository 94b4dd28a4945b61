/**
 * Main type exports
 */

export * from './dimensions.js';
export * from './samples.js';
export * from './schemas/index.js';
