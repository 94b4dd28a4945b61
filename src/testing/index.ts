/**
 * Regression testing of A/B sample pairs
 *
 * - Sample pairs with lazily memoized statistics
 * - Two-sided permutation test on the difference of means
 *   (exact enumeration or seeded Monte-Carlo resampling)
 */

export { SamplePair } from './sample-pair.js';

export {
  RegressionTester,
  DEFAULT_EXACT_THRESHOLD,
  type PermutationTestResult,
  type RegressionTesterOptions,
} from './permutation-test.js';
