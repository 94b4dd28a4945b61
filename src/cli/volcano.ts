#!/usr/bin/env node

/**
 * A/B-test result explorer CLI
 *
 * Usage:
 *   ab-volcano <log-file> [options]
 */

import { toAnalysisError } from '../api/errors.js';
import { initializeConfig } from '../config/loader.js';
import { loadAbTestLog } from '../ingest/emf-log.js';
import { ConsoleReporter } from '../reporting/reporter.js';
import { AnalysisSession } from '../session/analysis-session.js';
import { RegressionTester } from '../testing/permutation-test.js';
import { createLogger } from '../utils/logger-helpers.js';
import { parseArgs, resolveRunOptions } from './args.js';
import { ReadlinePrompter } from './readline-prompter.js';

function printHelp() {
  console.log(`
ab-volcano - Explore historical A/B performance test results

USAGE:
  ab-volcano <log-file> [options]

ARGUMENTS:
  <log-file>                            Newline-delimited EMF log of A/B-test results

OPTIONS:
  --resample-rate <n>                   Recompute every p-value with n permutations
  --seed <n>                            Seed for Monte-Carlo resampling
  --config <path>                       Configuration file (default: config/volcano.yaml)
  --skip-invalid                        Skip invalid records instead of failing
  --help, -h                            Show this help message

ENVIRONMENT VARIABLES:
  AB_VOLCANO_LOG_LEVEL                  Log level for diagnostics on stderr
  NODE_ENV                              Selects the configuration environment
`);
}

async function main(argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    printHelp();
    return 0;
  }

  const config = initializeConfig(args.config);
  const options = resolveRunOptions(args, config);
  const logger = createLogger(config.logging.level);

  const tester = new RegressionTester({
    exactThreshold: config.permutation_test.exact_threshold,
    seed: options.seed,
    logger,
  });

  const ingest = await loadAbTestLog(options.logPath, {
    resampleCount: options.resampleCount,
    skipInvalid: options.skipInvalid,
    tester,
    logger,
  });

  if (ingest.rejected.length > 0) {
    console.error(`⚠️  Skipped ${ingest.rejected.length} invalid record(s)`);
  }
  if (ingest.rows.length === 0) {
    console.error(`❌ Error: No A/B-test results found in ${options.logPath}`);
    return 1;
  }

  const prompter = new ReadlinePrompter();
  try {
    const session = new AnalysisSession({
      prompter,
      reporter: new ConsoleReporter(),
      askFirst: config.reduction.ask_first,
      relativeHolisticVolcano: config.reporting.relative_holistic_volcano,
      logger,
    });
    const outcome = await session.run(ingest.rows, ingest.dimensions);
    return outcome.status === 'failed' ? 1 : 0;
  } finally {
    prompter.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const err = toAnalysisError(error);
    console.error(`\n❌ Error: ${err.message}`);
    console.error(`   Code: ${err.code}`);
    process.exitCode = 1;
  }
);
