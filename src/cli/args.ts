/**
 * Command-line parsing for the ab-volcano CLI
 */

import { AnalysisError } from '../api/errors.js';
import type { VolcanoConfig } from '../types/schemas/config.js';

export interface CLIArgs {
  _: string[];
  'resample-rate'?: string;
  seed?: string;
  config?: string;
  'skip-invalid'?: boolean;
  help?: boolean;
}

const VALUE_FLAGS = ['resample-rate', 'seed', 'config'] as const;
const BOOLEAN_FLAGS = ['skip-invalid', 'help'] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];
type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

function isValueFlag(key: string): key is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === key);
}

function isBooleanFlag(key: string): key is BooleanFlag {
  return BOOLEAN_FLAGS.some((flag) => flag === key);
}

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('--')) {
      const [key, inline] = splitFlag(arg.slice(2));

      if (isBooleanFlag(key)) {
        result[key] = true;
      } else if (isValueFlag(key)) {
        const value = inline ?? args[i + 1];
        if (value === undefined || (inline === undefined && value.startsWith('--'))) {
          throw new AnalysisError('InvalidParams', `Option --${key} needs a value`, { option: key });
        }
        result[key] = value;
        if (inline === undefined) {
          i++;
        }
      } else {
        throw new AnalysisError('InvalidParams', `Unknown option --${key}`, { option: key });
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

function splitFlag(flag: string): [string, string | undefined] {
  const eq = flag.indexOf('=');
  return eq === -1 ? [flag, undefined] : [flag.slice(0, eq), flag.slice(eq + 1)];
}

function parseInteger(option: string, value: string, min: number): number {
  if (!/^-?\d+$/.test(value)) {
    throw new AnalysisError('InvalidParams', `Option --${option} must be an integer (got '${value}')`, { option });
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new AnalysisError('InvalidParams', `Option --${option} must be at least ${min} (got ${parsed})`, { option });
  }
  return parsed;
}

export interface RunOptions {
  logPath: string;
  resampleCount?: number;
  seed?: number;
  skipInvalid: boolean;
}

/**
 * Combine command-line flags with the loaded configuration; flags win.
 */
export function resolveRunOptions(args: CLIArgs, config: VolcanoConfig): RunOptions {
  if (args._.length !== 1) {
    throw new AnalysisError('InvalidParams', 'Expected exactly one A/B-test log file', { positional: args._ });
  }

  const resampleCount =
    args['resample-rate'] !== undefined
      ? parseInteger('resample-rate', args['resample-rate'], 1)
      : config.permutation_test.resample_rate;
  const seed =
    args.seed !== undefined ? parseInteger('seed', args.seed, 0) : config.permutation_test.seed;

  return {
    logPath: args._[0],
    resampleCount: resampleCount ?? undefined,
    seed: seed ?? undefined,
    skipInvalid: args['skip-invalid'] ?? config.ingest.skip_invalid_records,
  };
}
