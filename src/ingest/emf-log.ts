/**
 * A/B-test log ingestion
 *
 * Turns newline-delimited EMF log lines into groupable rows:
 * - Lines without a `metric` field are other metrics and are skipped
 * - Each record declares its dimensions in its first metric directive;
 *   the dimensions of a log are the union over all records
 * - Invalid records are rejected, never patched up with defaults
 */

import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import { IngestionError, describeZodError } from '../api/errors.js';
import type { GroupableRow } from '../grouping/result-grouper.js';
import { SamplePair } from '../testing/sample-pair.js';
import type { RegressionTester } from '../testing/permutation-test.js';
import {
  MISSING,
  NOT_APPLICABLE,
  present,
  type DimensionValue,
} from '../types/dimensions.js';
import { AbTestRecordSchema, type AbTestRecord } from '../types/schemas/emf.js';
import { DimensionScalarSchema } from '../types/schemas/common.js';

/** CloudWatch's name for "no unit" */
const NO_UNIT = 'None';

export interface IngestOptions {
  /** Recompute every p-value with this many resamples */
  resampleCount?: number;

  /** Drop invalid records with a warning instead of failing (default: false) */
  skipInvalid?: boolean;

  /** Tester shared by all sample pairs (default: the process-wide tester) */
  tester?: RegressionTester;

  logger?: Logger;
}

export interface RejectedRecord {
  line: number;
  reason: string;
}

export interface IngestResult {
  rows: GroupableRow[];
  /** Every dimension declared by any record, in order of first declaration */
  dimensions: string[];
  /** Invalid records dropped under `skipInvalid` */
  rejected: RejectedRecord[];
  /** Lines that are not A/B-test results */
  skipped: number;
}

interface ValidRecord {
  raw: Record<string, unknown>;
  record: AbTestRecord;
  buildNumber: number;
  declared: string[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAbTestLog(text: string, options: IngestOptions = {}): IngestResult {
  const { logger } = options;
  const valid: ValidRecord[] = [];
  const rejected: RejectedRecord[] = [];
  let skipped = 0;

  const reject = (error: IngestionError): void => {
    if (!options.skipInvalid) {
      throw error;
    }
    logger?.warn({ line: error.line, err: error.toObject() }, 'Rejected A/B-test record');
    rejected.push({ line: error.line, reason: error.message });
  };

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = index + 1;
    const content = lines[index].trim();
    if (content.length === 0) {
      continue;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      reject(new IngestionError(line, `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`));
      continue;
    }

    if (!isObject(json)) {
      reject(new IngestionError(line, 'Expected a JSON object'));
      continue;
    }
    const raw = json;

    if (raw.metric === undefined || raw.metric === null) {
      skipped++;
      continue;
    }

    const parsed = AbTestRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const { field, message } = describeZodError(parsed.error);
      reject(new IngestionError(line, message, { field }));
      continue;
    }

    const buildNumber = parsed.data.build_number ?? parsed.data.buildkite_build_number;
    if (buildNumber === undefined) {
      reject(
        new IngestionError(line, "Validation error on field 'build_number': Required", { field: 'build_number' })
      );
      continue;
    }

    const declared = parsed.data._aws.CloudWatchMetrics[0].Dimensions[0] ?? [];
    const badDimension = declared.find(
      (dimension) =>
        raw[dimension] !== undefined &&
        raw[dimension] !== null &&
        !DimensionScalarSchema.safeParse(raw[dimension]).success
    );
    if (badDimension !== undefined) {
      reject(
        new IngestionError(line, `Dimension '${badDimension}' must be a string or a number`, {
          field: badDimension,
        })
      );
      continue;
    }

    valid.push({ raw, record: parsed.data, buildNumber, declared });
  }

  const dimensions: string[] = [];
  for (const { declared } of valid) {
    for (const dimension of declared) {
      if (!dimensions.includes(dimension)) {
        dimensions.push(dimension);
      }
    }
  }

  const rows = valid.map(({ raw, record, buildNumber, declared }) => ({
    dimensions: dimensionValues(raw, declared, dimensions),
    sample: new SamplePair(
      {
        dataA: record.data_a,
        dataB: record.data_b,
        precomputedPValue: record.p_value,
        precomputedMeanDifference: record.mean_difference,
        buildNumber,
        unit: meanDifferenceUnit(record),
        metric: record.metric,
        resampleCount: options.resampleCount,
      },
      options.tester
    ),
  }));

  logger?.info(
    { records: rows.length, dimensions: dimensions.length, rejected: rejected.length, skipped },
    'Ingested A/B-test log'
  );

  return { rows, dimensions, rejected, skipped };
}

/**
 * Read and parse an A/B-test log file.
 */
export async function loadAbTestLog(path: string, options: IngestOptions = {}): Promise<IngestResult> {
  const text = await readFile(path, 'utf8');
  return parseAbTestLog(text, options);
}

function dimensionValues(
  raw: Record<string, unknown>,
  declared: readonly string[],
  dimensions: readonly string[]
): Map<string, DimensionValue> {
  const values = new Map<string, DimensionValue>();

  for (const dimension of dimensions) {
    const scalar = DimensionScalarSchema.safeParse(raw[dimension]);
    if (scalar.success) {
      values.set(dimension, present(scalar.data));
    } else if (declared.includes(dimension)) {
      values.set(dimension, MISSING);
    } else {
      values.set(dimension, NOT_APPLICABLE);
    }
  }

  return values;
}

function meanDifferenceUnit(record: AbTestRecord): string {
  for (const directive of record._aws.CloudWatchMetrics) {
    const definition = directive.Metrics.find((metric) => metric.Name === 'mean_difference');
    if (definition?.Unit) {
      return definition.Unit;
    }
  }
  return NO_UNIT;
}
