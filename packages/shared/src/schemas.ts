/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for voter records and batch summaries.
 * Record schemas are derived from each layout's declared columns; the batch
 * summary schema is loaded from docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import type { VoterRecord } from './types';
import type { FormatMatcher } from './matchers/types';
import { getMatchers } from './matchers';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

const recordValidators = new WeakMap<FormatMatcher, ValidateFunction>();
let batchSummaryValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

/**
 * JSON schema for records of one layout: every declared column present as
 * a non-empty string, nothing else.
 */
export function recordSchemaFor(matcher: FormatMatcher): object {
  return {
    type: 'object',
    required: [...matcher.columns],
    additionalProperties: false,
    properties: Object.fromEntries(
      matcher.columns.map((column) => [column, { type: 'string', minLength: 1 }])
    ),
  };
}

function getRecordValidator(matcher: FormatMatcher): ValidateFunction {
  const cached = recordValidators.get(matcher);
  if (cached) return cached;

  const validate = ajv.compile(recordSchemaFor(matcher));
  recordValidators.set(matcher, validate);
  return validate;
}

function getBatchSummaryValidator(): ValidateFunction {
  if (!batchSummaryValidator) {
    batchSummaryValidator = ajv.compile(loadSchema('batch_summary.schema.json'));
  }
  return batchSummaryValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function formatErrors(validate: ValidateFunction): string[] | undefined {
  return validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a record against the columns of the layout that produced it.
 * `matchers` must be the set the record was classified with.
 */
export function validateRecord(
  record: VoterRecord,
  matchers: readonly FormatMatcher[] = getMatchers()
): ValidationResult {
  const matcher = matchers.find((m) => m.layout === record.layout);
  if (!matcher) {
    return { valid: false, errors: [`unknown layout: ${record.layout}`] };
  }

  const validate = getRecordValidator(matcher);
  if (!validate(record.fields)) {
    return { valid: false, errors: formatErrors(validate) };
  }

  return { valid: true };
}

/**
 * Validate a BatchSummary against batch_summary.schema.json
 */
export function validateBatchSummary(data: unknown): ValidationResult {
  const validate = getBatchSummaryValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('BatchSummary validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
