/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for model verdicts and verification reports.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { AuthenticityVerdict } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
});
addFormats(ajv);

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

// Compiled lazily on first use
let verdictValidator: ValidateFunction<AuthenticityVerdict> | null = null;
let reportValidator: ValidateFunction | null = null;

function getVerdictValidator(): ValidateFunction<AuthenticityVerdict> {
  if (!verdictValidator) {
    verdictValidator = ajv.compile<AuthenticityVerdict>(loadSchema('authenticity_verdict.schema.json'));
  }
  return verdictValidator;
}

function getReportValidator(): ValidateFunction {
  if (!reportValidator) {
    reportValidator = ajv.compile(loadSchema('verification_report.schema.json'));
  }
  return reportValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function describeErrors(validate: ValidateFunction): string[] {
  return (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Check a parsed authenticity reply against authenticity_verdict.schema.json
 */
export function checkVerdict(data: unknown): { valid: true; verdict: AuthenticityVerdict } | { valid: false; errors: string[] } {
  const validate = getVerdictValidator();

  if (validate(data)) {
    return { valid: true, verdict: data };
  }
  return { valid: false, errors: describeErrors(validate) };
}

/**
 * Validate a single or pair VerificationReport against verification_report.schema.json
 */
export function validateReport(data: unknown): ValidationResult {
  const validate = getReportValidator();

  if (!validate(data)) {
    const errors = describeErrors(validate);
    logger.warn('VerificationReport validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
