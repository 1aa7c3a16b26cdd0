/**
 * Ajv validation instance with schema validators
 * Policy overrides and local input bundles must validate before use
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { ValuationPolicy } from '@/valuation/policy';
import type { ValuationInputFile } from '@/valuation/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

// Lazy-loaded validators
let policyValidator: ValidateFunction<Partial<ValuationPolicy>> | null = null;
let inputValidator: ValidateFunction<ValuationInputFile> | null = null;

export function getPolicyValidator(): ValidateFunction<Partial<ValuationPolicy>> {
  if (!policyValidator) {
    const schema = loadSchema('valuation_policy.v1');
    policyValidator = ajv.compile<Partial<ValuationPolicy>>(schema);
  }
  return policyValidator;
}

export function getInputValidator(): ValidateFunction<ValuationInputFile> {
  if (!inputValidator) {
    const schema = loadSchema('valuation_input.v1');
    inputValidator = ajv.compile<ValuationInputFile>(schema);
  }
  return inputValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validatePolicy(data: unknown): ValidationResult<Partial<ValuationPolicy>> {
  return runValidator(getPolicyValidator(), data);
}

export function validateInput(data: unknown): ValidationResult<ValuationInputFile> {
  return runValidator(getInputValidator(), data);
}
