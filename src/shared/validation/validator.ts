/**
 * Validator Utilities
 *
 * Runs a Zod schema and reports field-level errors.
 */

import { z } from 'zod';
import { ValidationResult, ValidationError } from './types';

export function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown
): ValidationResult<z.output<S>> {
  const result = schema.safeParse(value);

  if (result.success) {
    return {
      isValid: true,
      value: result.data,
      errors: []
    };
  }

  const errors: ValidationError[] = result.error.errors.map(err => ({
    field: err.path.join('.'),
    message: err.message
  }));

  return {
    isValid: false,
    errors
  };
}

/**
 * Render validation errors as one line each
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map(error => (error.field ? `${error.field}: ${error.message}` : error.message))
    .join('\n');
}
