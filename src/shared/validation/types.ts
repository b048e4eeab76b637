/**
 * Validation Types
 *
 * Type definitions for validation results and errors.
 */

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validation
 */
export type ValidationResult<T> =
  | { isValid: true; value: T; errors: ValidationError[] }
  | { isValid: false; errors: ValidationError[] };
