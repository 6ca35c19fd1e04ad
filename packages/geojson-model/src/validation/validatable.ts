import type { ValidationResult } from './validation-result.js';

/**
 * Capability shared by every model entity.
 *
 * `validate()` is pure: it never mutates, never throws for data-level problems
 * and returns equal results on repeated calls.
 */
export interface Validatable {
  validate(): ValidationResult;
  isValid(): boolean;
  hasErrors(): boolean;
}

export function isValidatable(value: unknown): value is Validatable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'validate' in value &&
    typeof value.validate === 'function'
  );
}
