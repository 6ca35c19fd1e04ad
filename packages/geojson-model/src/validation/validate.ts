/**
 * Validating-factory helpers
 *
 * The model constructors never validate. These helpers are the only place a
 * validation failure turns into a thrown error (`validateOrThrow`) or a
 * discriminated result (`safeValidate`).
 */

import { GeoJsonValidationError } from '../core/errors.js';
import type { Validatable } from './validatable.js';
import type { ValidationError } from './validation-error.js';

export type SafeValidateResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly errors: readonly ValidationError[] };

/**
 * Validate and return the value, or throw GeoJsonValidationError carrying every
 * failure
 */
export function validateOrThrow<T extends Validatable>(value: T): T {
  const result = value.validate();
  if (result.hasErrors()) {
    throw new GeoJsonValidationError('GeoJSON is invalid', result);
  }
  return value;
}

export function safeValidate<T extends Validatable>(value: T): SafeValidateResult<T> {
  const result = value.validate();
  if (result.hasErrors()) {
    return { success: false, errors: result.errors };
  }
  return { success: true, data: value };
}
