/**
 * GeoJSON Error Types
 *
 * Two failure channels that are never conflated:
 *
 * - GeoJsonDecodeError: the input could not be turned into a model value at all
 *   (malformed JSON, unknown or missing `type`, wrong field shape). No partial
 *   object is produced.
 * - GeoJsonValidationError: a well-formed value broke a GeoJSON rule. Raised only
 *   by the validating factories (`Point.of(...)`, `validateOrThrow(...)`); plain
 *   `validate()` calls return a ValidationResult instead.
 */

import type { ZodIssue } from 'zod';
import type { ValidationError } from '../validation/validation-error.js';
import type { ValidationResult } from '../validation/validation-result.js';

/**
 * Error thrown by a validating factory when the constructed value is invalid
 *
 * Carries the full error set so callers can branch on stable keys.
 *
 * @example
 * ```typescript
 * try {
 *   Position.of(200, 10);
 * } catch (error) {
 *   if (isGeoJsonValidationError(error)) {
 *     error.keys; // ['coordinates.longitude.invalid']
 *   }
 * }
 * ```
 */
export class GeoJsonValidationError extends Error {
  public readonly name = 'GeoJsonValidationError' as const;

  constructor(
    message: string,
    public readonly result: ValidationResult
  ) {
    super(message);
    Object.setPrototypeOf(this, GeoJsonValidationError.prototype);
  }

  get errors(): readonly ValidationError[] {
    return this.result.errors;
  }

  get keys(): readonly string[] {
    return [...this.result.keys()];
  }

  /**
   * Get formatted summary of validation failures
   */
  getSummary(): string {
    const lines = [`${this.message} (${this.result.size} error(s)):`];
    for (const error of this.result.errors) {
      lines.push(`  - [${error.key}] ${error.field}: ${error.message}`);
    }
    return lines.join('\n');
  }
}

/**
 * Error thrown when JSON input cannot be decoded into a GeoJSON value
 *
 * `path` locates the offending node using a JSONPath-like notation
 * (`$.features[2].geometry`).
 */
export class GeoJsonDecodeError extends Error {
  public readonly name = 'GeoJsonDecodeError' as const;

  constructor(
    message: string,
    public readonly path: string = '$',
    public readonly issues: readonly ZodIssue[] = [],
    options?: { cause?: unknown }
  ) {
    super(`${message} at ${path}`, options);
    Object.setPrototypeOf(this, GeoJsonDecodeError.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`GeoJsonDecodeError: ${this.message}`];
    for (const issue of this.issues) {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      parts.push(`  ${where}: ${issue.message}`);
    }
    return parts.join('\n');
  }
}

/**
 * Type guard to check if an error is a GeoJsonValidationError
 */
export function isGeoJsonValidationError(error: unknown): error is GeoJsonValidationError {
  return error instanceof GeoJsonValidationError;
}

/**
 * Type guard to check if an error is a GeoJsonDecodeError
 */
export function isGeoJsonDecodeError(error: unknown): error is GeoJsonDecodeError {
  return error instanceof GeoJsonDecodeError;
}
