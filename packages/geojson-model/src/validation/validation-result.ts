/**
 * Aggregate of zero or more validation failures
 *
 * Behaves as a set: adding an error that is already present (same field, key and
 * message) is a no-op, and equality ignores order.
 */

import { ValidationError } from './validation-error.js';

export interface ValidationResultJSON {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<ReturnType<ValidationError['toJSON']>>;
}

export class ValidationResult {
  private static readonly EMPTY = new ValidationResult([]);

  private readonly byIdentity: ReadonlyMap<string, ValidationError>;

  constructor(errors: Iterable<ValidationError>) {
    const map = new Map<string, ValidationError>();
    for (const error of errors) {
      if (!map.has(error.identity)) {
        map.set(error.identity, error);
      }
    }
    this.byIdentity = map;
  }

  static valid(): ValidationResult {
    return ValidationResult.EMPTY;
  }

  static of(...errors: ValidationError[]): ValidationResult {
    return new ValidationResult(errors);
  }

  /** Errors in first-seen order */
  get errors(): readonly ValidationError[] {
    return [...this.byIdentity.values()];
  }

  get size(): number {
    return this.byIdentity.size;
  }

  hasErrors(): boolean {
    return this.byIdentity.size > 0;
  }

  keys(): ReadonlySet<string> {
    return new Set(this.errors.map((error) => error.key));
  }

  hasErrorKey(key: string): boolean {
    return this.errors.some((error) => error.key === key);
  }

  hasErrorField(field: string): boolean {
    return this.errors.some((error) => error.field === field);
  }

  /**
   * Union of this result with others
   */
  merge(...others: ValidationResult[]): ValidationResult {
    if (others.every((other) => !other.hasErrors())) {
      return this;
    }
    return new ValidationResult([...this.errors, ...others.flatMap((other) => other.errors)]);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof ValidationResult) || other.size !== this.size) {
      return false;
    }
    for (const identity of this.byIdentity.keys()) {
      if (!other.byIdentity.has(identity)) {
        return false;
      }
    }
    return true;
  }

  toJSON(): ValidationResultJSON {
    return {
      valid: !this.hasErrors(),
      errors: this.errors.map((error) => error.toJSON()),
    };
  }
}
