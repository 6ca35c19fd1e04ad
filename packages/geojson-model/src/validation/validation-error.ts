/**
 * A single labelled validation failure.
 *
 * `key` is the stable identifier callers branch on (or translate); `message` is
 * for humans and may change wording freely.
 */
export class ValidationError {
  readonly field: string;
  readonly message: string;
  readonly key: string;

  constructor(field: string, message: string, key: string) {
    if (typeof field !== 'string' || field.trim().length === 0) {
      throw new TypeError('ValidationError requires a non-blank field');
    }
    if (typeof key !== 'string' || key.trim().length === 0) {
      throw new TypeError('ValidationError requires a non-blank key');
    }
    if (typeof message !== 'string') {
      throw new TypeError('ValidationError requires a message');
    }
    this.field = field;
    this.message = message;
    this.key = key;
    Object.freeze(this);
  }

  static of(field: string, message: string, key: string): ValidationError {
    return new ValidationError(field, message, key);
  }

  /**
   * Identity used for set membership: two errors with the same field, key and
   * message are the same error.
   */
  get identity(): string {
    return `${this.field}\u0000${this.key}\u0000${this.message}`;
  }

  /**
   * Copy of this error with its field qualified under a parent field
   * (`coordinates` under `geometry` becomes `geometry.coordinates`).
   */
  withFieldPrefix(prefix: string): ValidationError {
    return new ValidationError(`${prefix}.${this.field}`, this.message, this.key);
  }

  equals(other: unknown): boolean {
    return other instanceof ValidationError && other.identity === this.identity;
  }

  toJSON(): { field: string; message: string; key: string } {
    return { field: this.field, message: this.message, key: this.key };
  }

  toString(): string {
    return `ValidationError{field='${this.field}', key='${this.key}', message='${this.message}'}`;
  }
}
