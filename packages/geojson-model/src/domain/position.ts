/**
 * GeoJSON Position (RFC 7946 section 3.1.1)
 *
 * `[longitude, latitude]` or `[longitude, latitude, altitude]` in WGS84 degrees.
 * Longitude must lie in [-180, 180] and latitude in [-90, 90]; altitude is
 * unconstrained.
 */

import type { Position as GeoJSONPosition } from 'geojson';
import { ErrorKey, LATITUDE_RANGE, LONGITUDE_RANGE } from '../core/constants.js';
import type { Validatable } from '../validation/validatable.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';

export class Position implements Validatable {
  readonly coordinates: readonly number[];

  /**
   * Build a position without validating it. Decoders use this path.
   */
  constructor(coordinates: readonly number[]) {
    this.coordinates = Object.freeze([...coordinates]);
  }

  /**
   * Build and validate, throwing GeoJsonValidationError if out of range
   */
  static of(longitude: number, latitude: number, altitude?: number): Position {
    const coordinates = altitude === undefined ? [longitude, latitude] : [longitude, latitude, altitude];
    return validateOrThrow(new Position(coordinates));
  }

  static fromArray(coordinates: readonly number[]): Position {
    return validateOrThrow(new Position(coordinates));
  }

  get longitude(): number {
    return this.coordinates[0] ?? Number.NaN;
  }

  get latitude(): number {
    return this.coordinates[1] ?? Number.NaN;
  }

  /** `NaN` for a two-dimensional position */
  get altitude(): number {
    return this.coordinates[2] ?? Number.NaN;
  }

  get hasAltitude(): boolean {
    return this.coordinates.length > 2;
  }

  /**
   * Only the first failing rule is reported: arity, then longitude, then
   * latitude. Range checks are meaningless on a malformed arity.
   */
  validate(): ValidationResult {
    const length = this.coordinates.length;
    if (length !== 2 && length !== 3) {
      return ValidationResult.of(
        ValidationError.of(
          'coordinates',
          `coordinates length ${length} is not valid, expected 2 or 3 values`,
          ErrorKey.COORDINATES_LENGTH_INVALID
        )
      );
    }
    if (!inRange(this.longitude, LONGITUDE_RANGE)) {
      return ValidationResult.of(
        ValidationError.of(
          'coordinates',
          `longitude ${this.longitude} is not valid, expected a value between ${LONGITUDE_RANGE.min} and ${LONGITUDE_RANGE.max}`,
          ErrorKey.COORDINATES_LONGITUDE_INVALID
        )
      );
    }
    if (!inRange(this.latitude, LATITUDE_RANGE)) {
      return ValidationResult.of(
        ValidationError.of(
          'coordinates',
          `latitude ${this.latitude} is not valid, expected a value between ${LATITUDE_RANGE.min} and ${LATITUDE_RANGE.max}`,
          ErrorKey.COORDINATES_LATITUDE_INVALID
        )
      );
    }
    return ValidationResult.valid();
  }

  isValid(): boolean {
    return !this.validate().hasErrors();
  }

  hasErrors(): boolean {
    return this.validate().hasErrors();
  }

  /**
   * Element-wise numeric equality; `NaN` equals `NaN` and `-0` equals `0`
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Position)) return false;
    if (other.coordinates.length !== this.coordinates.length) return false;
    return this.coordinates.every((value, index) => sameCoordinate(value, other.coordinates[index]));
  }

  toJSON(): GeoJSONPosition {
    return [...this.coordinates];
  }

  toString(): string {
    return `[${this.coordinates.join(', ')}]`;
  }
}

function sameCoordinate(left: number, right: number | undefined): boolean {
  return left === right || (Number.isNaN(left) && right !== undefined && Number.isNaN(right));
}

function inRange(value: number, range: { readonly min: number; readonly max: number }): boolean {
  return value >= range.min && value <= range.max;
}

export function positionEquals(left: Position, right: Position): boolean {
  return left.equals(right);
}
