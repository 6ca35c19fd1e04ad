import type { Point as GeoJSONPoint } from 'geojson';
import { ErrorKey, GeoJsonType } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { GeoJsonObject } from './geojson-object.js';
import { Position } from './position.js';

export class Point extends GeoJsonObject {
  readonly kind = GeoJsonType.POINT;
  readonly coordinates: Position | null;

  constructor(coordinates: Position | null, type: string = GeoJsonType.POINT) {
    super(type);
    this.coordinates = coordinates;
  }

  static of(position: Position): Point;
  static of(longitude: number, latitude: number, altitude?: number): Point;
  static of(first: Position | number, latitude?: number, altitude?: number): Point {
    const position =
      first instanceof Position
        ? first
        : new Position(altitude === undefined ? [first, latitude ?? Number.NaN] : [first, latitude ?? Number.NaN, altitude]);
    return validateOrThrow(new Point(position));
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    if (!this.coordinates) {
      errors.push(
        ValidationError.of('coordinates', 'coordinates should not be empty/blank', ErrorKey.COORDINATES_EMPTY)
      );
    } else {
      errors.push(...this.coordinates.validate().errors);
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Point) || other.type !== this.type) return false;
    if (this.coordinates === null || other.coordinates === null) {
      return this.coordinates === other.coordinates;
    }
    return this.coordinates.equals(other.coordinates);
  }

  /**
   * An absent position encodes as an empty coordinate array
   */
  toJSON(): GeoJSONPoint {
    return {
      type: this.kind,
      coordinates: this.coordinates?.toJSON() ?? [],
    };
  }
}
