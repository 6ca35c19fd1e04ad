import type { MultiPolygon as GeoJSONMultiPolygon } from 'geojson';
import { ErrorKey, GeoJsonType } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals } from './equality.js';
import { GeoJsonObject } from './geojson-object.js';
import type { PolygonCoordinates } from './polygon-coordinates.js';

export class MultiPolygon extends GeoJsonObject {
  readonly kind = GeoJsonType.MULTI_POLYGON;
  readonly coordinates: readonly PolygonCoordinates[];

  constructor(coordinates: readonly PolygonCoordinates[] | null, type: string = GeoJsonType.MULTI_POLYGON) {
    super(type);
    this.coordinates = Object.freeze([...(coordinates ?? [])]);
  }

  static of(...polygons: PolygonCoordinates[]): MultiPolygon {
    return validateOrThrow(new MultiPolygon(polygons));
  }

  static fromPolygons(polygons: readonly PolygonCoordinates[]): MultiPolygon {
    return validateOrThrow(new MultiPolygon(polygons));
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    if (this.coordinates.length < 1) {
      errors.push(
        ValidationError.of(
          'coordinates',
          'coordinates is not valid, at least one polygon required',
          ErrorKey.COORDINATES_MIN_LENGTH
        )
      );
    }
    for (const polygon of this.coordinates) {
      errors.push(...polygon.validate().errors);
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof MultiPolygon &&
      other.type === this.type &&
      listEquals(this.coordinates, other.coordinates, (a, b) => a.equals(b))
    );
  }

  toJSON(): GeoJSONMultiPolygon {
    return {
      type: this.kind,
      coordinates: this.coordinates.map((polygon) => polygon.toJSON()),
    };
  }
}
