import type { Polygon as GeoJSONPolygon } from 'geojson';
import { ErrorKey, GeoJsonType } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { GeoJsonObject } from './geojson-object.js';
import { type LinearRing, PolygonCoordinates } from './polygon-coordinates.js';

export class Polygon extends GeoJsonObject {
  readonly kind = GeoJsonType.POLYGON;
  readonly coordinates: PolygonCoordinates | null;

  constructor(coordinates: PolygonCoordinates | null, type: string = GeoJsonType.POLYGON) {
    super(type);
    this.coordinates = coordinates;
  }

  static of(coordinates: PolygonCoordinates): Polygon;
  static of(exterior: LinearRing, ...holes: LinearRing[]): Polygon;
  static of(first: PolygonCoordinates | LinearRing, ...holes: LinearRing[]): Polygon {
    const coordinates = first instanceof PolygonCoordinates ? first : new PolygonCoordinates(first, holes);
    return validateOrThrow(new Polygon(coordinates));
  }

  /**
   * From the wire layout: ring 0 is the exterior, the rest are holes
   */
  static ofRings(rings: readonly LinearRing[]): Polygon {
    return validateOrThrow(new Polygon(PolygonCoordinates.fromRings(rings)));
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    if (!this.coordinates) {
      errors.push(
        ValidationError.of('coordinates', 'coordinates should not be empty/blank', ErrorKey.COORDINATES_EMPTY)
      );
      return new ValidationResult(errors);
    }
    if (this.coordinates.exterior.length === 0) {
      errors.push(
        ValidationError.of(
          'coordinates',
          'coordinates is not valid, at least one position required',
          ErrorKey.COORDINATES_MIN_LENGTH
        )
      );
    }
    errors.push(...this.coordinates.validate().errors);
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Polygon) || other.type !== this.type) return false;
    if (this.coordinates === null || other.coordinates === null) {
      return this.coordinates === other.coordinates;
    }
    return this.coordinates.equals(other.coordinates);
  }

  toJSON(): GeoJSONPolygon {
    return {
      type: this.kind,
      coordinates: this.coordinates?.toJSON() ?? [],
    };
  }
}
