import type { GeometryCollection as GeoJSONGeometryCollection } from 'geojson';
import { ErrorKey, GeoJsonType } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals } from './equality.js';
import { GeoJsonObject } from './geojson-object.js';
import type { Geometry } from './geometry.js';

export class GeometryCollection extends GeoJsonObject {
  readonly kind = GeoJsonType.GEOMETRY_COLLECTION;
  readonly geometries: readonly Geometry[];

  constructor(geometries: readonly Geometry[] | null, type: string = GeoJsonType.GEOMETRY_COLLECTION) {
    super(type);
    this.geometries = Object.freeze([...(geometries ?? [])]);
  }

  static of(...geometries: Geometry[]): GeometryCollection {
    return validateOrThrow(new GeometryCollection(geometries));
  }

  static fromGeometries(geometries: readonly Geometry[]): GeometryCollection {
    return validateOrThrow(new GeometryCollection(geometries));
  }

  get size(): number {
    return this.geometries.length;
  }

  /**
   * A nested collection is reported whether or not the member is otherwise
   * valid; members are validated either way.
   */
  validate(): ValidationResult {
    const errors = this.validateType();
    if (this.geometries.some((geometry) => geometry.type === GeoJsonType.GEOMETRY_COLLECTION)) {
      errors.push(
        ValidationError.of(
          'geometries',
          `Field 'geometries' must not have nested '${GeoJsonType.GEOMETRY_COLLECTION}'`,
          ErrorKey.NESTED_GEOMETRY_COLLECTION
        )
      );
    }
    for (const geometry of this.geometries) {
      errors.push(...geometry.validate().errors);
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof GeometryCollection &&
      other.type === this.type &&
      listEquals(this.geometries, other.geometries, (a, b) => a.equals(b))
    );
  }

  toJSON(): GeoJSONGeometryCollection {
    return {
      type: this.kind,
      geometries: this.geometries.map((geometry) => geometry.toJSON()),
    };
  }
}
