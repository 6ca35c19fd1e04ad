/**
 * GeoJSON Feature (RFC 7946 section 3.2)
 *
 * Pairs a geometry with an open property map. Properties are never validated;
 * geometry errors are merged with their field qualified under `geometry`.
 */

import type { Feature as GeoJSONFeature, Geometry as GeoJSONGeometry } from 'geojson';
import { isDeepStrictEqual } from 'node:util';
import { ErrorKey, GeoJsonType } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { GeoJsonObject } from './geojson-object.js';
import type { Geometry } from './geometry.js';

export type FeatureProperties = Readonly<Record<string, unknown>>;

export class Feature extends GeoJsonObject {
  readonly kind = GeoJsonType.FEATURE;
  readonly id: string | null;
  readonly geometry: Geometry | null;
  readonly properties: FeatureProperties;

  constructor(
    id: string | null,
    geometry: Geometry | null,
    properties: FeatureProperties | null = null,
    type: string = GeoJsonType.FEATURE
  ) {
    super(type);
    this.id = id;
    this.geometry = geometry;
    this.properties = Object.freeze({ ...(properties ?? {}) });
  }

  static of(id: string | null, geometry: Geometry, properties: FeatureProperties | null = null): Feature {
    return validateOrThrow(new Feature(id, geometry, properties));
  }

  getProperty(name: string): unknown {
    return this.hasProperty(name) ? this.properties[name] : undefined;
  }

  hasProperty(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.properties, name);
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    if (!this.geometry) {
      errors.push(
        ValidationError.of('geometry', 'geometry should not be empty/blank', ErrorKey.GEOMETRY_EMPTY)
      );
    } else {
      errors.push(...this.geometry.validate().errors.map((error) => error.withFieldPrefix('geometry')));
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Feature) || other.type !== this.type || other.id !== this.id) {
      return false;
    }
    const sameGeometry =
      this.geometry === null || other.geometry === null
        ? this.geometry === other.geometry
        : this.geometry.equals(other.geometry);
    return sameGeometry && isDeepStrictEqual(this.properties, other.properties);
  }

  /**
   * `id` is omitted when absent; an absent geometry encodes as `null`
   */
  toJSON(): GeoJSONFeature<GeoJSONGeometry | null> {
    return {
      type: this.kind,
      ...(this.id !== null ? { id: this.id } : {}),
      geometry: this.geometry?.toJSON() ?? null,
      properties: { ...this.properties },
    };
  }
}
