import type { FeatureCollection as GeoJSONFeatureCollection, Geometry as GeoJSONGeometry } from 'geojson';
import { GeoJsonType } from '../core/constants.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals } from './equality.js';
import type { Feature } from './feature.js';
import { GeoJsonObject } from './geojson-object.js';

/**
 * GeoJSON FeatureCollection (RFC 7946 section 3.3)
 *
 * An empty collection is valid; only a wrong `type` or an invalid member fails.
 */
export class FeatureCollection extends GeoJsonObject {
  readonly kind = GeoJsonType.FEATURE_COLLECTION;
  readonly features: readonly Feature[];

  constructor(features: readonly Feature[] | null, type: string = GeoJsonType.FEATURE_COLLECTION) {
    super(type);
    this.features = Object.freeze([...(features ?? [])]);
  }

  static of(...features: Feature[]): FeatureCollection {
    return validateOrThrow(new FeatureCollection(features));
  }

  static fromFeatures(features: readonly Feature[]): FeatureCollection {
    return validateOrThrow(new FeatureCollection(features));
  }

  get size(): number {
    return this.features.length;
  }

  findById(id: string): Feature | undefined {
    return this.features.find((feature) => feature.id === id);
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    for (const feature of this.features) {
      errors.push(...feature.validate().errors);
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof FeatureCollection &&
      other.type === this.type &&
      listEquals(this.features, other.features, (a, b) => a.equals(b))
    );
  }

  toJSON(): GeoJSONFeatureCollection<GeoJSONGeometry | null> {
    return {
      type: this.kind,
      features: this.features.map((feature) => feature.toJSON()),
    };
  }
}
