/**
 * Shared base for Geometry, Feature and FeatureCollection
 *
 * `type` is the discriminator as it was supplied (decoded or passed to the
 * constructor) and is checked by validation. `kind` is the variant the class
 * represents; it is what the encoder emits and what exhaustive `switch`
 * statements narrow on.
 */

import type {
  Feature as GeoJSONFeature,
  FeatureCollection as GeoJSONFeatureCollection,
  Geometry as GeoJSONGeometry,
} from 'geojson';
import { ErrorKey, type GeoJsonTypeName } from '../core/constants.js';
import type { Validatable } from '../validation/validatable.js';
import { ValidationError } from '../validation/validation-error.js';
import type { ValidationResult } from '../validation/validation-result.js';

/** Canonical RFC 7946 encoding of any model object */
export type GeoJsonObjectJSON =
  | GeoJSONGeometry
  | GeoJSONFeature<GeoJSONGeometry | null>
  | GeoJSONFeatureCollection<GeoJSONGeometry | null>;

export abstract class GeoJsonObject implements Validatable {
  abstract readonly kind: GeoJsonTypeName;

  protected constructor(readonly type: string) {}

  abstract validate(): ValidationResult;

  abstract toJSON(): GeoJsonObjectJSON;

  abstract equals(other: unknown): boolean;

  isValid(): boolean {
    return !this.validate().hasErrors();
  }

  hasErrors(): boolean {
    return this.validate().hasErrors();
  }

  /**
   * `type.invalid` when the discriminator is blank or not the canonical name
   */
  protected validateType(): ValidationError[] {
    if (typeof this.type !== 'string' || this.type.trim().length === 0 || this.type !== this.kind) {
      return [
        ValidationError.of(
          'type',
          `type '${String(this.type)}' is not valid. expected '${this.kind}'`,
          ErrorKey.TYPE_INVALID
        ),
      ];
    }
    return [];
  }

  toString(): string {
    return `${this.kind}${JSON.stringify(this.toJSON())}`;
  }
}
