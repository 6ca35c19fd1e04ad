import type { MultiLineString as GeoJSONMultiLineString } from 'geojson';
import { ErrorKey, GeoJsonType, MIN_LINE_LENGTH } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { nestedListEquals } from './equality.js';
import { GeoJsonObject } from './geojson-object.js';
import { type Position, positionEquals } from './position.js';

export class MultiLineString extends GeoJsonObject {
  readonly kind = GeoJsonType.MULTI_LINE_STRING;
  readonly coordinates: readonly (readonly Position[])[];

  constructor(
    coordinates: readonly (readonly Position[])[] | null,
    type: string = GeoJsonType.MULTI_LINE_STRING
  ) {
    super(type);
    this.coordinates = Object.freeze((coordinates ?? []).map((line) => Object.freeze([...line])));
  }

  static of(...lines: (readonly Position[])[]): MultiLineString {
    return validateOrThrow(new MultiLineString(lines));
  }

  static fromLines(lines: readonly (readonly Position[])[]): MultiLineString {
    return validateOrThrow(new MultiLineString(lines));
  }

  validate(): ValidationResult {
    const errors = this.validateType();
    if (this.coordinates.length === 0) {
      errors.push(
        ValidationError.of('coordinates', 'coordinates should not be empty/blank', ErrorKey.COORDINATES_EMPTY)
      );
    }
    if (this.coordinates.some((line) => line.length < MIN_LINE_LENGTH)) {
      errors.push(
        ValidationError.of(
          'coordinates',
          `coordinates is not valid, minimum ${MIN_LINE_LENGTH} positions required`,
          ErrorKey.COORDINATES_MIN_LENGTH
        )
      );
    }
    for (const position of this.coordinates.flat()) {
      errors.push(...position.validate().errors);
    }
    return new ValidationResult(errors);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof MultiLineString &&
      other.type === this.type &&
      nestedListEquals(this.coordinates, other.coordinates, positionEquals)
    );
  }

  toJSON(): GeoJSONMultiLineString {
    return {
      type: this.kind,
      coordinates: this.coordinates.map((line) => line.map((position) => position.toJSON())),
    };
  }
}
