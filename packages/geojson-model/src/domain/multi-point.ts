import type { MultiPoint as GeoJSONMultiPoint } from 'geojson';
import { ErrorKey, GeoJsonType, MIN_LINE_LENGTH } from '../core/constants.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals } from './equality.js';
import { GeoJsonObject } from './geojson-object.js';
import { type Position, positionEquals } from './position.js';

export class MultiPoint extends GeoJsonObject {
  readonly kind = GeoJsonType.MULTI_POINT;
  readonly coordinates: readonly Position[];

  constructor(coordinates: readonly Position[] | null, type: string = GeoJsonType.MULTI_POINT) {
    super(type);
    this.coordinates = Object.freeze([...(coordinates ?? [])]);
  }

  static of(...positions: Position[]): MultiPoint {
    return validateOrThrow(new MultiPoint(positions));
  }

  static fromPositions(positions: readonly Position[]): MultiPoint {
    return validateOrThrow(new MultiPoint(positions));
  }

  validate(): ValidationResult {
    return new ValidationResult([
      ...this.validateType(),
      ...validatePositionList(this.coordinates),
    ]);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof MultiPoint &&
      other.type === this.type &&
      listEquals(this.coordinates, other.coordinates, positionEquals)
    );
  }

  toJSON(): GeoJSONMultiPoint {
    return {
      type: this.kind,
      coordinates: this.coordinates.map((position) => position.toJSON()),
    };
  }
}

/**
 * Shared by MultiPoint and LineString: non-empty, at least two positions, each
 * position valid. An empty list reports both the emptiness and the minimum.
 */
export function validatePositionList(positions: readonly Position[]): ValidationError[] {
  const errors: ValidationError[] = [];
  if (positions.length === 0) {
    errors.push(
      ValidationError.of('coordinates', 'coordinates should not be empty/blank', ErrorKey.COORDINATES_EMPTY)
    );
  }
  if (positions.length < MIN_LINE_LENGTH) {
    errors.push(
      ValidationError.of(
        'coordinates',
        `coordinates is not valid, minimum ${MIN_LINE_LENGTH} positions required`,
        ErrorKey.COORDINATES_MIN_LENGTH
      )
    );
  }
  for (const position of positions) {
    errors.push(...position.validate().errors);
  }
  return errors;
}
