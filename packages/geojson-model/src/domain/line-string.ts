import type { LineString as GeoJSONLineString } from 'geojson';
import { GeoJsonType } from '../core/constants.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals } from './equality.js';
import { GeoJsonObject } from './geojson-object.js';
import { validatePositionList } from './multi-point.js';
import { type Position, positionEquals } from './position.js';

export class LineString extends GeoJsonObject {
  readonly kind = GeoJsonType.LINE_STRING;
  readonly coordinates: readonly Position[];

  constructor(coordinates: readonly Position[] | null, type: string = GeoJsonType.LINE_STRING) {
    super(type);
    this.coordinates = Object.freeze([...(coordinates ?? [])]);
  }

  static of(...positions: Position[]): LineString {
    return validateOrThrow(new LineString(positions));
  }

  static fromPositions(positions: readonly Position[]): LineString {
    return validateOrThrow(new LineString(positions));
  }

  validate(): ValidationResult {
    return new ValidationResult([
      ...this.validateType(),
      ...validatePositionList(this.coordinates),
    ]);
  }

  equals(other: unknown): boolean {
    return (
      other instanceof LineString &&
      other.type === this.type &&
      listEquals(this.coordinates, other.coordinates, positionEquals)
    );
  }

  toJSON(): GeoJSONLineString {
    return {
      type: this.kind,
      coordinates: this.coordinates.map((position) => position.toJSON()),
    };
  }
}
