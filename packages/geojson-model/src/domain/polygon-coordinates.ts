/**
 * Polygon coordinates: one exterior linear ring and zero or more holes
 *
 * A linear ring is a closed sequence of at least four positions whose first
 * and last positions are equal (RFC 7946 section 3.1.6). Winding order is not
 * checked.
 */

import type { Position as GeoJSONPosition } from 'geojson';
import { ErrorKey, MIN_RING_LENGTH } from '../core/constants.js';
import type { Validatable } from '../validation/validatable.js';
import { ValidationError } from '../validation/validation-error.js';
import { ValidationResult } from '../validation/validation-result.js';
import { validateOrThrow } from '../validation/validate.js';
import { listEquals, nestedListEquals } from './equality.js';
import { type Position, positionEquals } from './position.js';

export type LinearRing = readonly Position[];

type RingRole = 'exterior' | 'hole';

export class PolygonCoordinates implements Validatable {
  readonly exterior: LinearRing;
  readonly holes: readonly LinearRing[];

  constructor(exterior: LinearRing | null, holes: readonly LinearRing[] | null = null) {
    this.exterior = Object.freeze([...(exterior ?? [])]);
    this.holes = Object.freeze((holes ?? []).map((hole) => Object.freeze([...hole])));
  }

  /**
   * Ring 0 is the exterior and the rest are holes. No rings at all gives an
   * empty exterior, which fails validation rather than construction.
   */
  static fromRings(rings: readonly LinearRing[] | null): PolygonCoordinates {
    const [exterior, ...holes] = rings ?? [];
    return new PolygonCoordinates(exterior ?? [], holes);
  }

  static of(exterior: LinearRing, holes: readonly LinearRing[] = []): PolygonCoordinates {
    return validateOrThrow(new PolygonCoordinates(exterior, holes));
  }

  static ofRings(rings: readonly LinearRing[]): PolygonCoordinates {
    return validateOrThrow(PolygonCoordinates.fromRings(rings));
  }

  /**
   * `[exterior, ...holes]`, the shape of the `coordinates` member on the wire
   */
  get rings(): readonly LinearRing[] {
    return [this.exterior, ...this.holes];
  }

  get hasHoles(): boolean {
    return this.holes.length > 0;
  }

  validate(): ValidationResult {
    return new ValidationResult([
      ...validateLinearRing(this.exterior, 'exterior'),
      ...this.holes.flatMap((hole) => validateLinearRing(hole, 'hole')),
    ]);
  }

  isValid(): boolean {
    return !this.validate().hasErrors();
  }

  hasErrors(): boolean {
    return this.validate().hasErrors();
  }

  equals(other: unknown): boolean {
    return (
      other instanceof PolygonCoordinates &&
      listEquals(this.exterior, other.exterior, positionEquals) &&
      nestedListEquals(this.holes, other.holes, positionEquals)
    );
  }

  toJSON(): GeoJSONPosition[][] {
    return this.rings.map((ring) => ring.map((position) => position.toJSON()));
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

/**
 * Every check runs; a short ring is also reported as open if its ends differ.
 */
function validateLinearRing(ring: LinearRing, role: RingRole): ValidationError[] {
  const errors: ValidationError[] = [];
  const label = JSON.stringify(ring.map((position) => position.toJSON()));

  if (ring.length === 0) {
    errors.push(
      role === 'exterior'
        ? ValidationError.of('coordinates', 'Exterior linear ring should not be blank/empty.', ErrorKey.EXTERIOR_RING_EMPTY)
        : ValidationError.of('coordinates', 'Hole linear ring should not be blank/empty.', ErrorKey.HOLE_RING_EMPTY)
    );
  }

  if (ring.length < MIN_RING_LENGTH) {
    errors.push(
      ValidationError.of(
        'coordinates',
        `Ring '${label}' must contain at least ${MIN_RING_LENGTH} positions.`,
        ErrorKey.RING_LENGTH_INVALID
      )
    );
  }

  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first !== undefined && last !== undefined && !first.equals(last)) {
    errors.push(
      ValidationError.of(
        'coordinates',
        `Ring '${label}', first and last position must be the same.`,
        ErrorKey.RING_NOT_CLOSED
      )
    );
  }

  for (const position of ring) {
    errors.push(...position.validate().errors);
  }

  return errors;
}
