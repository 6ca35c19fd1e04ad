/**
 * Polymorphic GeoJSON type resolver
 *
 * Maps each `type` discriminator to the decoder for its concrete class. The
 * match is exact and case-sensitive; anything outside the nine RFC 7946 types
 * is a decode failure. The same registry backs every entry point, so decoding
 * a value as GeoJSON, as a Geometry or as its named class gives equal results.
 *
 * Decoders build values without validating them. The decoded `type` is passed
 * through to the constructed value so it re-encodes unchanged.
 *
 * @module codec/type-resolver
 */

import type { z } from 'zod';
import { GeoJsonType, type GeoJsonTypeName } from '../core/constants.js';
import { GeoJsonDecodeError } from '../core/errors.js';
import { Feature, type FeatureProperties } from '../domain/feature.js';
import { FeatureCollection } from '../domain/feature-collection.js';
import {
  type GeoJson,
  type GeoJsonTypeMap,
  isGeoJsonTypeName,
  isGeometryTypeName,
} from '../domain/geojson.js';
import type { Geometry } from '../domain/geometry.js';
import { GeometryCollection } from '../domain/geometry-collection.js';
import { LineString } from '../domain/line-string.js';
import { MultiLineString } from '../domain/multi-line-string.js';
import { MultiPoint } from '../domain/multi-point.js';
import { MultiPolygon } from '../domain/multi-polygon.js';
import { Point } from '../domain/point.js';
import { Polygon } from '../domain/polygon.js';
import { PolygonCoordinates } from '../domain/polygon-coordinates.js';
import { Position } from '../domain/position.js';
import {
  EnvelopeSchema,
  FeatureCollectionShape,
  FeatureShape,
  GeometryCollectionShape,
  MultiPolygonShape,
  PointShape,
  PositionListShape,
  RingListShape,
} from './schemas.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Decode one JSON value whose discriminator has already been matched.
 * `path` locates the value for error reporting.
 */
export type Decoder<T extends GeoJson> = (value: unknown, path: string, type: string) => T;

export type DecoderRegistry = {
  readonly [K in GeoJsonTypeName]: Decoder<GeoJsonTypeMap[K]>;
};

// ============================================================================
// Shape Helpers
// ============================================================================

function parseShape<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  path: string,
  type: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new GeoJsonDecodeError(`'${type}' has a malformed field`, path, result.error.issues);
  }
  return result.data;
}

const toPosition = (coordinates: readonly number[]): Position => new Position(coordinates);

const toPositions = (list: readonly (readonly number[])[] | null | undefined): Position[] =>
  (list ?? []).map(toPosition);

const toPolygonCoordinates = (rings: readonly (readonly (readonly number[])[])[]): PolygonCoordinates =>
  PolygonCoordinates.fromRings(rings.map(toPositions));

/**
 * The property map as it appears in the input. The zod record output omits a
 * `__proto__` key, so the schema only checks the shape and the entries are
 * copied from the raw value.
 */
function ownProperties(value: unknown): FeatureProperties | null {
  if (typeof value !== 'object' || value === null || !('properties' in value)) return null;
  const { properties } = value;
  if (typeof properties !== 'object' || properties === null) return null;
  return Object.fromEntries(Object.entries(properties));
}

// ============================================================================
// Resolver
// ============================================================================

export class GeoJsonTypeResolver {
  private readonly decoders: DecoderRegistry = {
    Point: (value, path, type) => {
      const { coordinates } = parseShape(PointShape, value, path, type);
      return new Point(coordinates ? toPosition(coordinates) : null, type);
    },
    MultiPoint: (value, path, type) => {
      const { coordinates } = parseShape(PositionListShape, value, path, type);
      return new MultiPoint(toPositions(coordinates), type);
    },
    LineString: (value, path, type) => {
      const { coordinates } = parseShape(PositionListShape, value, path, type);
      return new LineString(toPositions(coordinates), type);
    },
    MultiLineString: (value, path, type) => {
      const { coordinates } = parseShape(RingListShape, value, path, type);
      return new MultiLineString((coordinates ?? []).map(toPositions), type);
    },
    Polygon: (value, path, type) => {
      const { coordinates } = parseShape(RingListShape, value, path, type);
      return new Polygon(coordinates ? toPolygonCoordinates(coordinates) : null, type);
    },
    MultiPolygon: (value, path, type) => {
      const { coordinates } = parseShape(MultiPolygonShape, value, path, type);
      return new MultiPolygon((coordinates ?? []).map(toPolygonCoordinates), type);
    },
    GeometryCollection: (value, path, type) => {
      const { geometries } = parseShape(GeometryCollectionShape, value, path, type);
      return new GeometryCollection(
        (geometries ?? []).map((member, index) => this.decodeGeometry(member, `${path}.geometries[${index}]`)),
        type
      );
    },
    Feature: (value, path, type) => {
      const shape = parseShape(FeatureShape, value, path, type);
      const geometry =
        shape.geometry === null || shape.geometry === undefined
          ? null
          : this.decodeGeometry(shape.geometry, `${path}.geometry`);
      const id = shape.id === null || shape.id === undefined ? null : String(shape.id);
      return new Feature(id, geometry, shape.properties ? ownProperties(value) : null, type);
    },
    FeatureCollection: (value, path, type) => {
      const { features } = parseShape(FeatureCollectionShape, value, path, type);
      return new FeatureCollection(
        (features ?? []).map((member, index) =>
          this.decodeAs(GeoJsonType.FEATURE, member, `${path}.features[${index}]`)
        ),
        type
      );
    },
  };

  /**
   * Discriminators this resolver dispatches on
   */
  get supportedTypes(): readonly GeoJsonTypeName[] {
    return Object.keys(this.decoders).filter(isGeoJsonTypeName);
  }

  /**
   * Read the `type` member of a JSON object without consuming it
   */
  readDiscriminator(value: unknown, path = '$'): string {
    const result = EnvelopeSchema.safeParse(value);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? 'expected a GeoJSON object';
      throw new GeoJsonDecodeError(`Cannot resolve GeoJSON type: ${reason}`, path, result.error.issues);
    }
    return result.data.type;
  }

  /**
   * Decode any of the nine GeoJSON types
   */
  decode(value: unknown, path = '$'): GeoJson {
    const type = this.readDiscriminator(value, path);
    if (!isGeoJsonTypeName(type)) {
      throw new GeoJsonDecodeError(`Unknown GeoJSON type '${type}'`, path);
    }
    return this.decoders[type](value, path, type);
  }

  /**
   * Decode one of the seven geometry types; Feature and FeatureCollection are
   * rejected here
   */
  decodeGeometry(value: unknown, path = '$'): Geometry {
    const type = this.readDiscriminator(value, path);
    if (isGeometryTypeName(type)) {
      return this.decoders[type](value, path, type);
    }
    if (isGeoJsonTypeName(type)) {
      throw new GeoJsonDecodeError(`'${type}' is not a geometry type`, path);
    }
    throw new GeoJsonDecodeError(`Unknown geometry type '${type}'`, path);
  }

  /**
   * Decode a value that must carry the named discriminator
   */
  decodeAs<K extends GeoJsonTypeName>(expected: K, value: unknown, path = '$'): GeoJsonTypeMap[K] {
    const type = this.readDiscriminator(value, path);
    if (type !== expected) {
      throw new GeoJsonDecodeError(`Expected type '${expected}' but found '${type}'`, path);
    }
    const decoder: Decoder<GeoJsonTypeMap[K]> = this.decoders[expected];
    return decoder(value, path, type);
  }
}

/** Shared resolver used by the module-level decode functions */
export const typeResolver = new GeoJsonTypeResolver();
