/**
 * GeoJSON Constants
 *
 * Canonical type discriminators (RFC 7946 section 1.4) and the stable error keys
 * emitted by the validators. Keys are machine-comparable and never change with the
 * human-readable message.
 *
 * @module core/constants
 */

// ============================================================================
// Type Discriminators
// ============================================================================

export const GeoJsonType = {
  POINT: 'Point',
  MULTI_POINT: 'MultiPoint',
  LINE_STRING: 'LineString',
  MULTI_LINE_STRING: 'MultiLineString',
  POLYGON: 'Polygon',
  MULTI_POLYGON: 'MultiPolygon',
  GEOMETRY_COLLECTION: 'GeometryCollection',
  FEATURE: 'Feature',
  FEATURE_COLLECTION: 'FeatureCollection',
} as const;

export type GeoJsonTypeName = (typeof GeoJsonType)[keyof typeof GeoJsonType];

export type GeometryTypeName = Exclude<
  GeoJsonTypeName,
  typeof GeoJsonType.FEATURE | typeof GeoJsonType.FEATURE_COLLECTION
>;

export const GEOMETRY_TYPE_NAMES: readonly GeometryTypeName[] = [
  GeoJsonType.POINT,
  GeoJsonType.MULTI_POINT,
  GeoJsonType.LINE_STRING,
  GeoJsonType.MULTI_LINE_STRING,
  GeoJsonType.POLYGON,
  GeoJsonType.MULTI_POLYGON,
  GeoJsonType.GEOMETRY_COLLECTION,
];

export const GEOJSON_TYPE_NAMES: readonly GeoJsonTypeName[] = [
  ...GEOMETRY_TYPE_NAMES,
  GeoJsonType.FEATURE,
  GeoJsonType.FEATURE_COLLECTION,
];

// ============================================================================
// Position Ranges
// ============================================================================

export const LONGITUDE_RANGE = { min: -180, max: 180 } as const;
export const LATITUDE_RANGE = { min: -90, max: 90 } as const;

/** A linear ring needs four positions: three distinct plus the closing one. */
export const MIN_RING_LENGTH = 4;
export const MIN_LINE_LENGTH = 2;

// ============================================================================
// Validation Error Keys
// ============================================================================

export const ErrorKey = {
  TYPE_INVALID: 'type.invalid',
  COORDINATES_LENGTH_INVALID: 'coordinates.length.invalid',
  COORDINATES_LONGITUDE_INVALID: 'coordinates.longitude.invalid',
  COORDINATES_LATITUDE_INVALID: 'coordinates.latitude.invalid',
  COORDINATES_EMPTY: 'coordinates.invalid.empty',
  COORDINATES_MIN_LENGTH: 'coordinates.invalid.min.length',
  EXTERIOR_RING_EMPTY: 'coordinates.exterior.ring.empty',
  HOLE_RING_EMPTY: 'coordinates.hole.ring.empty',
  RING_LENGTH_INVALID: 'coordinates.ring.length.invalid',
  RING_NOT_CLOSED: 'coordinates.ring.circle.invalid',
  NESTED_GEOMETRY_COLLECTION: 'geometries.invalid.nested.geometry',
  GEOMETRY_EMPTY: 'geometry.invalid.empty',
} as const;

export type ErrorKeyName = (typeof ErrorKey)[keyof typeof ErrorKey];
