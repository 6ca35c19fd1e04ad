import {
  GEOJSON_TYPE_NAMES,
  GEOMETRY_TYPE_NAMES,
  type GeoJsonTypeName,
  type GeometryTypeName,
} from '../core/constants.js';
import { Feature } from './feature.js';
import { FeatureCollection } from './feature-collection.js';
import type { Geometry } from './geometry.js';
import { GeometryCollection } from './geometry-collection.js';
import { LineString } from './line-string.js';
import { MultiLineString } from './multi-line-string.js';
import { MultiPoint } from './multi-point.js';
import { MultiPolygon } from './multi-polygon.js';
import { Point } from './point.js';
import { Polygon } from './polygon.js';

/**
 * Top-level GeoJSON union, closed to exactly these branches
 */
export type GeoJson = Geometry | Feature | FeatureCollection;

/**
 * Concrete class for each discriminator
 */
export interface GeoJsonTypeMap {
  Point: Point;
  MultiPoint: MultiPoint;
  LineString: LineString;
  MultiLineString: MultiLineString;
  Polygon: Polygon;
  MultiPolygon: MultiPolygon;
  GeometryCollection: GeometryCollection;
  Feature: Feature;
  FeatureCollection: FeatureCollection;
}

export function isGeoJsonTypeName(value: unknown): value is GeoJsonTypeName {
  return GEOJSON_TYPE_NAMES.some((name) => name === value);
}

export function isGeometryTypeName(value: unknown): value is GeometryTypeName {
  return GEOMETRY_TYPE_NAMES.some((name) => name === value);
}

export function isGeometry(value: unknown): value is Geometry {
  return (
    value instanceof Point ||
    value instanceof MultiPoint ||
    value instanceof LineString ||
    value instanceof MultiLineString ||
    value instanceof Polygon ||
    value instanceof MultiPolygon ||
    value instanceof GeometryCollection
  );
}

export function isFeature(value: unknown): value is Feature {
  return value instanceof Feature;
}

export function isFeatureCollection(value: unknown): value is FeatureCollection {
  return value instanceof FeatureCollection;
}

export function isGeoJson(value: unknown): value is GeoJson {
  return isGeometry(value) || isFeature(value) || isFeatureCollection(value);
}
