import { describe, it, expect } from 'vitest';
import { decodeGeoJson } from '../../../codec/decode.js';
import { Feature } from '../../../domain/feature.js';
import { FeatureCollection } from '../../../domain/feature-collection.js';
import {
  isFeature,
  isFeatureCollection,
  isGeoJson,
  isGeoJsonTypeName,
  isGeometry,
  isGeometryTypeName,
} from '../../../domain/geojson.js';
import { type Geometry, assertNever } from '../../../domain/geometry.js';
import { Point } from '../../../domain/point.js';
import { Position } from '../../../domain/position.js';
import { isValidatable } from '../../../validation/validatable.js';

function coordinateCount(geometry: Geometry): number {
  switch (geometry.kind) {
    case 'Point':
      return geometry.coordinates === null ? 0 : 1;
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates.length;
    case 'MultiLineString':
      return geometry.coordinates.flat().length;
    case 'Polygon':
      return geometry.coordinates?.rings.flat().length ?? 0;
    case 'MultiPolygon':
      return geometry.coordinates.flatMap((polygon) => polygon.rings.flat()).length;
    case 'GeometryCollection':
      return geometry.geometries.reduce((total, member) => total + coordinateCount(member), 0);
    default:
      return assertNever(geometry);
  }
}

describe('GeoJson union', () => {
  it('narrows exhaustively on kind', () => {
    const collection = decodeGeoJson({
      type: 'GeometryCollection',
      geometries: [
        { type: 'Point', coordinates: [0, 0] },
        { type: 'LineString', coordinates: [[0, 0], [1, 1], [2, 2]] },
        { type: 'Polygon', coordinates: [[[0, 0], [0, 1], [1, 1], [0, 0]]] },
      ],
    });

    expect(isGeometry(collection)).toBe(true);
    if (!isGeometry(collection)) return;
    expect(coordinateCount(collection)).toBe(8);
  });

  it('tells geometries from features', () => {
    const point = new Point(new Position([0, 0]));
    const feature = new Feature(null, point);
    const collection = new FeatureCollection([feature]);

    expect(isGeometry(point)).toBe(true);
    expect(isGeometry(feature)).toBe(false);
    expect(isFeature(feature)).toBe(true);
    expect(isFeatureCollection(collection)).toBe(true);
    expect([point, feature, collection].every((value) => isGeoJson(value))).toBe(true);
    expect(isGeoJson({ type: 'Point', coordinates: [0, 0] })).toBe(false);
  });

  it('recognizes discriminator names', () => {
    expect(isGeoJsonTypeName('FeatureCollection')).toBe(true);
    expect(isGeometryTypeName('FeatureCollection')).toBe(false);
    expect(isGeometryTypeName('MultiPolygon')).toBe(true);
    expect(isGeoJsonTypeName('Topology')).toBe(false);
  });

  it('treats every model value as validatable', () => {
    expect(isValidatable(new Position([0, 0]))).toBe(true);
    expect(isValidatable(new FeatureCollection([]))).toBe(true);
    expect(isValidatable({ validate: 'no' })).toBe(false);
  });
});
