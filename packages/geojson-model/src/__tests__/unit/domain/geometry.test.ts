import { describe, it, expect } from 'vitest';
import { LineString } from '../../../domain/line-string.js';
import { MultiLineString } from '../../../domain/multi-line-string.js';
import { MultiPoint } from '../../../domain/multi-point.js';
import { MultiPolygon } from '../../../domain/multi-polygon.js';
import { Point } from '../../../domain/point.js';
import { Polygon } from '../../../domain/polygon.js';
import { PolygonCoordinates } from '../../../domain/polygon-coordinates.js';
import { Position } from '../../../domain/position.js';
import type { Validatable } from '../../../validation/validatable.js';
import { OPEN_SQUARE, SQUARE, positions, ring } from '../../fixtures/geojson.js';

const sortedKeys = (value: Validatable): string[] => [...value.validate().keys()].sort();

describe('Point', () => {
  it('is valid with an in-range position', () => {
    expect(Point.of(100, 0).isValid()).toBe(true);
    expect(Point.of(Position.of(1, 2)).coordinates?.toJSON()).toEqual([1, 2]);
  });

  it('reports a missing position', () => {
    const result = new Point(null).validate();

    expect(result.errors.map((error) => error.toJSON())).toEqual([
      { field: 'coordinates', message: 'coordinates should not be empty/blank', key: 'coordinates.invalid.empty' },
    ]);
  });

  it('reports a wrong discriminator alongside position errors', () => {
    const point = new Point(new Position([200, 0]), 'point');

    expect(sortedKeys(point)).toEqual(['coordinates.longitude.invalid', 'type.invalid']);
    expect(point.validate().errors[0]?.message).toBe("type 'point' is not valid. expected 'Point'");
  });

  it('reports a blank discriminator', () => {
    expect(sortedKeys(new Point(new Position([0, 0]), ''))).toEqual(['type.invalid']);
  });

  it('encodes an absent position as an empty array', () => {
    expect(new Point(null).toJSON()).toEqual({ type: 'Point', coordinates: [] });
  });

  it('throws from the factory on an invalid position', () => {
    expect(() => Point.of(0, -91)).toThrow('GeoJSON is invalid');
  });
});

describe('MultiPoint', () => {
  it('is valid with two positions', () => {
    expect(MultiPoint.of(Position.of(0, 0), Position.of(1, 1)).isValid()).toBe(true);
  });

  it('reports an empty list for both emptiness and minimum size', () => {
    expect(sortedKeys(new MultiPoint([]))).toEqual(['coordinates.invalid.empty', 'coordinates.invalid.min.length']);
  });

  it('reports a single position', () => {
    const result = new MultiPoint(positions([0, 0])).validate();

    expect([...result.keys()]).toEqual(['coordinates.invalid.min.length']);
    expect(result.errors[0]?.message).toBe('coordinates is not valid, minimum 2 positions required');
  });

  it('reports each invalid position', () => {
    expect(sortedKeys(new MultiPoint(positions([0, 0], [0, 95], [190, 0])))).toEqual([
      'coordinates.latitude.invalid',
      'coordinates.longitude.invalid',
    ]);
  });
});

describe('LineString', () => {
  it('is valid with two positions', () => {
    expect(LineString.fromPositions(positions([0, 0], [10, 10])).isValid()).toBe(true);
  });

  it('shares the position-list rules with MultiPoint', () => {
    expect(sortedKeys(new LineString(null))).toEqual(['coordinates.invalid.empty', 'coordinates.invalid.min.length']);
    expect(sortedKeys(new LineString(positions([0, 0], [1])))).toEqual(['coordinates.length.invalid']);
  });

  it('encodes its positions', () => {
    expect(new LineString(positions([0, 0], [1, 1, 5])).toJSON()).toEqual({
      type: 'LineString',
      coordinates: [
        [0, 0],
        [1, 1, 5],
      ],
    });
  });
});

describe('MultiLineString', () => {
  it('is valid when every line has two positions', () => {
    expect(MultiLineString.of(positions([0, 0], [1, 1]), positions([2, 2], [3, 3])).isValid()).toBe(true);
  });

  it('reports an empty list', () => {
    expect(sortedKeys(new MultiLineString([]))).toEqual(['coordinates.invalid.empty']);
  });

  it('reports a short line once', () => {
    const line = new MultiLineString([positions([0, 0]), positions([1, 1])]);

    expect(line.validate().errors.map((error) => error.key)).toEqual(['coordinates.invalid.min.length']);
  });

  it('reports positions across lines', () => {
    expect(sortedKeys(new MultiLineString([positions([0, 0], [0, 100]), positions([0, 0], [-200, 0])]))).toEqual([
      'coordinates.latitude.invalid',
      'coordinates.longitude.invalid',
    ]);
  });
});

describe('Polygon', () => {
  it('is valid with a closed exterior', () => {
    const polygon = Polygon.of(ring(SQUARE));

    expect(polygon.isValid()).toBe(true);
    expect(polygon.toJSON()).toEqual({ type: 'Polygon', coordinates: [SQUARE] });
  });

  it('builds from the wire ring layout', () => {
    expect(Polygon.ofRings([ring(SQUARE)]).equals(Polygon.of(new PolygonCoordinates(ring(SQUARE))))).toBe(true);
  });

  it('reports absent coordinates only for emptiness', () => {
    expect(sortedKeys(new Polygon(null))).toEqual(['coordinates.invalid.empty']);
  });

  it('reports an empty exterior', () => {
    expect(sortedKeys(new Polygon(new PolygonCoordinates([])))).toEqual([
      'coordinates.exterior.ring.empty',
      'coordinates.invalid.min.length',
      'coordinates.ring.length.invalid',
    ]);
  });

  it('reports an open ring', () => {
    expect(sortedKeys(new Polygon(new PolygonCoordinates(ring(OPEN_SQUARE))))).toEqual([
      'coordinates.ring.circle.invalid',
    ]);
  });
});

describe('MultiPolygon', () => {
  it('is valid with one closed polygon', () => {
    expect(MultiPolygon.of(PolygonCoordinates.of(ring(SQUARE))).isValid()).toBe(true);
  });

  it('requires at least one polygon', () => {
    const result = new MultiPolygon([]).validate();

    expect(result.errors.map((error) => error.toJSON())).toEqual([
      {
        field: 'coordinates',
        message: 'coordinates is not valid, at least one polygon required',
        key: 'coordinates.invalid.min.length',
      },
    ]);
  });

  it('reports errors of member polygons', () => {
    const multi = new MultiPolygon([new PolygonCoordinates(ring(SQUARE)), new PolygonCoordinates(ring(OPEN_SQUARE))]);

    expect(sortedKeys(multi)).toEqual(['coordinates.ring.circle.invalid']);
  });
});

describe('equality', () => {
  it('compares by value and discriminator', () => {
    expect(new Point(new Position([1, 2])).equals(new Point(new Position([1, 2])))).toBe(true);
    expect(new Point(new Position([1, 2])).equals(new Point(new Position([1, 2]), 'point'))).toBe(false);
    expect(new LineString(positions([0, 0], [1, 1])).equals(new MultiPoint(positions([0, 0], [1, 1])))).toBe(false);
  });

  it('does not expose mutable coordinate lists', () => {
    const line = new LineString(positions([0, 0], [1, 1]));

    expect(Object.isFrozen(line.coordinates)).toBe(true);
  });
});
