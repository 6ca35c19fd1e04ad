/**
 * The closed set of geometry variants. Narrow on `kind` for exhaustive
 * handling:
 *
 * ```typescript
 * switch (geometry.kind) {
 *   case 'Point': return geometry.coordinates;
 *   ...
 *   default: return assertNever(geometry);
 * }
 * ```
 */

import type { GeometryCollection } from './geometry-collection.js';
import type { LineString } from './line-string.js';
import type { MultiLineString } from './multi-line-string.js';
import type { MultiPoint } from './multi-point.js';
import type { MultiPolygon } from './multi-polygon.js';
import type { Point } from './point.js';
import type { Polygon } from './polygon.js';

export type Geometry =
  | Point
  | MultiPoint
  | LineString
  | MultiLineString
  | Polygon
  | MultiPolygon
  | GeometryCollection;

export function assertNever(value: never): never {
  throw new Error(`Unhandled GeoJSON variant: ${JSON.stringify(value)}`);
}
