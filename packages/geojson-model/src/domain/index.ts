export { GeoJsonObject, type GeoJsonObjectJSON } from './geojson-object.js';
export { Position } from './position.js';
export { PolygonCoordinates, type LinearRing } from './polygon-coordinates.js';
export { Point } from './point.js';
export { MultiPoint } from './multi-point.js';
export { LineString } from './line-string.js';
export { MultiLineString } from './multi-line-string.js';
export { Polygon } from './polygon.js';
export { MultiPolygon } from './multi-polygon.js';
export { GeometryCollection } from './geometry-collection.js';
export { type Geometry, assertNever } from './geometry.js';
export { Feature, type FeatureProperties } from './feature.js';
export { FeatureCollection } from './feature-collection.js';
export {
  type GeoJson,
  type GeoJsonTypeMap,
  isGeoJsonTypeName,
  isGeometryTypeName,
  isGeometry,
  isFeature,
  isFeatureCollection,
  isGeoJson,
} from './geojson.js';
