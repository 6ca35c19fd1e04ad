/**
 * geojson-model
 *
 * Immutable GeoJSON (RFC 7946) value types with validation and
 * discriminator-based decoding.
 *
 * @example
 * ```typescript
 * import { parseGeoJson, Polygon, Position } from 'geojson-model';
 *
 * const value = parseGeoJson(text);       // never validates
 * const result = value.validate();        // never throws
 * if (result.hasErrors()) {
 *   result.errors.map((e) => e.key);
 * }
 *
 * Polygon.ofRings([ring]);                // validates, throws on failure
 * ```
 *
 * @packageDocumentation
 */

// Constants
export {
  GeoJsonType,
  GEOJSON_TYPE_NAMES,
  GEOMETRY_TYPE_NAMES,
  ErrorKey,
  LONGITUDE_RANGE,
  LATITUDE_RANGE,
  MIN_RING_LENGTH,
  MIN_LINE_LENGTH,
  type GeoJsonTypeName,
  type GeometryTypeName,
  type ErrorKeyName,
} from './core/constants.js';

// Errors
export {
  GeoJsonValidationError,
  GeoJsonDecodeError,
  isGeoJsonValidationError,
  isGeoJsonDecodeError,
} from './core/errors.js';

// Logging
export {
  logger,
  createLogger,
  setLogLevel,
  Logger,
  type LogLevel,
  type LogMetadata,
  type LoggerConfig,
} from './core/utils/logger.js';

// Validation
export * from './validation/index.js';

// Model
export * from './domain/index.js';

// Codec
export * from './codec/index.js';
