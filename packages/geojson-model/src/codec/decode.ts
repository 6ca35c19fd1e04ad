/**
 * Decode entry points
 *
 * All of them go through the shared type resolver; none of them validate. A
 * failure is always a GeoJsonDecodeError and never yields a partial value.
 *
 * @module codec/decode
 */

import type { GeoJsonTypeName } from '../core/constants.js';
import { GeoJsonDecodeError, isGeoJsonDecodeError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { GeoJson, GeoJsonTypeMap } from '../domain/geojson.js';
import type { Geometry } from '../domain/geometry.js';
import { typeResolver } from './type-resolver.js';

const log = createLogger({ module: 'codec' });

function traced<T>(operation: string, decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    if (isGeoJsonDecodeError(error)) {
      log.debug('GeoJSON decode failed', {
        operation,
        path: error.path,
        error: error.message,
        issues: error.issues.length,
      });
    }
    throw error;
  }
}

/**
 * Parse JSON text, turning syntax errors into decode failures
 */
export function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GeoJsonDecodeError(`Malformed JSON: ${reason}`, '$', [], { cause: error });
  }
}

export function decodeGeoJson(value: unknown): GeoJson {
  return traced('decodeGeoJson', () => typeResolver.decode(value));
}

export function decodeGeometry(value: unknown): Geometry {
  return traced('decodeGeometry', () => typeResolver.decodeGeometry(value));
}

export function decodeAs<K extends GeoJsonTypeName>(type: K, value: unknown): GeoJsonTypeMap[K] {
  return traced('decodeAs', () => typeResolver.decodeAs(type, value));
}

export function parseGeoJson(text: string): GeoJson {
  return traced('parseGeoJson', () => typeResolver.decode(parseJson(text)));
}

export function parseGeometry(text: string): Geometry {
  return traced('parseGeometry', () => typeResolver.decodeGeometry(parseJson(text)));
}

export function parseAs<K extends GeoJsonTypeName>(type: K, text: string): GeoJsonTypeMap[K] {
  return traced('parseAs', () => typeResolver.decodeAs(type, parseJson(text)));
}
