/**
 * Canonical RFC 7946 encoding
 *
 * Every model class implements `toJSON()`, so `JSON.stringify` on a model
 * value already produces canonical text with `type` first.
 *
 * @module codec/encode
 */

import type { GeoJsonObjectJSON } from '../domain/geojson-object.js';
import type { GeoJson } from '../domain/geojson.js';

export interface StringifyOptions {
  /** Indent with two spaces */
  readonly pretty?: boolean;
}

export function encode(value: GeoJson): GeoJsonObjectJSON {
  return value.toJSON();
}

export function stringify(value: GeoJson, options: StringifyOptions = {}): string {
  return JSON.stringify(value.toJSON(), null, options.pretty ? 2 : undefined);
}
