export {
  decodeGeoJson,
  decodeGeometry,
  decodeAs,
  parseGeoJson,
  parseGeometry,
  parseAs,
  parseJson,
} from './decode.js';
export { encode, stringify, type StringifyOptions } from './encode.js';
export {
  GeoJsonTypeResolver,
  typeResolver,
  type Decoder,
  type DecoderRegistry,
} from './type-resolver.js';
export {
  PositionSchema,
  PositionListSchema,
  RingListSchema,
  PolygonListSchema,
  EnvelopeSchema,
} from './schemas.js';
