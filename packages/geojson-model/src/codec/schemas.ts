/**
 * Wire-shape schemas for GeoJSON members
 *
 * These check only the JSON shape each variant's fields must have. Positions
 * are number arrays of any length: arity and range are validation concerns,
 * not decode concerns. `type` is read separately by the resolver.
 *
 * @module codec/schemas
 */

import { z } from 'zod';

// ============================================================================
// Coordinate Shapes
// ============================================================================

export const PositionSchema = z.array(z.number().finite());

export const PositionListSchema = z.array(PositionSchema);

export const RingListSchema = z.array(PositionListSchema);

export const PolygonListSchema = z.array(RingListSchema);

// ============================================================================
// Envelope
// ============================================================================

/**
 * Every GeoJSON object carries a string `type`
 */
export const EnvelopeSchema = z.object({
  type: z.string({
    required_error: "missing 'type' discriminator",
    invalid_type_error: "'type' discriminator must be a string",
  }),
});

// ============================================================================
// Variant Shapes
// ============================================================================

export const PointShape = z.object({
  coordinates: PositionSchema.nullish(),
});

export const PositionListShape = z.object({
  coordinates: PositionListSchema.nullish(),
});

export const RingListShape = z.object({
  coordinates: RingListSchema.nullish(),
});

export const MultiPolygonShape = z.object({
  coordinates: PolygonListSchema.nullish(),
});

export const GeometryCollectionShape = z.object({
  geometries: z.array(z.unknown()).nullish(),
});

/**
 * Numeric ids are accepted and kept in their string form
 */
export const FeatureShape = z.object({
  id: z.union([z.string(), z.number().finite()]).nullish(),
  geometry: z.unknown(),
  properties: z.record(z.unknown()).nullish(),
});

export const FeatureCollectionShape = z.object({
  features: z.array(z.unknown()).nullish(),
});
