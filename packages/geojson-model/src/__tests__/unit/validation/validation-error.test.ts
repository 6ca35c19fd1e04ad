import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../../validation/validation-error.js';

describe('ValidationError', () => {
  it('keeps field, message and key', () => {
    const error = ValidationError.of('coordinates', 'longitude is not valid', 'coordinates.longitude.invalid');

    expect(error.field).toBe('coordinates');
    expect(error.message).toBe('longitude is not valid');
    expect(error.key).toBe('coordinates.longitude.invalid');
  });

  it('rejects a blank field', () => {
    expect(() => ValidationError.of(' ', 'message', 'some.key')).toThrow(TypeError);
  });

  it('rejects a blank key', () => {
    expect(() => ValidationError.of('field', 'message', '')).toThrow(TypeError);
  });

  it('compares by value', () => {
    const a = ValidationError.of('type', 'bad type', 'type.invalid');
    const b = ValidationError.of('type', 'bad type', 'type.invalid');
    const c = ValidationError.of('type', 'other wording', 'type.invalid');

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
    expect(a.equals({ field: 'type', message: 'bad type', key: 'type.invalid' })).toBe(false);
  });

  it('qualifies the field under a parent without touching the key', () => {
    const error = ValidationError.of('coordinates', 'latitude is not valid', 'coordinates.latitude.invalid');
    const qualified = error.withFieldPrefix('geometry');

    expect(qualified.field).toBe('geometry.coordinates');
    expect(qualified.key).toBe('coordinates.latitude.invalid');
    expect(qualified.message).toBe('latitude is not valid');
  });

  it('serializes to a plain object', () => {
    const error = ValidationError.of('geometry', 'geometry should not be empty/blank', 'geometry.invalid.empty');

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      field: 'geometry',
      message: 'geometry should not be empty/blank',
      key: 'geometry.invalid.empty',
    });
  });
});
