import { describe, it, expect } from 'vitest';
import { echoText } from '../../../cli/commands/echo.js';
import { GeoJsonDecodeError } from '../../../core/errors.js';

describe('echoText', () => {
  it('prints the canonical encoding', () => {
    expect(echoText('{"coordinates":[[0,0],[1,1]],"bbox":[0,0,1,1],"type":"LineString"}', false)).toBe(
      '{"type":"LineString","coordinates":[[0,0],[1,1]]}'
    );
  });

  it('prints invalid documents unchanged in shape', () => {
    expect(echoText('{"type":"MultiPoint","coordinates":[]}', false)).toBe('{"type":"MultiPoint","coordinates":[]}');
  });

  it('indents when pretty', () => {
    expect(echoText('{"type":"FeatureCollection","features":[]}', true)).toBe(
      '{\n  "type": "FeatureCollection",\n  "features": []\n}'
    );
  });

  it('fails on undecodable input', () => {
    expect(() => echoText('not json', false)).toThrow(GeoJsonDecodeError);
  });
});
