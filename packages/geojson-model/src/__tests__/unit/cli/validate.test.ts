import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EXIT_CODES, exitCodeFor, summarize, validateFiles, validateText } from '../../../cli/commands/validate.js';
import { formatSummary, formatValidateReport } from '../../../cli/lib/output.js';

const VALID_POINT = '{"type":"Point","coordinates":[1,2]}';
const FAR_POINT = '{"type":"Point","coordinates":[200,0]}';
const CIRCLE = '{"type":"Circle","radius":3}';

describe('validateText', () => {
  it('reports a valid document', () => {
    expect(validateText('a.json', VALID_POINT)).toEqual({
      file: 'a.json',
      status: 'valid',
      type: 'Point',
      errors: [],
      decodeError: null,
    });
  });

  it('reports validation errors', () => {
    expect(validateText('b.json', FAR_POINT)).toEqual({
      file: 'b.json',
      status: 'invalid',
      type: 'Point',
      errors: [
        {
          field: 'coordinates',
          message: 'longitude 200 is not valid, expected a value between -180 and 180',
          key: 'coordinates.longitude.invalid',
        },
      ],
      decodeError: null,
    });
  });

  it('reports decode errors separately', () => {
    expect(validateText('c.json', CIRCLE)).toEqual({
      file: 'c.json',
      status: 'decode_error',
      type: null,
      errors: [],
      decodeError: "Unknown GeoJSON type 'Circle' at $",
    });
  });
});

describe('formatValidateReport', () => {
  const files = [validateText('a.json', VALID_POINT), validateText('b.json', FAR_POINT), validateText('c.json', CIRCLE)];
  const report = { files, summary: summarize(files) };

  it('prints one block per file and a summary', () => {
    expect(formatValidateReport(report, 'text', false)).toBe(
      [
        'VALID a.json (Point)',
        'INVALID b.json (Point): 1 error(s)',
        '  - [coordinates.longitude.invalid] coordinates: longitude 200 is not valid, expected a value between -180 and 180',
        "ERROR c.json: Unknown GeoJSON type 'Circle' at $",
        '3 file(s): 1 valid, 1 invalid, 1 decode error(s)',
      ].join('\n')
    );
  });

  it('prints the report as JSON', () => {
    const parsed: unknown = JSON.parse(formatValidateReport(report, 'json', true));

    expect(parsed).toEqual({
      files: [
        { file: 'a.json', status: 'valid', type: 'Point', errors: [], decodeError: null },
        {
          file: 'b.json',
          status: 'invalid',
          type: 'Point',
          errors: [
            {
              field: 'coordinates',
              message: 'longitude 200 is not valid, expected a value between -180 and 180',
              key: 'coordinates.longitude.invalid',
            },
          ],
          decodeError: null,
        },
        {
          file: 'c.json',
          status: 'decode_error',
          type: null,
          errors: [],
          decodeError: "Unknown GeoJSON type 'Circle' at $",
        },
      ],
      summary: { total: 3, valid: 1, invalid: 1, decodeErrors: 1 },
    });
  });

  it('summarizes an empty run', () => {
    expect(formatSummary(summarize([]))).toBe('0 file(s): 0 valid, 0 invalid, 0 decode error(s)');
  });
});

describe('exitCodeFor', () => {
  const invalidOnly = { files: [validateText('b.json', FAR_POINT)], summary: summarize([validateText('b.json', FAR_POINT)]) };

  it('fails on decode errors regardless of config', () => {
    const files = [validateText('c.json', CIRCLE)];

    expect(exitCodeFor({ files, summary: summarize(files) }, { validate: { failOnInvalid: false } })).toBe(
      EXIT_CODES.DECODE_ERROR
    );
  });

  it('fails on invalid files when configured to', () => {
    expect(exitCodeFor(invalidOnly, { validate: { failOnInvalid: true } })).toBe(EXIT_CODES.INVALID);
    expect(exitCodeFor(invalidOnly, { validate: { failOnInvalid: false } })).toBe(EXIT_CODES.SUCCESS);
  });
});

describe('validateFiles', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'geojson-model-validate-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates each file in order', async () => {
    const first = join(dir, 'first.geojson');
    const second = join(dir, 'second.geojson');
    await writeFile(first, VALID_POINT);
    await writeFile(second, FAR_POINT);

    const report = await validateFiles([first, second]);

    expect(report.files.map((file) => `${file.file}:${file.status}`)).toEqual([`${first}:valid`, `${second}:invalid`]);
    expect(report.summary).toEqual({ total: 2, valid: 1, invalid: 1, decodeErrors: 0 });
  });
});
