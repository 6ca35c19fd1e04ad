/**
 * validate command
 *
 * Decodes each file as GeoJSON and validates it. Decode failures and
 * validation failures are reported separately, mirroring the two error
 * channels of the library.
 *
 * @module cli/commands/validate
 */

import { readFile } from 'node:fs/promises';
import { parseGeoJson } from '../../codec/decode.js';
import { isGeoJsonDecodeError } from '../../core/errors.js';
import { createLogger } from '../../core/utils/logger.js';
import type { CLIConfig } from '../lib/config.js';
import type { FileReport, ValidateReport, ValidateSummary } from '../lib/output.js';

const log = createLogger({ module: 'cli:validate' });

export const EXIT_CODES = {
  SUCCESS: 0,
  INVALID: 1,
  DECODE_ERROR: 2,
  UNEXPECTED_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Decode and validate one document. Only decode failures are caught; anything
 * else is a bug and propagates.
 */
export function validateText(file: string, text: string): FileReport {
  try {
    const value = parseGeoJson(text);
    const result = value.validate();
    return {
      file,
      status: result.hasErrors() ? 'invalid' : 'valid',
      type: value.type,
      errors: result.errors.map((error) => error.toJSON()),
      decodeError: null,
    };
  } catch (error) {
    if (!isGeoJsonDecodeError(error)) {
      throw error;
    }
    return {
      file,
      status: 'decode_error',
      type: null,
      errors: [],
      decodeError: error.message,
    };
  }
}

export function summarize(files: readonly FileReport[]): ValidateSummary {
  return {
    total: files.length,
    valid: files.filter((file) => file.status === 'valid').length,
    invalid: files.filter((file) => file.status === 'invalid').length,
    decodeErrors: files.filter((file) => file.status === 'decode_error').length,
  };
}

export async function validateFiles(paths: readonly string[]): Promise<ValidateReport> {
  const files: FileReport[] = [];
  for (const path of paths) {
    const text = await readFile(path, 'utf-8');
    const report = validateText(path, text);
    log.debug('Validated file', { file: path, status: report.status, errors: report.errors.length });
    files.push(report);
  }
  const summary = summarize(files);
  log.info('Validation finished', { ...summary });
  return { files, summary };
}

export function exitCodeFor(report: ValidateReport, config: Pick<CLIConfig, 'validate'>): ExitCode {
  if (report.summary.decodeErrors > 0) {
    return EXIT_CODES.DECODE_ERROR;
  }
  if (report.summary.invalid > 0 && config.validate.failOnInvalid) {
    return EXIT_CODES.INVALID;
  }
  return EXIT_CODES.SUCCESS;
}
