/**
 * Output Formatting for CLI Commands
 *
 * @module cli/lib/output
 */

import type { OutputFormat } from './config.js';

export interface ReportedError {
  readonly field: string;
  readonly key: string;
  readonly message: string;
}

export type FileStatus = 'valid' | 'invalid' | 'decode_error';

export interface FileReport {
  readonly file: string;
  readonly status: FileStatus;
  /** Discriminator of the decoded value; null when decoding failed */
  readonly type: string | null;
  readonly errors: readonly ReportedError[];
  readonly decodeError: string | null;
}

export interface ValidateSummary {
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly decodeErrors: number;
}

export interface ValidateReport {
  readonly files: readonly FileReport[];
  readonly summary: ValidateSummary;
}

const STATUS_LABEL: Record<FileStatus, string> = {
  valid: 'VALID',
  invalid: 'INVALID',
  decode_error: 'ERROR',
};

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

function formatFileReport(report: FileReport): string[] {
  const label = STATUS_LABEL[report.status];
  const type = report.type ? ` (${report.type})` : '';

  switch (report.status) {
    case 'valid':
      return [`${label} ${report.file}${type}`];
    case 'invalid':
      return [
        `${label} ${report.file}${type}: ${report.errors.length} error(s)`,
        ...report.errors.map((error) => `  - [${error.key}] ${error.field}: ${error.message}`),
      ];
    case 'decode_error':
      return [`${label} ${report.file}: ${report.decodeError ?? 'decode failed'}`];
  }
}

export function formatSummary(summary: ValidateSummary): string {
  return `${summary.total} file(s): ${summary.valid} valid, ${summary.invalid} invalid, ${summary.decodeErrors} decode error(s)`;
}

export function formatValidateReport(report: ValidateReport, format: OutputFormat, pretty: boolean): string {
  if (format === 'json') {
    return formatJson(report, pretty);
  }
  return [...report.files.flatMap(formatFileReport), formatSummary(report.summary)].join('\n');
}
