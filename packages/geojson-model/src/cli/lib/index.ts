export {
  loadConfig,
  findConfigFile,
  parseConfigFile,
  isOutputFormat,
  DEFAULT_CONFIG,
  OUTPUT_FORMATS,
  type CLIConfig,
  type OutputFormat,
  type LoadConfigOptions,
} from './config.js';
export {
  formatJson,
  formatSummary,
  formatValidateReport,
  type FileReport,
  type FileStatus,
  type ReportedError,
  type ValidateReport,
  type ValidateSummary,
} from './output.js';
