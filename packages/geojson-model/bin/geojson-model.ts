#!/usr/bin/env tsx
/**
 * geojson-model CLI Entry Point
 *
 * Validate GeoJSON documents and print their canonical encoding.
 *
 * @module geojson-model-cli
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  CLI_NAME,
  type CLIConfig,
  EXIT_CODES,
  OUTPUT_FORMATS,
  echoFile,
  exitCodeFor,
  formatValidateReport,
  isOutputFormat,
  loadConfig,
  validateFiles,
} from '../src/cli/index.js';
import { isGeoJsonDecodeError } from '../src/core/errors.js';
import { LOG_LEVELS, isLogLevel, logger, setLogLevel } from '../src/core/utils/logger.js';

type GlobalOptions = {
  readonly config?: string;
  readonly format?: string;
  readonly pretty?: boolean;
  readonly logLevel?: string;
  readonly failOnInvalid?: boolean;
};

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

function parseFormat(value: string): string {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

function resolveConfig(options: GlobalOptions): CLIConfig {
  const config = loadConfig({
    configPath: options.config,
    overrides: {
      format: isOutputFormat(options.format) ? options.format : undefined,
      pretty: options.pretty,
      logLevel: isLogLevel(options.logLevel) ? options.logLevel : undefined,
      failOnInvalid: options.failOnInvalid,
    },
  });
  setLogLevel(config.logging.level);
  logger.debug('Configuration loaded', { configPath: config.configPath });
  return config;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Validate GeoJSON (RFC 7946) documents')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .geojson-modelrc)')
    .option('--format <format>', `Output format: ${OUTPUT_FORMATS.join('|')}`, parseFormat)
    .option('--pretty', 'Indent JSON output')
    .addOption(new Option('--log-level <level>', 'Minimum log level').choices([...LOG_LEVELS]));

  program
    .command('validate')
    .description('Decode and validate one or more GeoJSON files')
    .argument('<files...>', 'GeoJSON files to validate')
    .option('--fail-on-invalid', 'Exit 1 when a file decodes but fails validation')
    .option('--no-fail-on-invalid', 'Exit 0 when files decode but fail validation')
    .action(async (files: string[], options: { failOnInvalid?: boolean }) => {
      const config = resolveConfig({ ...program.opts<GlobalOptions>(), failOnInvalid: options.failOnInvalid });
      const report = await validateFiles(files);
      console.log(formatValidateReport(report, config.output.format, config.output.pretty));
      process.exitCode = exitCodeFor(report, config);
    });

  program
    .command('echo')
    .description('Decode a GeoJSON file and print its canonical encoding')
    .argument('<file>', 'GeoJSON file')
    .action(async (file: string) => {
      const config = resolveConfig(program.opts<GlobalOptions>());
      try {
        console.log(await echoFile(file, config.output.pretty));
      } catch (error) {
        if (!isGeoJsonDecodeError(error)) {
          throw error;
        }
        logger.error('Cannot decode file', { file, error: error.message });
        process.exitCode = EXIT_CODES.DECODE_ERROR;
      }
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = EXIT_CODES.UNEXPECTED_ERROR;
  });
