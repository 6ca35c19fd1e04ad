/**
 * geojson-model CLI Configuration
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (GEOJSON_MODEL_*)
 * 3. Config file (.geojson-modelrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export interface CLIConfig {
  readonly output: {
    readonly format: OutputFormat;
    readonly pretty: boolean;
  };
  readonly logging: {
    readonly level: LogLevel;
  };
  readonly validate: {
    /** Exit non-zero when a file decodes but fails validation */
    readonly failOnInvalid: boolean;
  };
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    output: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        pretty: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    validate: z
      .object({
        fail_on_invalid: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'configPath'> = {
  output: {
    format: 'text',
    pretty: false,
  },
  logging: {
    level: 'warn',
  },
  validate: {
    failOnInvalid: true,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.geojson-modelrc',
  '.geojson-modelrc.yaml',
  '.geojson-modelrc.yml',
  '.geojson-modelrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and check config file content. YAML is a superset of JSON, so one
 * parser covers every file name.
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = parseYaml(content) ?? {};
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${details}`);
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  return env[`GEOJSON_MODEL_${name}`];
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  switch (value?.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}

function getEnvFormat(env: Env): OutputFormat | undefined {
  const value = getEnvVar(env, 'FORMAT')?.toLowerCase();
  return value === 'text' || value === 'json' ? value : undefined;
}

function getEnvLogLevel(env: Env): LogLevel | undefined {
  const value = getEnvVar(env, 'LOG_LEVEL')?.toLowerCase();
  return isLogLevel(value) ? value : undefined;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from */
  readonly cwd?: string;
  /** Environment to read GEOJSON_MODEL_* overrides from */
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly format?: OutputFormat;
    readonly pretty?: boolean;
    readonly logLevel?: LogLevel;
    readonly failOnInvalid?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    configPath = envConfigPath
      ? resolve(options.cwd ?? process.cwd(), envConfigPath)
      : findConfigFile(options.cwd ?? process.cwd());
    if (configPath && existsSync(configPath)) {
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = null;
    }
  }

  return {
    output: {
      format:
        options.overrides?.format ??
        getEnvFormat(env) ??
        fileConfig.output?.format ??
        DEFAULT_CONFIG.output.format,
      pretty:
        options.overrides?.pretty ??
        getEnvBool(env, 'PRETTY') ??
        fileConfig.output?.pretty ??
        DEFAULT_CONFIG.output.pretty,
    },
    logging: {
      level:
        options.overrides?.logLevel ??
        getEnvLogLevel(env) ??
        fileConfig.logging?.level ??
        DEFAULT_CONFIG.logging.level,
    },
    validate: {
      failOnInvalid:
        options.overrides?.failOnInvalid ??
        getEnvBool(env, 'FAIL_ON_INVALID') ??
        fileConfig.validate?.fail_on_invalid ??
        DEFAULT_CONFIG.validate.failOnInvalid,
    },
    configPath,
  };
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((name) => name === value);
}
