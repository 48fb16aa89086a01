/**
 * API Assert - Configuration
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import Ajv from 'ajv';

import { ConfigurationError, ValidationError, type SchemaError } from '../errors';
import { DefaultAssertionHandler } from '../reporters/assertion-handler';
import { DefaultFormatter } from '../reporters/formatter';
import { createReporter, type ReporterType } from '../reporters';
import type { AssertionSeverity, Config, ResolvedConfig } from '../types';
import { LOG_LEVELS, createLogger, type LogLevel } from '../utils/logger';

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a user config into the read-only form used by chains
 */
export function resolveConfig(config: Config): ResolvedConfig {
  const handler =
    config.assertionHandler ??
    (config.reporter
      ? new DefaultAssertionHandler({
          reporter: config.reporter,
          formatter: config.formatter ?? new DefaultFormatter(),
          logger: config.logger,
        })
      : undefined);

  if (!handler) {
    throw new ConfigurationError(
      'Config requires either assertionHandler or reporter',
      'Pass a reporter, e.g. new ThrowReporter()'
    );
  }

  return Object.freeze({
    testName: config.testName,
    handler,
    severity: config.severity ?? 'error',
    environment: config.environment,
    validateFailures: config.validateFailures ?? true,
  });
}

// ============================================================================
// Config File
// ============================================================================

/**
 * Shape of api-assert.config.yaml
 */
export interface ConfigFile {
  version: '1.0';
  testName?: string;
  severity?: AssertionSeverity;
  reporter?: ReporterType;
  logLevel?: LogLevel;
  colors?: boolean;
  validateFailures?: boolean;
}

export const CONFIG_SCHEMA = {
  type: 'object',
  required: ['version'],
  additionalProperties: false,
  properties: {
    version: { type: 'string', enum: ['1.0'] },
    testName: { type: 'string' },
    severity: { type: 'string', enum: ['error', 'log', 'info'] },
    reporter: { type: 'string', enum: ['throw', 'collect', 'console'] },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] },
    colors: { type: 'boolean' },
    validateFailures: { type: 'boolean' },
  },
};

export const DEFAULT_CONFIG_PATH = 'api-assert.config.yaml';

export interface LoadConfigOptions {
  configPath?: string;
}

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigFile>(CONFIG_SCHEMA);

/**
 * Load and validate a YAML config file and build a Config from it
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const configPath = options.configPath || DEFAULT_CONFIG_PATH;
  const absolutePath = path.resolve(process.cwd(), configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(
      `Configuration file not found: ${absolutePath}`,
      `Create ${DEFAULT_CONFIG_PATH} or pass configPath`
    );
  }

  const content = fs.readFileSync(absolutePath, 'utf8');
  let raw: unknown;

  try {
    const yaml = await import('yaml');
    raw = yaml.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration file: ${
        error instanceof Error ? error.message : String(error)
      }`,
      'Check YAML syntax in the configuration file'
    );
  }

  const file = validateConfig(raw, absolutePath);
  return buildConfig(file);
}

/**
 * Validate parsed config file contents against CONFIG_SCHEMA
 */
export function validateConfig(raw: unknown, filePath?: string): ConfigFile {
  if (validateConfigFile(raw)) {
    return raw;
  }

  const errors: SchemaError[] = (validateConfigFile.errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message || 'Unknown validation error',
    keyword: err.keyword,
  }));

  throw new ValidationError('Configuration file validation failed', errors, filePath);
}

/**
 * Build a Config from validated config file contents
 */
export function buildConfig(file: ConfigFile): Config {
  const colors = file.colors ?? false;
  const logger = createLogger({
    level: file.logLevel ?? 'info',
    useColors: colors,
  });

  return {
    testName: file.testName,
    severity: file.severity,
    validateFailures: file.validateFailures,
    reporter: createReporter(file.reporter ?? 'throw', { noColor: !colors, logger }),
    formatter: new DefaultFormatter({ colors }),
    logger,
  };
}
