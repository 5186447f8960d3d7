import * as path from 'node:path';
import { ConfigSchema, LogLevelSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { LogLevel } from '../../utils/logger.js';

export const DEFAULT_CONFIG_PATH = '.fixture/config.yaml';

/** Environment variable that overrides the configured log level. */
export const LOG_LEVEL_ENV = 'FIXTURE_LOG_LEVEL';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    // An empty file has no document
    return (await loadYamlWithSchema(fullPath, ConfigSchema.nullish())) ?? getDefaultConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(error.code, `${error.message} (file: ${fullPath})`, {
        ...error.details,
        path: fullPath,
      });
    }
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Pick the effective log level: `--verbose` wins, then the environment,
 * then the config file.
 */
export function resolveLogLevel(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
  verbose = false
): LogLevel {
  if (verbose) return 'debug';

  const fromEnv = env[LOG_LEVEL_ENV];
  if (fromEnv === undefined || fromEnv === '') return config.log_level;

  const result = LogLevelSchema.safeParse(fromEnv.toLowerCase());
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid ${LOG_LEVEL_ENV} "${fromEnv}"`,
      { value: fromEnv }
    );
  }
  return result.data;
}
