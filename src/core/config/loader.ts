import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.featurekit/config.yaml';

/** Environment variable that overrides scaffold.base_package */
export const PACKAGE_ENV_VAR = 'FEATUREKIT_PACKAGE';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicit path must exist.
 */
export function loadConfig(projectRoot: string, configPath?: string): Config {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!fileExists(fullPath)) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_INVALID,
        `Config file not found: ${fullPath}`,
        { path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  return loadYamlWithSchema(fullPath, ConfigSchema);
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: Partial<Config>): Config {
  return ConfigSchema.parse(partial);
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Resolve the base package: explicit flag, then environment, then config.
 */
export function resolveBasePackage(
  config: Config,
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (explicit) return explicit;
  const fromEnv = env[PACKAGE_ENV_VAR];
  if (fromEnv && fromEnv.trim().length > 0) return fromEnv.trim();
  return config.scaffold.base_package;
}
