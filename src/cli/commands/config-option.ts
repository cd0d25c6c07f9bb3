/**
 * Shared --config handling for commands.
 */
import { loadConfig, type Config } from '../../core/config/index.js';
import { logger } from '../../utils/logger.js';

export const CONFIG_FLAGS = '-c, --config <path>';
export const CONFIG_DESCRIPTION = 'Path to config file (default: .featurekit/config.yaml)';

export function loadCommandConfig(configPath?: string): Config {
  const projectRoot = process.cwd();
  const config = loadConfig(projectRoot, configPath);
  logger.debug('Loaded configuration', { projectRoot, configPath: configPath ?? null });
  return config;
}
