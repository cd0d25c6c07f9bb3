/**
 * CLI program assembly.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createGenerateCommand } from './commands/generate.js';
import { createVariantsCommand } from './commands/variants.js';
import { createStabilityCommand } from './commands/stability.js';
import { createScanCommand } from './commands/scan.js';
import { isLogLevel, logger } from '../utils/logger.js';
import { ConfigError, ErrorCodes } from '../utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Environment fallback for --log-level */
export const LOG_LEVEL_ENV_VAR = 'FEATUREKIT_LOG_LEVEL';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Apply the requested log level, falling back to the environment.
 */
export function applyLogLevel(requested: string | undefined, env: NodeJS.ProcessEnv = process.env): void {
  const level = requested ?? env[LOG_LEVEL_ENV_VAR];
  if (level === undefined || level === '') return;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid log level "${level}" (expected debug, info, warn, error or silent)`
    );
  }
  logger.setLevel(level);
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('featurekit')
    .description('Feature module scaffolding, Compose stability analysis and pre-commit log scanning')
    .version(readVersion())
    .option('--log-level <level>', 'Log level: debug, info, warn, error, silent')
    .hook('preAction', (thisCommand) => {
      const opts: { logLevel?: string } = thisCommand.opts();
      applyLogLevel(opts.logLevel);
    });

  [createGenerateCommand, createVariantsCommand, createStabilityCommand, createScanCommand]
    .forEach((cmd) => program.addCommand(cmd()));

  return program;
}
