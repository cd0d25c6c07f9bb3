/**
 * CLI command listing the registered scaffold variants.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadTemplateLibrary, listVariants } from '../../core/scaffold/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, loadCommandConfig } from './config-option.js';

interface VariantsOptions {
  json?: boolean;
  config?: string;
}

export function createVariantsCommand(): Command {
  return new Command('variants')
    .description('List the available scaffold variants')
    .option('--json', 'Output as JSON')
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .action((options: VariantsOptions) => {
      try {
        runVariants(options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function runVariants(options: VariantsOptions): void {
  const config = loadCommandConfig(options.config);
  const templatesDir = config.scaffold.templates_dir
    ? path.resolve(process.cwd(), config.scaffold.templates_dir)
    : undefined;
  const library = loadTemplateLibrary(templatesDir);
  const names = listVariants(library);

  if (options.json) {
    console.log(JSON.stringify(
      names.map((name) => ({
        name,
        description: library.variants[name].description,
        files: library.variants[name].files.map((f) => f.output),
      })),
      null,
      2
    ));
    return;
  }

  console.log();
  console.log(chalk.bold('Scaffold variants'));
  console.log();
  for (const name of names) {
    const variant = library.variants[name];
    const marker = name === config.scaffold.default_pattern ? chalk.dim(' (default)') : '';
    console.log(`  ${chalk.cyan(name)}${marker} - ${variant.description} [${variant.files.length} files]`);
  }
}
