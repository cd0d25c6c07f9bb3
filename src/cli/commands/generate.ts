/**
 * CLI command for feature module scaffolding.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { resolveBasePackage } from '../../core/config/index.js';
import { ScaffoldWriter, loadTemplateLibrary } from '../../core/scaffold/index.js';
import type { ScaffoldResult } from '../../core/scaffold/index.js';
import { displayPath } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, loadCommandConfig } from './config-option.js';

interface GenerateOptions {
  pattern?: string;
  package?: string;
  output?: string;
  config?: string;
}

/**
 * Create the generate command.
 */
export function createGenerateCommand(): Command {
  return new Command('generate')
    .description('Generate a feature module from a template variant')
    .argument('<feature-name>', 'Feature name (e.g., UserProfile)')
    .option('-p, --pattern <variant>', 'Architecture variant (e.g., mvi, mvvm)')
    .option('--package <package>', 'Base package name (e.g., com.example)')
    .option('-o, --output <dir>', 'Output directory (default: feature/)')
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .action((featureName: string, options: GenerateOptions) => {
      try {
        runGenerate(featureName, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function runGenerate(featureName: string, options: GenerateOptions): void {
  const projectRoot = process.cwd();
  const config = loadCommandConfig(options.config);

  const templatesDir = config.scaffold.templates_dir
    ? path.resolve(projectRoot, config.scaffold.templates_dir)
    : undefined;
  const library = loadTemplateLibrary(templatesDir);

  const variant = options.pattern ?? config.scaffold.default_pattern;
  const basePackage = resolveBasePackage(config, options.package);
  const outputRoot = path.resolve(projectRoot, options.output ?? config.scaffold.output);

  const result = new ScaffoldWriter(library).scaffold({
    featureName,
    variant,
    outputRoot,
    basePackage,
    dataType: config.scaffold.data_type,
  });

  printResult(result);

  if (!result.success) {
    logger.error(`${result.failed} of ${result.files.length} files failed to generate`);
    process.exit(1);
  }
}

function printResult(result: ScaffoldResult): void {
  console.log();
  console.log(chalk.bold(`Generated ${result.featureName} feature module`));
  console.log(chalk.dim(`   Pattern: ${result.variant}`));
  console.log(chalk.dim(`   Package: ${result.fullPackage}`));
  console.log();

  for (const file of result.files) {
    if (file.success) {
      console.log(displayPath(file.outputPath));
    } else {
      logger.fail(`${displayPath(file.outputPath)}: ${file.error ?? 'Unknown error'}`);
    }
  }

  if (result.success && result.checklist.length > 0) {
    console.log();
    console.log(chalk.dim('Next steps:'));
    result.checklist.forEach((item, index) => {
      console.log(`  ${index + 1}. ${item}`);
    });
  }
}
