/**
 * CLI command for Compose compiler stability reports.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import {
  findReportFiles,
  loadReports,
  resolveReportDir,
  summarizeStability,
} from '../../core/stability/index.js';
import { StabilityFormatter } from '../formatters/stability.js';
import { displayPath } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, loadCommandConfig } from './config-option.js';

interface StabilityOptions {
  reportDir?: string;
  json?: boolean;
  config?: string;
}

export function createStabilityCommand(): Command {
  return new Command('stability')
    .description('Summarize Compose compiler stability reports for a module')
    .argument('[module]', 'Module directory', 'app')
    .option('-r, --report-dir <dir>', 'Report directory (default: <module>/build/compose-reports)')
    .option('--json', 'Output as JSON')
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .action((moduleDir: string, options: StabilityOptions) => {
      try {
        runStability(moduleDir, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function runStability(moduleDir: string, options: StabilityOptions): void {
  const config = loadCommandConfig(options.config);
  const settings = config.stability;

  const reportDir = options.reportDir
    ? path.resolve(process.cwd(), options.reportDir)
    : resolveReportDir(moduleDir, settings.report_dir);
  const moduleName = path.basename(path.resolve(process.cwd(), moduleDir));

  const files = findReportFiles(reportDir, moduleName);
  logger.debug('Found reports', { classes: files.classes.length, composables: files.composables.length });

  const records = loadReports(files);
  const summary = summarizeStability(records);

  if (options.json) {
    console.log(JSON.stringify({ module: moduleName, reportDir, ...summary }, null, 2));
    return;
  }

  const formatter = new StabilityFormatter({
    colors: true,
    thresholds: settings.thresholds,
    maxMembersShown: settings.max_members_shown,
    maxComposablesShown: settings.max_composables_shown,
  });
  console.log(formatter.format(summary, {
    module: moduleName,
    reportDir: displayPath(reportDir),
    records,
  }));
}
