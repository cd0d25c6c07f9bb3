/**
 * CLI command for the pre-commit forbidden-pattern gate.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { createScanRules, scanFiles } from '../../core/scan/index.js';
import type { ScanInput } from '../../core/scan/index.js';
import { ScanFormatter } from '../formatters/scan.js';
import { fileExists, readFile, readStdin } from '../../utils/file-system.js';
import { getStagedFiles, splitLines } from '../../utils/git.js';
import { IOError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CONFIG_DESCRIPTION, CONFIG_FLAGS, loadCommandConfig } from './config-option.js';

interface ScanOptions {
  stdin?: boolean;
  staged?: boolean;
  json?: boolean;
  config?: string;
}

export function createScanCommand(): Command {
  return new Command('scan')
    .description('Block commits that contain forbidden log statements')
    .argument('[files...]', 'Files to scan')
    .option('--stdin', 'Read newline-separated file paths from standard input')
    .option('--staged', 'Scan files staged in git')
    .option('--json', 'Output as JSON')
    .option(CONFIG_FLAGS, CONFIG_DESCRIPTION)
    .action((files: string[], options: ScanOptions) => {
      try {
        runScan(files, options);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

function runScan(files: string[], options: ScanOptions): void {
  const projectRoot = process.cwd();
  const config = loadCommandConfig(options.config);
  const rules = createScanRules(config.scan.forbidden_patterns, config.scan.allow_list);

  const candidates = [...files];
  if (options.stdin) {
    candidates.push(...splitLines(readStdin()));
  }
  if (options.staged) {
    candidates.push(...getStagedFiles(projectRoot));
  }

  const paths = filterByExtension([...new Set(candidates)], config.scan.extensions);
  if (paths.length === 0 && !options.json) {
    logger.info('No files to scan');
    return;
  }

  const result = scanFiles(readScanInputs(paths, projectRoot), rules);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(new ScanFormatter({ colors: true }).format(result));
  }

  if (result.verdict === 'blocked') {
    process.exit(1);
  }
}

/**
 * Keep paths with one of the extensions; an empty list keeps everything.
 */
export function filterByExtension(paths: readonly string[], extensions: readonly string[]): string[] {
  if (extensions.length === 0) return [...paths];
  return paths.filter((p) => extensions.some((ext) => p.endsWith(ext)));
}

/**
 * Read the files to scan. Missing files are skipped with a warning;
 * a file that exists but cannot be read is an error.
 */
export function readScanInputs(paths: readonly string[], projectRoot: string): ScanInput[] {
  const inputs: ScanInput[] = [];

  for (const filePath of paths) {
    const fullPath = path.resolve(projectRoot, filePath);
    if (!fileExists(fullPath)) {
      logger.warn(`Skipping missing file: ${filePath}`);
      continue;
    }
    try {
      inputs.push({ path: filePath, content: readFile(fullPath) });
    } catch (error) {
      throw new IOError(
        ErrorCodes.FILE_UNREADABLE,
        `Cannot read ${filePath}: ${errorMessage(error)}`,
        { path: fullPath }
      );
    }
  }

  return inputs;
}
