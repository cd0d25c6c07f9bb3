/**
 * Report discovery. Reports are produced by the build beforehand; this
 * module only finds and reads them.
 */
import * as path from 'node:path';
import { globFiles, isDirectory } from '../../utils/file-system.js';
import { IOError, ErrorCodes } from '../../utils/errors.js';
import { parseReportFile } from './parser.js';
import type { ReportFiles, ReportRecord } from './types.js';

export const CLASSES_SUFFIX = '-classes.txt';
export const COMPOSABLES_SUFFIX = '-composables.txt';

/**
 * Report directory of a module: `<module>/<reportDir>`.
 */
export function resolveReportDir(moduleDir: string, reportDir: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, moduleDir, reportDir);
}

/**
 * The build invocation that produces reports for a module.
 */
export function reportGenerationHint(moduleName: string): string {
  return `./gradlew :${moduleName}:assembleRelease -PcomposeCompilerReports=true -PcomposeCompilerMetrics=true`;
}

/**
 * Find class and composable reports under a directory.
 * Throws IOError when the directory holds neither.
 */
export function findReportFiles(directory: string, moduleName?: string): ReportFiles {
  const hint = moduleName ? ` Generate them with: ${reportGenerationHint(moduleName)}` : '';

  if (!isDirectory(directory)) {
    throw new IOError(
      ErrorCodes.REPORTS_NOT_FOUND,
      `Report directory not found: ${directory}.${hint}`,
      { path: directory }
    );
  }

  const classes = globFiles(`**/*${CLASSES_SUFFIX}`, { cwd: directory });
  const composables = globFiles(`**/*${COMPOSABLES_SUFFIX}`, { cwd: directory });

  if (classes.length === 0 && composables.length === 0) {
    throw new IOError(
      ErrorCodes.REPORTS_NOT_FOUND,
      `No *${CLASSES_SUFFIX} or *${COMPOSABLES_SUFFIX} reports in ${directory}.${hint}`,
      { path: directory }
    );
  }

  return { directory, classes, composables };
}

/**
 * Parse every report, class reports first, each group in path order.
 */
export function loadReports(files: ReportFiles): ReportRecord[] {
  return [...files.classes, ...files.composables].flatMap((file) => parseReportFile(file));
}
