/**
 * Tests for report discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  findReportFiles,
  loadReports,
  resolveReportDir,
  reportGenerationHint,
} from '../../../../src/core/stability/reports.js';
import { IOError, ErrorCodes } from '../../../../src/utils/errors.js';

const FIXTURE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../fixtures/reports');
const REPORT_DIR = path.join(FIXTURE_ROOT, 'app/build/compose-reports');

describe('resolveReportDir', () => {
  it('should place the report directory under the module', () => {
    expect(resolveReportDir('app', 'build/compose-reports', '/work')).toBe(
      path.resolve('/work/app/build/compose-reports')
    );
  });
});

describe('reportGenerationHint', () => {
  it('should name the module task', () => {
    expect(reportGenerationHint('app')).toBe(
      './gradlew :app:assembleRelease -PcomposeCompilerReports=true -PcomposeCompilerMetrics=true'
    );
  });
});

describe('findReportFiles', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'featurekit-reports-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should find class and composable reports', () => {
    expect(findReportFiles(REPORT_DIR)).toEqual({
      directory: REPORT_DIR,
      classes: [path.join(REPORT_DIR, 'app_release-classes.txt')],
      composables: [path.join(REPORT_DIR, 'app_release-composables.txt')],
    });
  });

  it('should throw when the directory is missing', () => {
    const missing = path.join(tempDir, 'absent');

    expect(() => findReportFiles(missing, 'app')).toThrow(
      `Report directory not found: ${missing}. Generate them with: ${reportGenerationHint('app')}`
    );
  });

  it('should throw when the directory holds no reports', () => {
    fs.writeFileSync(path.join(tempDir, 'app-module.json'), '{}');

    try {
      findReportFiles(tempDir);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IOError);
      if (error instanceof IOError) {
        expect(error.code).toBe(ErrorCodes.REPORTS_NOT_FOUND);
        expect(error.message).toBe(`No *-classes.txt or *-composables.txt reports in ${tempDir}.`);
      }
    }
  });
});

describe('loadReports', () => {
  it('should read class reports before composable reports', () => {
    const records = loadReports(findReportFiles(REPORT_DIR));

    expect(records.map((r) => `${r.kind}:${r.name}`)).toEqual([
      'class:HomeUiState',
      'class:Item',
      'class:CartState',
      'composable:Header',
      'composable:ItemList',
      'composable:CartBadge',
      'composable:Footer',
    ]);
  });
});
