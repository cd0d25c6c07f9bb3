/**
 * Tests for the scan command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createScanCommand,
  filterByExtension,
  readScanInputs,
} from '../../../../src/cli/commands/scan.js';

vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    blue: (s: string) => s,
    cyan: (s: string) => s,
    bold: (s: string) => s,
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../../src/utils/git.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../../src/utils/git.js')>()),
  getStagedFiles: vi.fn(() => []),
}));

vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../../src/utils/file-system.js')>()),
  readStdin: vi.fn(() => ''),
}));

import { logger } from '../../../../src/utils/logger.js';
import { getStagedFiles } from '../../../../src/utils/git.js';
import { readStdin } from '../../../../src/utils/file-system.js';

const FIXTURE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../fixtures/scan');
const DIRTY = 'app/src/main/kotlin/HomeViewModel.kt';
const CLEAN = 'app/src/main/kotlin/Clean.kt';
const TEST_FILE = 'app/src/test/kotlin/HomeViewModelTest.kt';

describe('scan command', () => {
  let output: string[];

  beforeEach(() => {
    vi.clearAllMocks();
    output = [];
    vi.spyOn(console, 'log').mockImplementation((message?: unknown) => {
      output.push(String(message));
    });
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    vi.spyOn(process, 'cwd').mockReturnValue(FIXTURE_ROOT);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function run(...args: string[]): Promise<void> {
    await createScanCommand().parseAsync(['node', 'scan', ...args]);
  }

  it('should create a command with correct name', () => {
    expect(createScanCommand().name()).toBe('scan');
  });

  it('should block a file with debug logs and exit 1', async () => {
    await expect(run(DIRTY)).rejects.toThrow('process.exit called');

    expect(output.join('\n').split('\n').slice(0, 4)).toEqual([
      `✗ Found in: ${DIRTY}`,
      '   Line 5: Log.d("Home", "loading")',
      '   Line 7: println("done")',
      '',
    ]);
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should pass clean files', async () => {
    await run(CLEAN);

    expect(output).toEqual(['✓ No forbidden log statements found']);
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should skip allow-listed test files', async () => {
    await run(TEST_FILE);

    expect(output).toEqual(['✓ No forbidden log statements found']);
  });

  it('should warn about and skip missing files', async () => {
    await run('app/src/main/kotlin/Missing.kt', CLEAN);

    expect(logger.warn).toHaveBeenCalledWith('Skipping missing file: app/src/main/kotlin/Missing.kt');
    expect(output).toEqual(['✓ No forbidden log statements found']);
  });

  it('should report when nothing matches the extensions', async () => {
    await run('README.md');

    expect(logger.info).toHaveBeenCalledWith('No files to scan');
    expect(output).toEqual([]);
  });

  it('should print a clean JSON result when nothing matches the extensions', async () => {
    await run('README.md', '--json');

    expect(logger.info).not.toHaveBeenCalled();
    expect(JSON.parse(output.join('\n'))).toEqual({
      verdict: 'clean',
      matches: [],
      filesScanned: 0,
      filesSkipped: [],
    });
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('should read paths from stdin', async () => {
    vi.mocked(readStdin).mockReturnValue(`${CLEAN}\n${DIRTY}\n`);

    await expect(run('--stdin')).rejects.toThrow('process.exit called');

    expect(output.join('\n')).toContain(`✗ Found in: ${DIRTY}`);
  });

  it('should scan staged files', async () => {
    vi.mocked(getStagedFiles).mockReturnValue([DIRTY, 'build.gradle']);

    await expect(run('--staged')).rejects.toThrow('process.exit called');

    expect(getStagedFiles).toHaveBeenCalledWith(FIXTURE_ROOT);
  });

  it('should print the result as JSON', async () => {
    await expect(run(DIRTY, CLEAN, '--json')).rejects.toThrow('process.exit called');

    const parsed: unknown = JSON.parse(output.join('\n'));
    expect(parsed).toMatchObject({
      verdict: 'blocked',
      filesScanned: 2,
      filesSkipped: [],
      matches: [
        { filePath: DIRTY, lineNumber: 5, pattern: 'Log\\.d\\(' },
        { filePath: DIRTY, lineNumber: 7, pattern: 'println\\(' },
      ],
    });
  });
});

describe('filterByExtension', () => {
  it('should keep matching extensions', () => {
    expect(filterByExtension(['a.kt', 'b.kts', 'c.java'], ['.kt'])).toEqual(['a.kt']);
  });

  it('should keep everything for an empty list', () => {
    expect(filterByExtension(['a.kt', 'c.java'], [])).toEqual(['a.kt', 'c.java']);
  });
});

describe('readScanInputs', () => {
  it('should read existing files relative to the root', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    const inputs = readScanInputs([CLEAN], FIXTURE_ROOT);

    expect(inputs).toEqual([
      { path: CLEAN, content: 'package com.example.home\n\nfun greet(name: String) = "Hello, $name"\n' },
    ]);
  });
});
