/**
 * Tests for the scan result formatter.
 */
import { describe, it, expect } from 'vitest';
import { ScanFormatter } from '../../../../src/cli/formatters/scan.js';
import { createScanRules, scanFiles } from '../../../../src/core/scan/scanner.js';
import { DEFAULT_ALLOW_LIST, DEFAULT_FORBIDDEN_PATTERNS } from '../../../../src/core/config/schema.js';

const rules = createScanRules(DEFAULT_FORBIDDEN_PATTERNS, DEFAULT_ALLOW_LIST);
const formatter = new ScanFormatter({ colors: false });

describe('ScanFormatter', () => {
  it('should confirm a clean scan', () => {
    const result = scanFiles([{ path: 'app/src/main/kotlin/A.kt', content: 'Timber.d("ok")' }], rules);

    expect(formatter.format(result)).toBe('✓ No forbidden log statements found');
  });

  it('should group matches by file and suggest fixes', () => {
    const result = scanFiles(
      [
        { path: 'app/src/main/kotlin/A.kt', content: 'fun a() {\n    Log.d("a", "b")\n    println("x")\n}' },
        { path: 'app/src/main/kotlin/B.kt', content: 'System.err.write(1)' },
      ],
      rules
    );

    expect(formatter.format(result).split('\n')).toEqual([
      '✗ Found in: app/src/main/kotlin/A.kt',
      '   Line 2: Log.d("a", "b")',
      '   Line 3: println("x")',
      '',
      '✗ Found in: app/src/main/kotlin/B.kt',
      '   Line 1: System.err.write(1)',
      '',
      '✗ Commit blocked: Remove debug logs before committing',
      '',
      'Suggestions:',
      '   - Use Timber instead: Timber.d("message")',
      '   - Timber is stripped in release builds',
      '',
      '   To bypass (emergency only):',
      '   git commit --no-verify',
    ]);
  });
});
