import { groupMatchesByFile } from '../../core/scan/index.js';
import type { ScanResult } from '../../core/scan/index.js';
import { colorize } from './colorize.js';
import type { Color, FormatOptions } from './types.js';

/**
 * Human-readable scan verdict, matches grouped by file.
 */
export class ScanFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = { colors: options.colors ?? true };
  }

  format(result: ScanResult): string {
    const lines: string[] = [];

    for (const [file, matches] of groupMatchesByFile(result.matches)) {
      lines.push(this.c(`✗ Found in: ${file}`, 'red'));
      for (const match of matches) {
        lines.push(`   ${this.c(`Line ${match.lineNumber}:`, 'yellow')} ${match.lineText.trim()}`);
      }
      lines.push('');
    }

    if (result.verdict === 'clean') {
      lines.push(this.c('✓ No forbidden log statements found', 'green'));
      return lines.join('\n');
    }

    lines.push(this.c('✗ Commit blocked: Remove debug logs before committing', 'red'));
    lines.push('');
    lines.push(this.c('Suggestions:', 'yellow'));
    lines.push('   - Use Timber instead: Timber.d("message")');
    lines.push('   - Timber is stripped in release builds');
    lines.push('');
    lines.push('   To bypass (emergency only):');
    lines.push('   git commit --no-verify');

    return lines.join('\n');
  }

  private c(text: string, color: Color): string {
    return colorize(text, color, this.options.colors);
  }
}
