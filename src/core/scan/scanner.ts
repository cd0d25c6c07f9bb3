/**
 * Forbidden-pattern scanner for the pre-commit gate.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { compilePattern, validatePattern } from '../../utils/pattern-matcher.js';
import type { ScanInput, ScanMatch, ScanResult, ScanRules } from './types.js';

/**
 * Compile the pattern table. Throws ConfigError on the first unusable pattern.
 */
export function createScanRules(patterns: readonly string[], allowList: readonly string[]): ScanRules {
  const forbidden = patterns.map((source) => {
    const problem = validatePattern(source);
    if (problem) {
      throw new ConfigError(
        ErrorCodes.INVALID_PATTERN,
        `Invalid forbidden pattern "${source}": ${problem}`,
        { pattern: source }
      );
    }
    return Object.freeze({ source, regex: compilePattern(source) });
  });

  return Object.freeze({
    forbidden: Object.freeze(forbidden),
    allowList: Object.freeze([...allowList]),
  });
}

/**
 * Substring match against the allow-list, with Windows separators normalised.
 */
export function isAllowListed(filePath: string, allowList: readonly string[]): boolean {
  const normalized = filePath.replace(/\\/g, '/');
  return allowList.some((entry) => normalized.includes(entry));
}

export function scanContent(filePath: string, content: string, rules: ScanRules): ScanMatch[] {
  const matches: ScanMatch[] = [];

  content.split(/\r?\n/).forEach((lineText, index) => {
    const hit = rules.forbidden.find((pattern) => pattern.regex.test(lineText));
    if (hit) {
      matches.push({ filePath, lineNumber: index + 1, pattern: hit.source, lineText });
    }
  });

  return matches;
}

export function scanFiles(inputs: readonly ScanInput[], rules: ScanRules): ScanResult {
  const matches: ScanMatch[] = [];
  const filesSkipped: string[] = [];
  let filesScanned = 0;

  for (const input of inputs) {
    if (isAllowListed(input.path, rules.allowList)) {
      filesSkipped.push(input.path);
      continue;
    }
    filesScanned++;
    matches.push(...scanContent(input.path, input.content, rules));
  }

  return {
    verdict: matches.length > 0 ? 'blocked' : 'clean',
    matches,
    filesScanned,
    filesSkipped,
  };
}

/**
 * Matches grouped by file, in first-seen order.
 */
export function groupMatchesByFile(matches: readonly ScanMatch[]): Map<string, ScanMatch[]> {
  const groups = new Map<string, ScanMatch[]>();
  for (const match of matches) {
    const group = groups.get(match.filePath);
    if (group) {
      group.push(match);
    } else {
      groups.set(match.filePath, [match]);
    }
  }
  return groups;
}
