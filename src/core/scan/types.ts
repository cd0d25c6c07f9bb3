/**
 * Pattern scanner type definitions.
 */

export interface ForbiddenPattern {
  /** Source text as configured */
  readonly source: string;
  readonly regex: RegExp;
}

/**
 * Compiled, immutable scan table.
 */
export interface ScanRules {
  readonly forbidden: readonly ForbiddenPattern[];
  /** Path substrings; a file whose path contains one is never scanned */
  readonly allowList: readonly string[];
}

export interface ScanInput {
  path: string;
  content: string;
}

export interface ScanMatch {
  filePath: string;
  /** 1-indexed */
  lineNumber: number;
  /** Source of the first forbidden pattern the line matched */
  pattern: string;
  lineText: string;
}

/** There is no advisory outcome: a scan is either clean or blocked. */
export type ScanVerdict = 'clean' | 'blocked';

export interface ScanResult {
  verdict: ScanVerdict;
  matches: ScanMatch[];
  filesScanned: number;
  /** Paths skipped by the allow-list */
  filesSkipped: string[];
}
