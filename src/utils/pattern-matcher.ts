/**
 * Regex compilation with ReDoS protection.
 * Used for the forbidden-pattern table of the scanner.
 */

/** Maximum pattern length to prevent catastrophic backtracking. */
const MAX_PATTERN_LENGTH = 5000;

/** Patterns known to cause catastrophic backtracking. */
const DANGEROUS_PATTERNS = [
  /\(\.\*\)\+/,      // (.*)+
  /\(\.\+\)\+/,      // (.+)+
  /\([^)]*\+\)\+/,   // (a+)+
  /\([^)]*\*\)\*/,   // (a*)*
];

/**
 * Validate a pattern for potential ReDoS vulnerabilities or syntax errors.
 * Returns an error message if the pattern is unusable.
 */
export function validatePattern(pattern: string): string | null {
  if (pattern.length === 0) {
    return 'Pattern is empty';
  }

  if (pattern.length > MAX_PATTERN_LENGTH) {
    return `Pattern exceeds maximum length of ${MAX_PATTERN_LENGTH} characters`;
  }

  for (const dangerous of DANGEROUS_PATTERNS) {
    if (dangerous.test(pattern)) {
      return `Pattern contains potentially dangerous construct that could cause ReDoS`;
    }
  }

  try {
    new RegExp(pattern);
  } catch (error) {
    return error instanceof Error ? error.message : 'Invalid regular expression';
  }

  return null;
}

/**
 * Compile a validated pattern. Non-global, so `test` carries no lastIndex state.
 */
export function compilePattern(pattern: string): RegExp {
  return new RegExp(pattern);
}
