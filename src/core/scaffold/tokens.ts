/**
 * Literal `{{TOKEN}}` substitution.
 *
 * Single left-to-right pass: substituted values are emitted and never
 * rescanned, and unknown tokens pass through untouched. There is no
 * expression language.
 */
import type { NameContext } from '../naming/index.js';
import { PACKAGE_PATTERN } from '../config/schema.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { TokenMap } from './types.js';

export const TOKEN_OPEN = '{{';
export const TOKEN_CLOSE = '}}';

const TOKEN_NAME_PATTERN = /\{\{([A-Za-z0-9_]+)\}\}/g;

/**
 * Token names ordered longest first, ties by name, so a token that is a
 * prefix of another can never shadow it.
 */
function orderTokenNames(tokens: TokenMap): string[] {
  return Object.keys(tokens).sort((a, b) => b.length - a.length || a.localeCompare(b));
}

export function substituteTokens(template: string, tokens: TokenMap): string {
  const names = orderTokenNames(tokens);
  if (names.length === 0) return template;

  let output = '';
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf(TOKEN_OPEN, cursor);
    if (open === -1) {
      output += template.slice(cursor);
      break;
    }

    output += template.slice(cursor, open);

    const matched = names.find((name) =>
      template.startsWith(`${TOKEN_OPEN}${name}${TOKEN_CLOSE}`, open)
    );

    if (matched === undefined) {
      // Not a registered token here; step one character so `{{{A}}` still finds `{{A}}`.
      output += template.charAt(open);
      cursor = open + 1;
    } else {
      output += tokens[matched];
      cursor = open + TOKEN_OPEN.length + matched.length + TOKEN_CLOSE.length;
    }
  }

  return output;
}

/**
 * Distinct token names present in a template, in order of first appearance.
 */
export function findTokens(template: string): string[] {
  const seen = new Set<string>();
  for (const match of template.matchAll(TOKEN_NAME_PATTERN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

export interface ScaffoldTokenOptions {
  basePackage: string;
  dataType: string;
}

export function validatePackage(basePackage: string): void {
  if (!PACKAGE_PATTERN.test(basePackage)) {
    throw new ValidationError(
      ErrorCodes.INVALID_PACKAGE,
      `Invalid package "${basePackage}": expected a dotted identifier such as com.example`,
      { package: basePackage }
    );
  }
}

/**
 * The standard token map for one scaffold run.
 */
export function buildScaffoldTokens(ctx: NameContext, options: ScaffoldTokenOptions): TokenMap {
  validatePackage(options.basePackage);

  const fullPackage = `${options.basePackage}.feature.${ctx.lower}`;

  return Object.freeze({
    FEATURE_NAME: ctx.pascal,
    FEATURE_LOWER: ctx.lower,
    FEATURE_UPPER: ctx.upper,
    // Historical name: this token has always carried the snake_case form.
    FEATURE_NAME_CAMEL: ctx.snake,
    FEATURE_CAMEL: ctx.camel,
    FEATURE_SNAKE: ctx.snake,
    BASE_PACKAGE: options.basePackage,
    PACKAGE: fullPackage,
    FULL_PACKAGE: fullPackage,
    PACKAGE_PATH: fullPackage.split('.').join('/'),
    DATA_TYPE: options.dataType,
  });
}
