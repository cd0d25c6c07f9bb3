/**
 * Derives the casing variants of a feature name.
 *
 * Word boundaries are underscores and lower→upper transitions only, so
 * `My_Feature2Name` splits into `My`, `Feature2Name`. Runs of capitals are
 * kept together (`HTTPClient` is one word).
 */
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

const NAME_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Casing variants of one feature name. Frozen once built.
 */
export interface NameContext {
  readonly original: string;
  readonly words: readonly string[];
  /** UserProfile */
  readonly pascal: string;
  /** userProfile */
  readonly camel: string;
  /** userprofile */
  readonly lower: string;
  /** USER_PROFILE */
  readonly upper: string;
  /** user_profile */
  readonly snake: string;
}

/**
 * Returns an error message for an unusable name, or null.
 */
export function validateFeatureName(name: string): string | null {
  if (name.length === 0) {
    return 'Feature name is required';
  }
  if (!NAME_PATTERN.test(name)) {
    return `Invalid feature name "${name}": only letters, digits and underscores are allowed`;
  }
  if (splitWords(name).length === 0) {
    return `Invalid feature name "${name}": no letters or digits`;
  }
  return null;
}

export function splitWords(name: string): string[] {
  return name
    .split('_')
    .flatMap((segment) => segment.replace(/([a-z])([A-Z])/g, '$1_$2').split('_'))
    .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function deriveNameContext(name: string): NameContext {
  const problem = validateFeatureName(name);
  if (problem) {
    throw new ValidationError(ErrorCodes.INVALID_NAME, problem, { name });
  }

  const words = splitWords(name);
  const pascal = words.map(capitalize).join('');

  return Object.freeze({
    original: name,
    words: Object.freeze([...words]),
    pascal,
    camel: pascal.charAt(0).toLowerCase() + pascal.slice(1),
    lower: words.join('').toLowerCase(),
    upper: words.map((w) => w.toUpperCase()).join('_'),
    snake: words.map((w) => w.toLowerCase()).join('_'),
  });
}
