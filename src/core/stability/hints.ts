/**
 * Remediation rule table. Rules are tried in order; the first match wins.
 */
import type { ClassRecord, ComposableRecord } from './types.js';

const COLLECTION_TYPE =
  /^(List|Set|Map|Collection|Iterable|Sequence|Mutable(?:List|Set|Map|Collection|Iterable)|Array\w*|Hash\w*|LinkedHash\w*)\s*</;

export interface HintRule<T> {
  id: string;
  matches: (record: T) => boolean;
  hint: (record: T) => string;
}

export const CLASS_HINT_RULES: readonly HintRule<ClassRecord>[] = [
  {
    id: 'collection-type',
    matches: (record) => record.unstableMembers.some((m) => COLLECTION_TYPE.test(m.type)),
    hint: (record) => {
      const names = record.unstableMembers.filter((m) => COLLECTION_TYPE.test(m.type)).map((m) => m.name);
      return `Replace List/Set/Map with ImmutableList/ImmutableSet/ImmutableMap for ${names.join(', ')}`;
    },
  },
  {
    id: 'mutable-property',
    matches: (record) => record.unstableMembers.some((m) => m.mutable),
    hint: (record) => {
      const names = record.unstableMembers.filter((m) => m.mutable).map((m) => m.name);
      return `Declare ${names.join(', ')} with val instead of var`;
    },
  },
  {
    id: 'default',
    matches: () => true,
    hint: () => 'Annotate the class with @Immutable or @Stable once every property is a read-only val of a stable type',
  },
];

export const COMPOSABLE_HINT_RULES: readonly HintRule<ComposableRecord>[] = [
  {
    id: 'unstable-parameters',
    matches: (record) => record.unstableParameters.length > 0,
    hint: (record) =>
      `Stabilize parameters ${record.unstableParameters.join(', ')}: pass immutable types or mark their classes @Immutable`,
  },
  {
    id: 'default',
    matches: () => true,
    hint: () => 'Ensure all parameters are stable and wrap lambda callbacks in remember { }',
  },
];

export function selectHint<T>(rules: readonly HintRule<T>[], record: T): { ruleId: string; hint: string } {
  for (const rule of rules) {
    if (rule.matches(record)) {
      return { ruleId: rule.id, hint: rule.hint(record) };
    }
  }
  return { ruleId: 'none', hint: '' };
}

export function isCollectionType(type: string): boolean {
  return COLLECTION_TYPE.test(type);
}
