/**
 * Stability aggregation: counts, rates, and the ranked issue list.
 */
import type { Thresholds } from '../config/schema.js';
import { CLASS_HINT_RULES, COMPOSABLE_HINT_RULES, selectHint } from './hints.js';
import type {
  ClassRecord,
  ComposableRecord,
  ReportRecord,
  StabilityIssue,
  StabilitySummary,
} from './types.js';

export type RateBand = 'good' | 'fair' | 'poor';

/**
 * part / total, defined as 0 for an empty total.
 */
export function safeRate(part: number, total: number): number {
  return total === 0 ? 0 : part / total;
}

function bySeverityThenName(a: StabilityIssue, b: StabilityIssue): number {
  return b.severity - a.severity || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
}

function classIssue(record: ClassRecord): StabilityIssue {
  const { ruleId, hint } = selectHint(CLASS_HINT_RULES, record);
  return {
    kind: 'unstable-class',
    name: record.name,
    severity: record.unstableMembers.length,
    cited: record.unstableMembers.map((m) => m.name),
    details: record.unstableMembers.map((m) => `${m.mutable ? 'var' : 'val'} ${m.name}: ${m.type}`),
    hint,
    ruleId,
  };
}

function composableIssue(record: ComposableRecord): StabilityIssue {
  const { ruleId, hint } = selectHint(COMPOSABLE_HINT_RULES, record);
  return {
    kind: 'non-skippable-composable',
    name: record.name,
    severity: record.unstableParameters.length,
    cited: [...record.unstableParameters],
    details: record.unstableParameters.map((p) => `unstable ${p}`),
    hint,
    ruleId,
  };
}

export function summarizeStability(records: readonly ReportRecord[]): StabilitySummary {
  const classes = records.filter((r): r is ClassRecord => r.kind === 'class');
  const composables = records.filter((r): r is ComposableRecord => r.kind === 'composable');

  const unstable = classes.filter((c) => c.stability === 'unstable');
  const nonSkippable = composables.filter((c) => !c.skippable);

  const stableCount = classes.length - unstable.length;
  const unstableCount = unstable.length;
  const skippableCount = composables.length - nonSkippable.length;
  const nonSkippableCount = nonSkippable.length;

  // Unstable classes always rank ahead of composables.
  const issues = [
    ...unstable.map(classIssue).sort(bySeverityThenName),
    ...nonSkippable.map(composableIssue).sort(bySeverityThenName),
  ];

  return {
    stableCount,
    unstableCount,
    skippableCount,
    nonSkippableCount,
    stabilityRate: safeRate(stableCount, stableCount + unstableCount),
    skippableRate: safeRate(skippableCount, skippableCount + nonSkippableCount),
    issues,
  };
}

/**
 * Whole-percent rate, rounded down. The epsilon absorbs float error (0.29 * 100 < 29).
 */
export function toPercent(rate: number): number {
  return Math.floor(rate * 100 + 1e-9);
}

export function rateBand(percent: number, thresholds: Thresholds): RateBand {
  if (percent >= thresholds.good) return 'good';
  if (percent >= thresholds.fair) return 'fair';
  return 'poor';
}
