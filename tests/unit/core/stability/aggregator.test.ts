/**
 * Tests for stability aggregation.
 */
import { describe, it, expect } from 'vitest';
import {
  summarizeStability,
  safeRate,
  toPercent,
  rateBand,
} from '../../../../src/core/stability/aggregator.js';
import { parseReport } from '../../../../src/core/stability/parser.js';
import type { ClassRecord, ComposableRecord } from '../../../../src/core/stability/types.js';

function unstableClass(name: string, members: Array<[string, string, boolean]>): ClassRecord {
  return {
    kind: 'class',
    name,
    stability: 'unstable',
    unstableMembers: members.map(([memberName, type, mutable]) => ({ name: memberName, type, mutable })),
    line: 1,
  };
}

function composable(name: string, skippable: boolean, params: string[] = []): ComposableRecord {
  return { kind: 'composable', name, restartable: true, skippable, unstableParameters: params, line: 1 };
}

describe('summarizeStability', () => {
  it('should count and cite an unstable class', () => {
    const summary = summarizeStability(
      parseReport('unstable class Foo\n  unstable val items: List<Item>\nstable class Bar\n')
    );

    expect(summary.stableCount).toBe(1);
    expect(summary.unstableCount).toBe(1);
    expect(summary.stabilityRate).toBe(0.5);
    expect(summary.issues).toHaveLength(1);
    expect(summary.issues[0]).toEqual({
      kind: 'unstable-class',
      name: 'Foo',
      severity: 1,
      cited: ['items'],
      details: ['val items: List<Item>'],
      hint: 'Replace List/Set/Map with ImmutableList/ImmutableSet/ImmutableMap for items',
      ruleId: 'collection-type',
    });
  });

  it('should not suggest immutable collections for state holders', () => {
    const summary = summarizeStability(parseReport(
      'unstable class HomeState {\n  unstable val state: MutableStateFlow<Int>\n  unstable val label: MutableState<String>\n}\n'
    ));

    expect(summary.issues[0]).toMatchObject({
      ruleId: 'default',
      hint: 'Annotate the class with @Immutable or @Stable once every property is a read-only val of a stable type',
    });
  });

  it('should report zero rates without records', () => {
    expect(summarizeStability([])).toEqual({
      stableCount: 0,
      unstableCount: 0,
      skippableCount: 0,
      nonSkippableCount: 0,
      stabilityRate: 0,
      skippableRate: 0,
      issues: [],
    });
  });

  it('should report a full rate when every class is stable', () => {
    const summary = summarizeStability(parseReport('stable class A\nstable class B\n'));

    expect(summary.stabilityRate).toBe(1);
    expect(summary.issues).toEqual([]);
  });

  it('should rank by severity, then by name', () => {
    const summary = summarizeStability([
      unstableClass('Zeta', [['a', 'A', false]]),
      unstableClass('Alpha', [['a', 'A', false]]),
      unstableClass('Mid', [['a', 'A', false], ['b', 'B', false]]),
    ]);

    expect(summary.issues.map((i) => i.name)).toEqual(['Mid', 'Alpha', 'Zeta']);
  });

  it('should rank composables after classes regardless of severity', () => {
    const summary = summarizeStability([
      composable('Wide', false, ['a', 'b', 'c']),
      unstableClass('Small', [['a', 'A', false]]),
      composable('Narrow', false, ['a']),
      composable('Fine', true),
    ]);

    expect(summary.issues.map((i) => [i.kind, i.name])).toEqual([
      ['unstable-class', 'Small'],
      ['non-skippable-composable', 'Wide'],
      ['non-skippable-composable', 'Narrow'],
    ]);
    expect(summary.skippableCount).toBe(1);
    expect(summary.nonSkippableCount).toBe(2);
    expect(summary.skippableRate).toBeCloseTo(1 / 3);
  });

  it('should describe composable issues by their parameters', () => {
    const [issue] = summarizeStability([composable('CartBadge', false, ['state', 'extra'])]).issues;

    expect(issue).toEqual({
      kind: 'non-skippable-composable',
      name: 'CartBadge',
      severity: 2,
      cited: ['state', 'extra'],
      details: ['unstable state', 'unstable extra'],
      hint: 'Stabilize parameters state, extra: pass immutable types or mark their classes @Immutable',
      ruleId: 'unstable-parameters',
    });
  });

  it('should be deterministic', () => {
    const records = parseReport('unstable class B\n  unstable var x: X\nunstable class A\n  unstable var y: Y\n');

    expect(summarizeStability(records)).toEqual(summarizeStability(records));
  });
});

describe('safeRate', () => {
  it('should divide', () => {
    expect(safeRate(1, 4)).toBe(0.25);
  });

  it('should return 0 for an empty total', () => {
    expect(safeRate(0, 0)).toBe(0);
  });
});

describe('toPercent', () => {
  it('should round down to whole percents', () => {
    expect(toPercent(1 / 3)).toBe(33);
    expect(toPercent(2 / 3)).toBe(66);
    expect(toPercent(1)).toBe(100);
    expect(toPercent(0)).toBe(0);
  });

  it('should absorb float error', () => {
    expect(toPercent(0.29)).toBe(29);
  });
});

describe('rateBand', () => {
  const thresholds = { good: 90, fair: 70 };

  it('should band by thresholds, inclusive', () => {
    expect(rateBand(90, thresholds)).toBe('good');
    expect(rateBand(89, thresholds)).toBe('fair');
    expect(rateBand(70, thresholds)).toBe('fair');
    expect(rateBand(69, thresholds)).toBe('poor');
  });
});
