import { rateBand, toPercent } from '../../core/stability/index.js';
import type {
  ClassRecord,
  ComposableRecord,
  RateBand,
  ReportRecord,
  StabilityIssue,
  StabilitySummary,
} from '../../core/stability/index.js';
import type { Thresholds } from '../../core/config/index.js';
import { colorize } from './colorize.js';
import type { Color, FormatOptions } from './types.js';

export interface StabilityFormatOptions extends FormatOptions {
  thresholds: Thresholds;
  /** Unstable members listed under each class */
  maxMembersShown: number;
  /** Non-skippable composables listed */
  maxComposablesShown: number;
}

export interface StabilityReportContext {
  module: string;
  reportDir: string;
  records: readonly ReportRecord[];
}

const BAND_COLORS: Record<RateBand, Color> = {
  good: 'green',
  fair: 'yellow',
  poor: 'red',
};

/**
 * Human-readable stability report.
 */
export class StabilityFormatter {
  private options: StabilityFormatOptions;

  constructor(options: Partial<StabilityFormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      thresholds: options.thresholds ?? { good: 90, fair: 70 },
      maxMembersShown: options.maxMembersShown ?? 5,
      maxComposablesShown: options.maxComposablesShown ?? 10,
    };
  }

  format(summary: StabilitySummary, context: StabilityReportContext): string {
    const lines: string[] = [];

    lines.push(this.c(`Stability Analysis: ${context.module}`, 'bold'));
    lines.push(this.c(`Reports: ${context.reportDir}`, 'dim'));
    lines.push('');

    lines.push(...this.formatClasses(summary, context.records));
    lines.push('');
    lines.push(...this.formatComposables(summary, context.records));

    if (summary.issues.length > 0) {
      lines.push('');
      lines.push(...this.formatIssues(summary.issues));
    }

    const recommendations = this.formatRecommendations(summary);
    if (recommendations.length > 0) {
      lines.push('');
      lines.push(...recommendations);
    }

    return lines.join('\n');
  }

  private formatClasses(summary: StabilitySummary, records: readonly ReportRecord[]): string[] {
    const lines = [this.c('Unstable Classes:', 'yellow')];
    const unstable = records.filter(
      (r): r is ClassRecord => r.kind === 'class' && r.stability === 'unstable'
    );

    if (unstable.length === 0) {
      lines.push(`   ${this.c('✓ No unstable classes found!', 'green')}`);
    }
    for (const record of unstable) {
      lines.push(`   ${this.c(`✗ ${record.name}`, 'red')}`);
      for (const member of record.unstableMembers.slice(0, this.options.maxMembersShown)) {
        lines.push(`      └─ unstable ${member.mutable ? 'var' : 'val'} ${member.name}: ${member.type}`);
      }
    }

    lines.push('');
    lines.push(`   Total: ${summary.stableCount} stable, ${summary.unstableCount} unstable`);
    lines.push(`   Stability Rate: ${this.formatRate(summary.stabilityRate)}`);
    return lines;
  }

  private formatComposables(summary: StabilitySummary, records: readonly ReportRecord[]): string[] {
    const lines = [this.c('Non-Skippable Composables:', 'yellow')];
    const nonSkippable = records.filter(
      (r): r is ComposableRecord => r.kind === 'composable' && !r.skippable
    );

    if (nonSkippable.length === 0) {
      lines.push(`   ${this.c('✓ All composables are skippable!', 'green')}`);
    }
    for (const record of nonSkippable.slice(0, this.options.maxComposablesShown)) {
      lines.push(`   ${this.c(`⚠ fun ${record.name}`, 'yellow')} - not skippable`);
    }
    const hidden = nonSkippable.length - this.options.maxComposablesShown;
    if (hidden > 0) {
      lines.push(this.c(`   ... and ${hidden} more`, 'dim'));
    }

    lines.push('');
    lines.push(`   Total: ${summary.skippableCount} skippable, ${summary.nonSkippableCount} not skippable`);
    lines.push(`   Skippable Rate: ${this.formatRate(summary.skippableRate)}`);
    return lines;
  }

  private formatIssues(issues: readonly StabilityIssue[]): string[] {
    const lines = [this.c('Ranked Issues:', 'cyan')];
    issues.forEach((issue, index) => {
      const what = issue.kind === 'unstable-class'
        ? `unstable class, ${plural(issue.severity, 'unstable member')}`
        : `not skippable, ${plural(issue.severity, 'unstable parameter')}`;
      lines.push(`   ${index + 1}. ${issue.name} (${what})`);
      if (issue.cited.length > 0) {
        lines.push(`      Cites: ${issue.cited.join(', ')}`);
      }
      lines.push(`      ${this.c(`Fix: ${issue.hint}`, 'cyan')}`);
    });
    return lines;
  }

  private formatRecommendations(summary: StabilitySummary): string[] {
    const sections: string[][] = [];

    if (summary.unstableCount > 0) {
      sections.push([
        'Fix Unstable Classes:',
        '- Use @Immutable annotation for UI state classes',
        '- Replace List<T> with ImmutableList<T>',
        '- Replace Map<K,V> with ImmutableMap<K,V>',
      ]);
    }
    if (summary.nonSkippableCount > 0) {
      sections.push([
        'Fix Non-Skippable Composables:',
        '- Ensure all parameters are stable',
        '- Use remember { } for lambda callbacks',
        '- Hoist state to parent composables',
      ]);
    }
    if (sections.length === 0) return [];

    const lines = [this.c('Recommendations:', 'cyan')];
    sections.forEach(([title, ...items], index) => {
      lines.push(`   ${this.c(`${index + 1}. ${title}`, 'yellow')}`);
      for (const item of items) {
        lines.push(`      ${item}`);
      }
    });
    return lines;
  }

  private formatRate(rate: number): string {
    const percent = toPercent(rate);
    const band = rateBand(percent, this.options.thresholds);
    return this.c(`${percent}%`, BAND_COLORS[band]);
  }

  private c(text: string, color: Color): string {
    return colorize(text, color, this.options.colors);
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
