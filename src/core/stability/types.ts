/**
 * Stability report type definitions.
 */

export type Stability = 'stable' | 'unstable';

/**
 * An unstable property of a reported class.
 */
export interface ReportMember {
  readonly name: string;
  readonly type: string;
  /** Declared with `var` */
  readonly mutable: boolean;
}

export interface ClassRecord {
  readonly kind: 'class';
  readonly name: string;
  readonly stability: Stability;
  readonly unstableMembers: readonly ReportMember[];
  /** 1-indexed line of the class header */
  readonly line: number;
}

export interface ComposableRecord {
  readonly kind: 'composable';
  readonly name: string;
  readonly restartable: boolean;
  readonly skippable: boolean;
  /** Names of parameters the report marks unstable */
  readonly unstableParameters: readonly string[];
  /** 1-indexed line of the `fun Name(` signature */
  readonly line: number;
}

export type ReportRecord = ClassRecord | ComposableRecord;

export type IssueKind = 'unstable-class' | 'non-skippable-composable';

/**
 * One ranked finding with its remediation hint.
 */
export interface StabilityIssue {
  kind: IssueKind;
  name: string;
  /** Unstable members (classes) or unstable parameters (composables) */
  severity: number;
  /** Member or parameter names the issue is about */
  cited: string[];
  /** Cited members with their types, for display */
  details: string[];
  hint: string;
  ruleId: string;
}

export interface StabilitySummary {
  stableCount: number;
  unstableCount: number;
  skippableCount: number;
  nonSkippableCount: number;
  /** stable / (stable + unstable); 0 when there are no classes */
  stabilityRate: number;
  /** skippable / (skippable + nonSkippable); 0 when there are no composables */
  skippableRate: number;
  issues: StabilityIssue[];
}

/**
 * Report files found in a report directory.
 */
export interface ReportFiles {
  directory: string;
  classes: string[];
  composables: string[];
}
