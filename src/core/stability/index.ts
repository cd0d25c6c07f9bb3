/**
 * Stability analysis exports barrel file.
 */
export { parseReport, parseReportFile } from './parser.js';
export {
  findReportFiles,
  loadReports,
  resolveReportDir,
  reportGenerationHint,
  CLASSES_SUFFIX,
  COMPOSABLES_SUFFIX,
} from './reports.js';
export { summarizeStability, safeRate, toPercent, rateBand } from './aggregator.js';
export type { RateBand } from './aggregator.js';
export { CLASS_HINT_RULES, COMPOSABLE_HINT_RULES, selectHint, isCollectionType } from './hints.js';
export type { HintRule } from './hints.js';
export type {
  Stability,
  ReportMember,
  ClassRecord,
  ComposableRecord,
  ReportRecord,
  IssueKind,
  StabilityIssue,
  StabilitySummary,
  ReportFiles,
} from './types.js';
