export { createScanRules, isAllowListed, scanContent, scanFiles, groupMatchesByFile } from './scanner.js';
export type {
  ForbiddenPattern,
  ScanRules,
  ScanInput,
  ScanMatch,
  ScanVerdict,
  ScanResult,
} from './types.js';
