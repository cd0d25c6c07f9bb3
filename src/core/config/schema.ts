import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Dotted package path such as com.example.app */
export const PACKAGE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/** Scaffold generation settings. */
export const ScaffoldSettingsSchema = z.object({
  base_package: z.string().regex(PACKAGE_PATTERN).default('com.example'),
  /** Output root for generated feature modules */
  output: z.string().min(1).default('feature'),
  default_pattern: z.string().min(1).default('mvi'),
  /** Value of the DATA_TYPE token */
  data_type: z.string().min(1).default('Any'),
  /** Override of the template library shipped with the tool */
  templates_dir: z.string().optional(),
});

/** Rate bands for colouring the stability rate (percent). */
export const ThresholdsSchema = z.object({
  good: z.number().min(0).max(100).default(90),
  fair: z.number().min(0).max(100).default(70),
});

/** Stability report analysis settings. */
export const StabilitySettingsSchema = z.object({
  /** Report directory, relative to the module directory */
  report_dir: z.string().min(1).default('build/compose-reports'),
  thresholds: withDefaults(ThresholdsSchema),
  max_members_shown: z.number().int().min(0).default(5),
  max_composables_shown: z.number().int().min(0).default(10),
});

export const DEFAULT_FORBIDDEN_PATTERNS = [
  'Log\\.d\\(',
  'Log\\.v\\(',
  'Log\\.i\\(',
  'println\\(',
  'print\\(',
  'System\\.out\\.',
  'System\\.err\\.',
];

export const DEFAULT_ALLOW_LIST = ['/test/', '/androidTest/'];

/** Pre-commit scan settings. */
export const ScanSettingsSchema = z.object({
  /** File extensions to scan; empty means every file */
  extensions: z.array(z.string()).default(['.kt']),
  forbidden_patterns: z.array(z.string().min(1)).default(DEFAULT_FORBIDDEN_PATTERNS),
  /** Path substrings whose files are never scanned */
  allow_list: z.array(z.string().min(1)).default(DEFAULT_ALLOW_LIST),
});

export const ConfigSchema = z.object({
  scaffold: withDefaults(ScaffoldSettingsSchema),
  stability: withDefaults(StabilitySettingsSchema),
  scan: withDefaults(ScanSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScaffoldSettings = z.infer<typeof ScaffoldSettingsSchema>;
export type StabilitySettings = z.infer<typeof StabilitySettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type Thresholds = z.infer<typeof ThresholdsSchema>;
