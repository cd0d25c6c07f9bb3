/**
 * Scaffold type definitions.
 */

/** Token name → replacement text. */
export type TokenMap = Readonly<Record<string, string>>;

/**
 * One template of a variant and where its output goes.
 */
export interface ManifestEntry {
  /** Template path, relative to the template library root */
  readonly template: string;
  /** Output path pattern, relative to the output root; may contain tokens */
  readonly output: string;
}

/**
 * The ordered file set of one architectural variant.
 */
export interface VariantManifest {
  readonly description: string;
  readonly files: readonly ManifestEntry[];
  /** Manual follow-up steps; may contain tokens */
  readonly checklist: readonly string[];
}

/**
 * Template root plus the registered variants. Loaded once, never mutated.
 */
export interface TemplateLibrary {
  readonly templatesDir: string;
  readonly variants: Readonly<Record<string, VariantManifest>>;
}

/**
 * Options for a scaffold run.
 */
export interface ScaffoldRequest {
  /** Feature name, e.g. "UserProfile" */
  featureName: string;
  /** Variant selector, e.g. "mvi" */
  variant: string;
  /** Output root directory */
  outputRoot: string;
  /** Base package, e.g. "com.example" */
  basePackage: string;
  /** Value of the DATA_TYPE token (default "Any") */
  dataType?: string;
}

/**
 * Outcome for a single generated file.
 */
export interface FileWriteResult {
  template: string;
  /** Absolute output path */
  outputPath: string;
  success: boolean;
  error?: string;
}

/**
 * Outcome of a whole scaffold run.
 */
export interface ScaffoldResult {
  featureName: string;
  variant: string;
  fullPackage: string;
  files: FileWriteResult[];
  written: number;
  failed: number;
  /** True only when every file was written */
  success: boolean;
  checklist: string[];
}
