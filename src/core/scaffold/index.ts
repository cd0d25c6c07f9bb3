/**
 * Scaffold exports barrel file.
 */
export { ScaffoldWriter } from './writer.js';
export {
  loadTemplateLibrary,
  listVariants,
  hasVariant,
  getVariant,
  DEFAULT_TEMPLATES_DIR,
} from './manifest.js';
export {
  substituteTokens,
  findTokens,
  buildScaffoldTokens,
  validatePackage,
  TOKEN_OPEN,
  TOKEN_CLOSE,
} from './tokens.js';
export type { ScaffoldTokenOptions } from './tokens.js';
export type {
  TokenMap,
  ManifestEntry,
  VariantManifest,
  TemplateLibrary,
  ScaffoldRequest,
  FileWriteResult,
  ScaffoldResult,
} from './types.js';
