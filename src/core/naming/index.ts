export { deriveNameContext, validateFeatureName, splitWords } from './case-deriver.js';
export type { NameContext } from './case-deriver.js';
