/**
 * Template library loader - reads and validates templates/manifest.yaml.
 */
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';
import type { TemplateLibrary, VariantManifest } from './types.js';

const MANIFEST_FILE = 'manifest.yaml';

/** Library shipped alongside the tool: <package root>/templates */
export const DEFAULT_TEMPLATES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../templates'
);

const ManifestEntrySchema = z.object({
  template: z.string().min(1),
  output: z.string().min(1),
});

const VariantManifestSchema = z.object({
  description: z.string().default(''),
  files: z.array(ManifestEntrySchema).min(1),
  checklist: z.array(z.string()).default([]),
});

export const ManifestSchema = z.object({
  variants: z.record(z.string(), VariantManifestSchema),
});

function freezeVariant(variant: z.infer<typeof VariantManifestSchema>): VariantManifest {
  return Object.freeze({
    description: variant.description,
    files: Object.freeze(variant.files.map((entry) => Object.freeze({ ...entry }))),
    checklist: Object.freeze([...variant.checklist]),
  });
}

/**
 * Load the template library. Throws ConfigError on a missing or invalid manifest.
 */
export function loadTemplateLibrary(templatesDir: string = DEFAULT_TEMPLATES_DIR): TemplateLibrary {
  const root = path.resolve(templatesDir);
  const manifest = loadYamlWithSchema(path.join(root, MANIFEST_FILE), ManifestSchema);

  const variants: Record<string, VariantManifest> = {};
  for (const [name, variant] of Object.entries(manifest.variants)) {
    variants[name] = freezeVariant(variant);
  }

  return Object.freeze({ templatesDir: root, variants: Object.freeze(variants) });
}

export function listVariants(library: TemplateLibrary): string[] {
  return Object.keys(library.variants).sort();
}

export function hasVariant(library: TemplateLibrary, variant: string): boolean {
  return Object.prototype.hasOwnProperty.call(library.variants, variant);
}

/**
 * Look up a variant. Throws ValidationError with an UnknownVariant message.
 */
export function getVariant(library: TemplateLibrary, variant: string): VariantManifest {
  if (!hasVariant(library, variant)) {
    const available = listVariants(library);
    throw new ValidationError(
      ErrorCodes.UNKNOWN_VARIANT,
      `UnknownVariant: "${variant}" (available: ${available.join(', ') || 'none'})`,
      { variant, available }
    );
  }
  return library.variants[variant];
}
