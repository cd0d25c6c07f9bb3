/**
 * Scaffold writer: expands one variant's templates into a feature module.
 *
 * Validation (name, variant, package, output path collisions) happens before
 * any file I/O. After that each file succeeds or fails on its own; files
 * already written are kept, and a re-run overwrites them.
 */
import * as path from 'node:path';
import { deriveNameContext } from '../naming/index.js';
import { readFile, writeFile, ensureDir, ensureWritableDir } from '../../utils/file-system.js';
import { ValidationError, IOError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { getVariant } from './manifest.js';
import { buildScaffoldTokens, substituteTokens } from './tokens.js';
import type {
  FileWriteResult,
  ManifestEntry,
  ScaffoldRequest,
  ScaffoldResult,
  TemplateLibrary,
  TokenMap,
} from './types.js';

const DEFAULT_DATA_TYPE = 'Any';

interface PlannedFile {
  entry: ManifestEntry;
  outputPath: string;
}

export class ScaffoldWriter {
  private readonly log = logger.child('scaffold');

  constructor(private readonly library: TemplateLibrary) {}

  scaffold(request: ScaffoldRequest): ScaffoldResult {
    const ctx = deriveNameContext(request.featureName);
    const manifest = getVariant(this.library, request.variant);
    const tokens = buildScaffoldTokens(ctx, {
      basePackage: request.basePackage,
      dataType: request.dataType ?? DEFAULT_DATA_TYPE,
    });

    const outputRoot = path.resolve(request.outputRoot);
    const plan = this.planOutputs(manifest.files, outputRoot, (pattern) =>
      substituteTokens(pattern, tokens)
    );

    try {
      ensureWritableDir(outputRoot);
    } catch (error) {
      throw new IOError(
        ErrorCodes.OUTPUT_NOT_WRITABLE,
        `Output root is not writable: ${outputRoot} (${errorMessage(error)})`,
        { path: outputRoot }
      );
    }

    const files = plan.map((planned) => this.writeOne(planned, tokens));
    const written = files.filter((f) => f.success).length;

    return {
      featureName: ctx.pascal,
      variant: request.variant,
      fullPackage: tokens.FULL_PACKAGE,
      files,
      written,
      failed: files.length - written,
      success: written === files.length,
      checklist: manifest.checklist.map((item) => substituteTokens(item, tokens)),
    };
  }

  /**
   * Resolve every output path up front. Two entries landing on the same path
   * is a manifest defect and aborts the run before anything is written.
   */
  private planOutputs(
    entries: readonly ManifestEntry[],
    outputRoot: string,
    resolve: (pattern: string) => string
  ): PlannedFile[] {
    const seen = new Map<string, string>();

    return entries.map((entry) => {
      const outputPath = path.resolve(outputRoot, resolve(entry.output));
      const previous = seen.get(outputPath);
      if (previous !== undefined) {
        throw new ValidationError(
          ErrorCodes.OUTPUT_PATH_COLLISION,
          `Templates "${previous}" and "${entry.template}" both resolve to ${outputPath}`,
          { path: outputPath, templates: [previous, entry.template] }
        );
      }
      seen.set(outputPath, entry.template);
      return { entry, outputPath };
    });
  }

  private writeOne(planned: PlannedFile, tokens: TokenMap): FileWriteResult {
    const { entry, outputPath } = planned;
    const templatePath = path.resolve(this.library.templatesDir, entry.template);

    let source: string;
    try {
      source = readFile(templatePath);
    } catch (error) {
      const failure = new IOError(
        ErrorCodes.TEMPLATE_UNREADABLE,
        `Template not found or unreadable: ${templatePath}`,
        { path: templatePath, cause: errorMessage(error) }
      );
      this.log.debug(failure.message);
      return { template: entry.template, outputPath, success: false, error: failure.message };
    }

    try {
      ensureDir(path.dirname(outputPath));
      writeFile(outputPath, substituteTokens(source, tokens));
    } catch (error) {
      const message = `Failed to write ${outputPath}: ${errorMessage(error)}`;
      this.log.debug(message);
      return { template: entry.template, outputPath, success: false, error: message };
    }

    this.log.debug(`Wrote ${outputPath}`);
    return { template: entry.template, outputPath, success: true };
  }
}
