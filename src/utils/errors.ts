/**
 * Error types and codes for featurekit.
 * Every error raised by the core extends FeatureKitError.
 */

/**
 * Base error class for all featurekit errors.
 */
export class FeatureKitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FeatureKitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Bad caller input: feature name, package, variant, manifest collisions.
 * Always raised before any file I/O.
 */
export class ValidationError extends FeatureKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Filesystem failures. Details carry the offending path.
 */
export class IOError extends FeatureKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'IOError';
  }
}

/**
 * Configuration errors (config file, manifest, pattern tables).
 */
export class ConfigError extends FeatureKitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Validation
  INVALID_NAME: 'V001',
  INVALID_PACKAGE: 'V002',
  UNKNOWN_VARIANT: 'V003',
  OUTPUT_PATH_COLLISION: 'V004',

  // I/O
  OUTPUT_NOT_WRITABLE: 'IO001',
  TEMPLATE_UNREADABLE: 'IO002',
  REPORT_UNREADABLE: 'IO003',
  REPORTS_NOT_FOUND: 'IO004',
  FILE_UNREADABLE: 'IO005',

  // Configuration
  PARSE_ERROR: 'C001',
  CONFIG_INVALID: 'C002',
  INVALID_PATTERN: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
