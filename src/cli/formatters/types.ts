/**
 * Formatter type definitions.
 */

export type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'bold' | 'dim';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}
