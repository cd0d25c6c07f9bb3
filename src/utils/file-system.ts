/**
 * File system operations - reading, writing, and globbing.
 * Everything here is synchronous; callers process one batch to completion.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file as UTF-8 text.
 */
export function readFile(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write text through an explicitly held descriptor.
 * The descriptor is closed on every exit path, including a failed write.
 */
export function writeFile(filePath: string, content: string): void {
  const fd = fs.openSync(filePath, 'w');
  try {
    fs.writeFileSync(fd, content, 'utf-8');
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Check if a file exists.
 */
export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

/**
 * Check if a path is a directory.
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Create a directory if needed and verify the process may write into it.
 * Throws the underlying fs error when either step fails.
 */
export function ensureWritableDir(dirPath: string): void {
  ensureDir(dirPath);
  if (!isDirectory(dirPath)) {
    throw new Error(`Not a directory: ${dirPath}`);
  }
  fs.accessSync(dirPath, fs.constants.W_OK);
}

/**
 * Find files matching glob patterns, sorted for stable output.
 */
export function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): string[] {
  return fg
    .sync(patterns, {
      cwd: options.cwd || process.cwd(),
      ignore: options.ignore || ['**/node_modules/**'],
      absolute: options.absolute ?? true,
      onlyFiles: true,
    })
    .sort();
}

/**
 * Path relative to the working directory, for display.
 */
export function displayPath(filePath: string, cwd: string = process.cwd()): string {
  const relative = path.relative(cwd, filePath);
  return relative && !relative.startsWith('..') ? relative : filePath;
}

/**
 * Read all of standard input as UTF-8 text.
 */
export function readStdin(): string {
  return fs.readFileSync(0, 'utf-8');
}
