/**
 * Git integration for pre-commit use.
 * Only the CLI asks git for files; the scanner itself receives a list.
 */
import { execFileSync } from 'node:child_process';
import * as path from 'node:path';

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

function runGit(args: string[], cwd: string): string {
  return execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
    timeout: GIT_COMMAND_TIMEOUT_MS,
  });
}

/**
 * Top-level directory of the repository containing `cwd`, or null outside one.
 */
export function getRepoRoot(cwd: string): string | null {
  try {
    const root = runGit(['rev-parse', '--show-toplevel'], cwd).trim();
    return root.length > 0 ? root : null;
  } catch { /* not a git repo or git unavailable */
    return null;
  }
}

/**
 * Get staged files that were added, copied, or modified.
 * Git names them from the repository root; they are returned relative to `cwd`.
 * Outside a repository the list is empty.
 */
export function getStagedFiles(cwd: string): string[] {
  const root = getRepoRoot(cwd);
  if (!root) return [];
  try {
    const stdout = runGit(['diff', '--cached', '--name-only', '--diff-filter=ACM'], root);
    return splitLines(stdout).map((file) => path.relative(cwd, path.join(root, file)));
  } catch { /* git unavailable */
    return [];
  }
}

/**
 * Split newline-separated output into trimmed, non-empty entries.
 */
export function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
