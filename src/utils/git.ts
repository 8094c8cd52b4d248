/**
 * Git integration utilities for change-based unit selection.
 */
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { SystemError, ErrorCodes } from './errors.js';

const execFileAsync = promisify(execFile);

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

// Refs may contain path separators, dots, dashes, carets and tildes; never whitespace or options.
const GIT_REF_PATTERN = /^(?!-)[\w./~^@{}-]+$/;

/**
 * Check that a string is safe to pass to git as a revision.
 */
export function isValidGitRef(ref: string): boolean {
  return ref.length > 0 && ref.length < 256 && GIT_REF_PATTERN.test(ref);
}

/**
 * Get the repository's top-level directory.
 *
 * @returns Absolute path, or null when not inside a git repository
 */
export async function getRepositoryRoot(cwd: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('git', ['rev-parse', '--show-toplevel'], {
      cwd,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout.trim() || null;
  } catch { /* not a git repo */
    return null;
  }
}

/**
 * Get files changed between two refs (or between a ref and the working tree
 * when `to` is omitted). Paths are relative to the repository root.
 *
 * @throws SystemError when a ref is malformed or git fails
 */
export async function getChangedFiles(cwd: string, from: string, to?: string): Promise<string[]> {
  for (const ref of [from, to]) {
    if (ref !== undefined && !isValidGitRef(ref)) {
      throw new SystemError(ErrorCodes.COMMAND_FAILED, `Invalid git ref format: '${ref}'`, { ref });
    }
  }

  const range = to ? [`${from}...${to}`] : [from];
  try {
    const { stdout } = await execFileAsync('git', ['diff', '--name-only', ...range], {
      cwd,
      encoding: 'utf-8',
      timeout: GIT_COMMAND_TIMEOUT_MS,
    });
    return stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.COMMAND_FAILED,
      `git diff failed for '${range.join(' ')}': ${error instanceof Error ? error.message : 'Unknown error'}`,
      { cwd, range }
    );
  }
}
