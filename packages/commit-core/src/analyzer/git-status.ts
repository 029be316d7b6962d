/**
 * Git status analysis
 */

import { minimatch } from 'minimatch';
import type { SimpleGit, StatusResult } from 'simple-git';

/**
 * Every path git reports as changed: staged, modified, deleted, renamed
 * (destination) and untracked, individually listed
 */
export async function getChangedFiles(git: SimpleGit): Promise<string[]> {
  // simple-git runs `status --porcelain -u`, so untracked directories
  // are expanded into their files
  const status: StatusResult = await git.status();
  return [...new Set(status.files.map((f) => f.path))];
}

/**
 * Keep the paths that match at least one glob pattern. `*` does not cross
 * directory boundaries.
 */
export function filterByPatterns(paths: string[], patterns: string[]): string[] {
  return paths.filter((path) => patterns.some((pattern) => minimatch(path, pattern)));
}

/**
 * Get current branch name
 */
export async function getCurrentBranch(git: SimpleGit): Promise<string> {
  const branch = await git.revparse(['--abbrev-ref', 'HEAD']);
  return branch.trim();
}
