/**
 * Worktree types and repository layout helpers
 */

import {join} from "node:path";

export const WORKTREES_DIR = "worktrees";

export interface WorktreeRecord {
  name: string;
  path: string;
  createdAt: string;
}

export interface RegistrySettings {
  alwaysSkipBuckets: string[];
}

export function worktreesDir(repoRoot: string): string {
  return join(repoRoot, WORKTREES_DIR);
}

export function worktreePathFor(repoRoot: string, name: string): string {
  return join(worktreesDir(repoRoot), name);
}

/**
 * True for a repository-relative POSIX path inside the worktrees directory,
 * which must never be carried into a new worktree.
 */
export function isInsideWorktreesDir(relativePath: string): boolean {
  return relativePath === WORKTREES_DIR || relativePath.startsWith(`${WORKTREES_DIR}/`);
}
