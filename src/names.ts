export const MAX_WORKTREE_NAME_LENGTH = 48;

/**
 * Returns a user-facing problem description, or null when the name is usable
 * as a branch, directory and tmux session name at once.
 */
export function worktreeNameProblem(name: string): string | null {
  if (name.length === 0 || name.length > MAX_WORKTREE_NAME_LENGTH) {
    return `worktree name must be between 1 and ${MAX_WORKTREE_NAME_LENGTH} characters`;
  }

  if (!/^[a-z0-9]/.test(name)) {
    return "worktree name must start with a lowercase letter or digit";
  }

  const invalid = name.match(/[^a-z0-9_-]/);
  if (invalid) {
    return `worktree name contains invalid character '${invalid[0]}'`;
  }

  return null;
}
