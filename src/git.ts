import {readFile, writeFile} from "node:fs/promises";
import {join} from "node:path";
import {GitError} from "./errors.js";
import type {CommandOutput, CommandRunner} from "./utils/exec.js";
import {WORKTREES_DIR} from "./worktree.js";

export interface RemoveWorktreeOptions {
  force?: boolean;
}

export type StartPoint =
  | {kind: "head"}
  | {kind: "branch"; name: string}
  | {kind: "commit"; hash: string};

export interface BranchRef {
  name: string;
  source: "local" | "remote";
}

export interface CommitRef {
  hash: string;
  shortHash: string;
  subject: string;
}

export const DEFAULT_COMMIT_LIMIT = 50;

const COMMIT_FORMAT = "--format=%H%x1f%h%x1f%s";

/**
 * Thin wrapper over the git worktree subcommands seshmux relies on. Every
 * failure names the git command it ran.
 */
export class GitClient {
  constructor(private readonly runner: CommandRunner) {}

  async repoRoot(cwd: string): Promise<string> {
    const output = await this.runChecked(["rev-parse", "--show-toplevel"], cwd);
    const root = firstLine(output.stdout);
    if (!root) {
      throw new GitError("Parse", "git rev-parse returned empty repo root");
    }
    return root;
  }

  async ensureHasCommits(repoRoot: string): Promise<void> {
    const output = await this.runner.run("git", ["rev-parse", "--verify", "HEAD"], {cwd: repoRoot});
    if (output.exitCode !== 0) {
      throw new GitError(
        "NoCommits",
        "current branch/HEAD has no commits yet; create an initial commit first"
      );
    }
  }

  /** The revision `git worktree add` starts from; HEAD must have a commit. */
  async resolveStartPoint(repoRoot: string, start: StartPoint): Promise<string> {
    switch (start.kind) {
      case "head":
        await this.ensureHasCommits(repoRoot);
        return "HEAD";
      case "branch":
        return nonEmpty(start.name, "start branch cannot be empty");
      case "commit":
        return nonEmpty(start.hash, "start commit cannot be empty");
    }
  }

  async addWorktree(repoRoot: string, branch: string, path: string, startPoint = "HEAD"): Promise<void> {
    await this.runChecked(["worktree", "add", "-b", branch, path, startPoint], repoRoot);
  }

  async removeWorktree(
    repoRoot: string,
    path: string,
    options: RemoveWorktreeOptions = {}
  ): Promise<void> {
    const args = options.force
      ? ["worktree", "remove", "--force", path]
      : ["worktree", "remove", path];
    await this.runChecked(args, repoRoot);
  }

  /** Absolute paths of every worktree git knows about, main checkout included. */
  async listWorktreePaths(repoRoot: string): Promise<string[]> {
    const output = await this.runChecked(["worktree", "list", "--porcelain"], repoRoot);
    return output.stdout
      .split("\n")
      .filter((line) => line.startsWith("worktree "))
      .map((line) => line.slice("worktree ".length).trim());
  }

  async deleteBranch(repoRoot: string, branch: string): Promise<void> {
    const args = ["branch", "-d", branch];
    const output = await this.runner.run("git", args, {cwd: repoRoot});
    if (output.exitCode === 0) {
      return;
    }
    if (output.stderr.toLowerCase().includes("not fully merged")) {
      throw new GitError(
        "BranchNotMerged",
        `branch '${branch}' is not fully merged; safe delete aborted`
      );
    }
    throw GitError.commandFailed(args, output.exitCode, output.stderr);
  }

  async forceDeleteBranch(repoRoot: string, branch: string): Promise<void> {
    await this.runChecked(["branch", "-D", branch], repoRoot);
  }

  /**
   * Local then remote branches whose name contains `query` (case-insensitive),
   * sorted by name. Remote `HEAD` aliases are left out.
   */
  async queryBranches(repoRoot: string, query = ""): Promise<BranchRef[]> {
    const local = await this.lines(repoRoot, ["for-each-ref", "--format=%(refname:short)", "refs/heads"]);
    const remote = await this.lines(repoRoot, ["for-each-ref", "--format=%(refname:short)", "refs/remotes"]);
    const needle = query.trim().toLowerCase();
    return [
      ...local.map((name): BranchRef => ({name, source: "local"})),
      ...remote.map((name): BranchRef => ({name, source: "remote"}))
    ]
      .filter((branch) => !branch.name.endsWith("/HEAD"))
      .filter((branch) => needle === "" || branch.name.toLowerCase().includes(needle))
      .sort((left, right) => left.name.localeCompare(right.name));
  }

  /**
   * Without a query, the latest `limit` commits of HEAD. With one, commits of
   * every ref whose hash contains it. An empty history yields no commits.
   */
  async queryCommits(repoRoot: string, query = "", limit = DEFAULT_COMMIT_LIMIT): Promise<CommitRef[]> {
    const needle = query.trim().toLowerCase();
    const args = needle === "" ? ["log", COMMIT_FORMAT, "-n", String(limit)] : ["log", "--all", COMMIT_FORMAT];
    const output = await this.runner.run("git", args, {cwd: repoRoot});
    if (output.exitCode !== 0) {
      if (looksLikeEmptyHistory(output.stderr)) return [];
      throw GitError.commandFailed(args, output.exitCode, output.stderr);
    }
    const commits = parseCommitLines(output.stdout);
    if (needle === "") return commits;
    return commits.filter((commit) => commit.hash.toLowerCase().includes(needle)).slice(0, limit);
  }

  async lines(repoRoot: string, args: string[]): Promise<string[]> {
    const output = await this.runChecked(args, repoRoot);
    return output.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  /** Entries of a `-z` listing, taken verbatim: no C-quoting, no trimming. */
  async nulEntries(repoRoot: string, args: string[]): Promise<string[]> {
    const output = await this.runChecked(args, repoRoot);
    return output.stdout.split("\0").filter((entry) => entry.length > 0);
  }

  private async runChecked(args: string[], cwd: string): Promise<CommandOutput> {
    const output = await this.runner.run("git", args, {cwd});
    if (output.exitCode !== 0) {
      throw GitError.commandFailed(args, output.exitCode, output.stderr);
    }
    return output;
  }
}

function firstLine(text: string): string {
  return (text.split("\n")[0] ?? "").trim();
}

function nonEmpty(value: string, message: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new GitError("Parse", message);
  }
  return trimmed;
}

function looksLikeEmptyHistory(stderr: string): boolean {
  const normalized = stderr.toLowerCase();
  return (
    normalized.includes("does not have any commits yet") ||
    normalized.includes("ambiguous argument 'head'") ||
    normalized.includes("unknown revision or path not in the working tree")
  );
}

function parseCommitLines(raw: string): CommitRef[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => {
      const [hash = "", shortHash = "", subject = ""] = line.split("\x1f");
      if (!hash || !shortHash) {
        throw new GitError("Parse", `unexpected git log line: ${line}`);
      }
      return {hash, shortHash, subject};
    });
}

const GITIGNORE_ENTRIES = new Set([`${WORKTREES_DIR}/`, `/${WORKTREES_DIR}/`]);

async function readGitignore(repoRoot: string): Promise<string | undefined> {
  try {
    return await readFile(join(repoRoot, ".gitignore"), "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw error;
  }
}

export async function gitignoreHasWorktreesEntry(repoRoot: string): Promise<boolean> {
  const content = await readGitignore(repoRoot);
  if (content === undefined) return false;
  return content.split("\n").some((line) => GITIGNORE_ENTRIES.has(line.trim()));
}

/** Append `worktrees/` to the repository's .gitignore unless already listed. */
export async function ensureWorktreesGitignoreEntry(repoRoot: string): Promise<boolean> {
  if (await gitignoreHasWorktreesEntry(repoRoot)) return false;
  let content = (await readGitignore(repoRoot)) ?? "";
  if (content !== "" && !content.endsWith("\n")) content += "\n";
  await writeFile(join(repoRoot, ".gitignore"), `${content}${WORKTREES_DIR}/\n`, "utf-8");
  return true;
}
