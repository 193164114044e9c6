import {readFileSync} from "node:fs";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it} from "vitest";
import {GitError} from "../src/errors.js";
import {GitClient, ensureWorktreesGitignoreEntry, gitignoreHasWorktreesEntry} from "../src/git.js";
import {FakeRunner} from "./fake-runner.js";
import {createTempDir, writeFiles, type TempDir} from "./setup.js";

async function gitError(promise: Promise<unknown>): Promise<GitError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GitError) return error;
    throw error;
  }
  throw new Error("expected a GitError");
}

describe("GitClient", () => {
  it("resolves the repository root from the working directory", async () => {
    const runner = new FakeRunner("/work/repo");
    expect(await new GitClient(runner).repoRoot("/work/repo/src")).toBe("/work/repo");
    expect(runner.calls[0]).toEqual({
      program: "git",
      args: ["rev-parse", "--show-toplevel"],
      cwd: "/work/repo/src"
    });
  });

  it("rejects a repository without commits", async () => {
    const runner = new FakeRunner();
    runner.hasCommits = false;

    const error = await gitError(new GitClient(runner).ensureHasCommits("/repo"));
    expect(error.code).toBe("NoCommits");
  });

  it("names the failing command, exit code and stderr", async () => {
    const runner = new FakeRunner().failOn("git worktree add", {
      exitCode: 128,
      stderr: "fatal: '/repo/worktrees/a' already exists\n"
    });

    const error = await gitError(new GitClient(runner).addWorktree("/repo", "a", "/repo/worktrees/a"));
    expect(error.code).toBe("CommandFailed");
    expect(error.message).toBe(
      "git command failed: git worktree add -b a /repo/worktrees/a HEAD (exit 128) fatal: '/repo/worktrees/a' already exists"
    );
  });

  it("passes --force only when asked", async () => {
    const runner = new FakeRunner();
    runner.worktrees.add("/repo/worktrees/a");
    runner.worktrees.add("/repo/worktrees/b");
    const git = new GitClient(runner);

    await git.removeWorktree("/repo", "/repo/worktrees/a");
    await git.removeWorktree("/repo", "/repo/worktrees/b", {force: true});

    expect(runner.commandLines("git")).toEqual([
      "git worktree remove /repo/worktrees/a",
      "git worktree remove --force /repo/worktrees/b"
    ]);
  });

  it("lists worktree paths from porcelain output", async () => {
    const runner = new FakeRunner();
    runner.worktrees.add("/repo/worktrees/a");

    expect(await new GitClient(runner).listWorktreePaths("/repo")).toEqual(["/repo", "/repo/worktrees/a"]);
  });

  it("refuses to delete an unmerged branch", async () => {
    const runner = new FakeRunner();
    runner.branches.add("wip");
    runner.unmergedBranches.add("wip");

    const error = await gitError(new GitClient(runner).deleteBranch("/repo", "wip"));
    expect(error.code).toBe("BranchNotMerged");
    expect(error.message).toBe("branch 'wip' is not fully merged; safe delete aborted");
  });

  it("force deletes a branch git would keep", async () => {
    const runner = new FakeRunner();
    runner.branches.add("wip");
    runner.unmergedBranches.add("wip");

    await new GitClient(runner).forceDeleteBranch("/repo", "wip");

    expect(runner.commandLines("git")).toEqual(["git branch -D wip"]);
    expect(runner.branches.has("wip")).toBe(false);
  });

  it("resolves start points to a revision", async () => {
    const runner = new FakeRunner();
    const git = new GitClient(runner);

    expect(await git.resolveStartPoint("/repo", {kind: "head"})).toBe("HEAD");
    expect(await git.resolveStartPoint("/repo", {kind: "branch", name: " origin/dev "})).toBe("origin/dev");
    expect(runner.commandLines("git")).toEqual(["git rev-parse --verify HEAD"]);

    const error = await gitError(git.resolveStartPoint("/repo", {kind: "commit", hash: "  "}));
    expect(error.code).toBe("Parse");
    expect(error.message).toBe("start commit cannot be empty");
  });

  it("passes the start point to worktree add", async () => {
    const runner = new FakeRunner();
    await new GitClient(runner).addWorktree("/repo", "feat", "/repo/worktrees/feat", "origin/dev");
    expect(runner.commandLines("git")).toEqual(["git worktree add -b feat /repo/worktrees/feat origin/dev"]);
  });

  it("queries local and remote branches by name", async () => {
    const runner = new FakeRunner();
    runner.branches.add("main");
    runner.branches.add("feature/login");
    runner.remoteBranches.add("origin/HEAD");
    runner.remoteBranches.add("origin/main");
    const git = new GitClient(runner);

    expect(await git.queryBranches("/repo")).toEqual([
      {name: "feature/login", source: "local"},
      {name: "main", source: "local"},
      {name: "origin/main", source: "remote"}
    ]);
    expect(await git.queryBranches("/repo", " MAIN ")).toEqual([
      {name: "main", source: "local"},
      {name: "origin/main", source: "remote"}
    ]);
  });

  it("lists recent commits and searches every ref by hash", async () => {
    const runner = new FakeRunner();
    runner.commits = [
      {hash: "1111aaaa", subject: "third"},
      {hash: "2222bbbb", subject: "second"},
      {hash: "3333aaaa", subject: "first"}
    ];
    const git = new GitClient(runner);

    expect(await git.queryCommits("/repo", "", 2)).toEqual([
      {hash: "1111aaaa", shortHash: "1111aaa", subject: "third"},
      {hash: "2222bbbb", shortHash: "2222bbb", subject: "second"}
    ]);
    expect((await git.queryCommits("/repo", "AAAA")).map((commit) => commit.hash)).toEqual(["1111aaaa", "3333aaaa"]);
    expect(runner.commandLines("git")).toEqual([
      "git log --format=%H%x1f%h%x1f%s -n 2",
      "git log --all --format=%H%x1f%h%x1f%s"
    ]);
  });

  it("finds no commits in an empty history", async () => {
    const runner = new FakeRunner();
    runner.hasCommits = false;
    expect(await new GitClient(runner).queryCommits("/repo")).toEqual([]);
  });

  it("splits -z output without trimming names", async () => {
    const runner = new FakeRunner();
    runner.untracked = [" padded.txt", "caf\u00e9 notes.txt"];

    expect(await new GitClient(runner).nulEntries("/repo", ["ls-files", "-z", "--others"])).toEqual([
      " padded.txt",
      "caf\u00e9 notes.txt"
    ]);
  });
});

describe("worktrees .gitignore entry", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir("gitignore");
  });

  afterEach(() => {
    dir.cleanup();
  });

  const gitignore = (): string => readFileSync(join(dir.path, ".gitignore"), "utf-8");

  it("creates .gitignore with the entry when there is none", async () => {
    expect(await gitignoreHasWorktreesEntry(dir.path)).toBe(false);
    expect(await ensureWorktreesGitignoreEntry(dir.path)).toBe(true);
    expect(gitignore()).toBe("worktrees/\n");
  });

  it("appends on a new line to an existing file", async () => {
    writeFiles(dir.path, {".gitignore": "node_modules"});
    expect(await ensureWorktreesGitignoreEntry(dir.path)).toBe(true);
    expect(gitignore()).toBe("node_modules\nworktrees/\n");
  });

  it("accepts a rooted entry as already present", async () => {
    writeFiles(dir.path, {".gitignore": "dist/\n  /worktrees/  \n"});
    expect(await gitignoreHasWorktreesEntry(dir.path)).toBe(true);
    expect(await ensureWorktreesGitignoreEntry(dir.path)).toBe(false);
    expect(gitignore()).toBe("dist/\n  /worktrees/  \n");
  });
});
