import {mkdirSync, rmSync} from "node:fs";
import type {CommandOutput, CommandRunner, RunOptions} from "../src/utils/exec.js";

export interface RecordedCall {
  program: string;
  args: string[];
  cwd?: string;
}

interface Failure {
  prefix: string;
  result: Partial<CommandOutput> | Error;
}

const ok = (stdout = ""): CommandOutput => ({exitCode: 0, stdout, stderr: ""});

/**
 * In-process stand-in for git and tmux. Sessions, worktrees and branches live
 * in memory; `worktree add` and `worktree remove` touch the real directory so
 * file copies can be checked.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly interactiveCalls: RecordedCall[] = [];
  readonly sessions = new Map<string, string[]>();
  readonly worktrees = new Set<string>();
  readonly branches = new Set<string>();
  readonly unmergedBranches = new Set<string>();
  readonly remoteBranches = new Set<string>();
  /** Newest first, as `git log` prints them. */
  commits: {hash: string; subject: string}[] = [];
  untracked: string[] = [];
  ignored: string[] = [];
  hasCommits = true;
  private readonly failures: Failure[] = [];

  constructor(readonly repoRoot = "/repo") {}

  /** Make every command whose `program args...` line starts with `prefix` fail. */
  failOn(prefix: string, result: Partial<CommandOutput> | Error = {exitCode: 1, stderr: "boom"}): this {
    this.failures.push({prefix, result});
    return this;
  }

  commandLines(program?: string): string[] {
    return this.calls
      .filter((call) => program === undefined || call.program === program)
      .map((call) => [call.program, ...call.args].join(" "));
  }

  async run(program: string, args: string[], options: RunOptions = {}): Promise<CommandOutput> {
    this.calls.push({program, args, cwd: options.cwd});
    const line = [program, ...args].join(" ");
    const failure = this.failures.find((entry) => line.startsWith(entry.prefix));
    if (failure) {
      if (failure.result instanceof Error) throw failure.result;
      return {exitCode: 1, stdout: "", stderr: "", ...failure.result};
    }
    if (program === "tmux") return this.tmux(args);
    if (program === "git") return this.git(args);
    throw new Error(`unexpected program ${program}`);
  }

  async runInteractive(program: string, args: string[], options: RunOptions = {}): Promise<number> {
    this.interactiveCalls.push({program, args, cwd: options.cwd});
    return 0;
  }

  private tmux(args: string[]): CommandOutput {
    const [command] = args;
    const target = (args[args.indexOf("-t") + 1] ?? "").replace(/^=/, "").replace(/:.*$/, "");
    switch (command) {
      case "-V":
        return ok("tmux 3.4\n");
      case "has-session":
        return this.sessions.has(target)
          ? ok()
          : {exitCode: 1, stdout: "", stderr: `can't find session: ${target}\n`};
      case "new-session": {
        const name = args[args.indexOf("-s") + 1] ?? "";
        this.sessions.set(name, [args[args.indexOf("-n") + 1] ?? ""]);
        return ok();
      }
      case "new-window":
        this.sessions.get(target)?.push(args[args.indexOf("-n") + 1] ?? "");
        return ok();
      case "select-window":
        return ok();
      case "kill-session":
        return this.sessions.delete(target)
          ? ok()
          : {exitCode: 1, stdout: "", stderr: `can't find session: ${target}\n`};
      default:
        throw new Error(`unexpected tmux command ${args.join(" ")}`);
    }
  }

  private git(args: string[]): CommandOutput {
    const line = args.join(" ");
    if (line === "rev-parse --show-toplevel") return ok(`${this.repoRoot}\n`);
    if (line === "rev-parse --verify HEAD") {
      return this.hasCommits
        ? ok("0123456789abcdef\n")
        : {exitCode: 128, stdout: "", stderr: "fatal: Needed a single revision\n"};
    }
    if (line === "worktree -h") {
      return {exitCode: 129, stdout: "", stderr: "usage: git worktree add [<options>] <path>\n"};
    }
    if (line === "worktree list --porcelain") {
      const entries = [this.repoRoot, ...this.worktrees].map((path) => `worktree ${path}\nHEAD 0123\n`);
      return ok(entries.join("\n"));
    }
    if (line.startsWith("ls-files")) {
      const entries = args.includes("--ignored") ? this.ignored : this.untracked;
      const terminator = args.includes("-z") ? "\0" : "\n";
      return ok(entries.map((entry) => `${entry}${terminator}`).join(""));
    }
    if (line === "for-each-ref --format=%(refname:short) refs/heads") {
      return ok([...this.branches].map((branch) => `${branch}\n`).join(""));
    }
    if (line === "for-each-ref --format=%(refname:short) refs/remotes") {
      return ok([...this.remoteBranches].map((branch) => `${branch}\n`).join(""));
    }
    if (args[0] === "log") {
      if (!this.hasCommits) {
        return {exitCode: 128, stdout: "", stderr: "fatal: your current branch 'main' does not have any commits yet\n"};
      }
      const limit = args.includes("-n") ? Number(args[args.indexOf("-n") + 1]) : this.commits.length;
      const lines = this.commits
        .slice(0, limit)
        .map((commit) => `${commit.hash}\x1f${commit.hash.slice(0, 7)}\x1f${commit.subject}\n`);
      return ok(lines.join(""));
    }
    if (line.startsWith("worktree add -b ")) {
      const [, , , branch = "", path = ""] = args;
      if (this.branches.has(branch)) {
        return {exitCode: 255, stdout: "", stderr: `fatal: a branch named '${branch}' already exists\n`};
      }
      mkdirSync(path, {recursive: true});
      this.branches.add(branch);
      this.worktrees.add(path);
      return ok();
    }
    if (line.startsWith("worktree remove ")) {
      const path = args[args.length - 1] ?? "";
      if (!this.worktrees.has(path)) {
        return {exitCode: 128, stdout: "", stderr: `fatal: '${path}' is not a working tree\n`};
      }
      rmSync(path, {recursive: true, force: true});
      this.worktrees.delete(path);
      return ok();
    }
    if (line.startsWith("branch -D ")) {
      const branch = args[2] ?? "";
      this.unmergedBranches.delete(branch);
      if (!this.branches.delete(branch)) {
        return {exitCode: 1, stdout: "", stderr: `error: branch '${branch}' not found.\n`};
      }
      return ok();
    }
    if (line.startsWith("branch -d ")) {
      const branch = args[2] ?? "";
      if (this.unmergedBranches.has(branch)) {
        return {exitCode: 1, stdout: "", stderr: `error: the branch '${branch}' is not fully merged.\n`};
      }
      if (!this.branches.delete(branch)) {
        return {exitCode: 1, stdout: "", stderr: `error: branch '${branch}' not found.\n`};
      }
      return ok();
    }
    throw new Error(`unexpected git command ${line}`);
  }
}
