import {stat} from "node:fs/promises";
import {resolve} from "node:path";
import type {Config} from "../config.js";
import {GitError, OrchestratorError, RegistryError, errorMessage} from "../errors.js";
import {copyExtras, filterSkipped, listExtraCandidates} from "../extras.js";
import {
  ensureWorktreesGitignoreEntry,
  gitignoreHasWorktreesEntry,
  type GitClient
} from "../git.js";
import type {WorktreeRegistry} from "../registry.js";
import type {SessionOrchestrator} from "../tmux.js";
import type {Logger} from "../utils/logger.js";
import {worktreePathFor, type WorktreeRecord} from "../worktree.js";
import {step} from "./step.js";
import {
  deletedNotice,
  initialState,
  type CreateRequest,
  type DeleteRequest,
  type FlowEffect,
  type FlowEvent,
  type FlowState,
  type PickerItem,
  type RefKind,
  type WorktreeRow
} from "./state.js";

export interface FlowServices {
  repoRoot: string;
  config: Config;
  registry: WorktreeRegistry;
  orchestrator: SessionOrchestrator;
  git: GitClient;
  logger: Logger;
  now?: () => Date;
}

type Listener = (state: FlowState) => void;

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    throw error;
  }
}

function isDuplicate(error: unknown): boolean {
  return (
    error instanceof RegistryError &&
    (error.code === "DuplicateName" || error.code === "DuplicatePath")
  );
}

/**
 * Owns the flow state. Keys and effect outcomes go through `dispatch`; every
 * effect runs to completion before the next event is handled.
 */
export class FlowController {
  private state: FlowState;
  private readonly listeners = new Set<Listener>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly services: FlowServices,
    initial: FlowState = initialState()
  ) {
    this.state = initial;
    this.logger = services.logger.child({component: "flow"});
    this.now = services.now ?? (() => new Date());
  }

  getState(): FlowState {
    return this.state;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async dispatch(event: FlowEvent): Promise<void> {
    const {state, effect} = step(this.state, event);
    if (state !== this.state) {
      this.state = state;
      for (const listener of this.listeners) listener(state);
    }
    if (effect) {
      await this.dispatch(await this.run(effect));
    }
  }

  private async run(effect: FlowEffect): Promise<FlowEvent> {
    this.logger.debug({effect: effect.type}, "running flow effect");
    switch (effect.type) {
      case "loadRows":
        return this.guard("load worktrees", async () => ({
          type: "rowsLoaded",
          rows: await this.loadRows()
        }));
      case "prepareNew":
        return this.guard("prepare new worktree", async () => ({
          type: "newPrepared",
          offerGitignore: !(await gitignoreHasWorktreesEntry(this.services.repoRoot))
        }));
      case "checkName":
        return this.guard("check name", () => this.checkName(effect.name));
      case "queryRefs":
        return this.guard("query refs", () => this.queryRefs(effect.kind, effect.query));
      case "skipBucket":
        return this.guard("save skip bucket", () => this.skipBucket(effect.bucket));
      case "createWorktree":
        return this.guard("create worktree", () => this.createWorktree(effect));
      case "attach":
        return this.guard("attach", () => this.attach(effect.record));
      case "delete":
        return this.guard("delete", () => this.delete(effect));
      case "forceDeleteBranch":
        return this.guard("force delete branch", () => this.forceDeleteBranch(effect.name, effect.notes));
    }
  }

  private async guard(action: string, body: () => Promise<FlowEvent>): Promise<FlowEvent> {
    try {
      return await body();
    } catch (error) {
      this.logger.error({err: error, action}, "flow action failed");
      return {type: "failed", message: errorMessage(error)};
    }
  }

  async loadRows(): Promise<WorktreeRow[]> {
    const {registry, orchestrator, git, repoRoot} = this.services;
    const records = await registry.list();
    if (records.length === 0) return [];

    const known = new Set((await git.listWorktreePaths(repoRoot)).map((path) => resolve(path)));
    const rows: WorktreeRow[] = [];
    for (const record of records) {
      const onDisk = await isDirectory(record.path);
      rows.push({
        record,
        sessionRunning: await orchestrator.sessionExists(record.name),
        missing: !onDisk || !known.has(resolve(record.path))
      });
    }
    return rows;
  }

  private async checkName(name: string): Promise<FlowEvent> {
    const {registry, git, repoRoot} = this.services;
    await registry.ensureAvailable(name, worktreePathFor(repoRoot, name));
    const candidates = await listExtraCandidates(git, repoRoot);
    const {alwaysSkipBuckets} = await registry.extras();
    return {type: "nameAccepted", candidates: filterSkipped(candidates, alwaysSkipBuckets)};
  }

  private async queryRefs(kind: RefKind, query: string): Promise<FlowEvent> {
    const {git, repoRoot} = this.services;
    let items: PickerItem[];
    if (kind === "branch") {
      const branches = await git.queryBranches(repoRoot, query);
      items = branches.map((branch) => ({value: branch.name, label: `${branch.name} [${branch.source}]`}));
    } else {
      const commits = await git.queryCommits(repoRoot, query);
      items = commits.map((commit) => ({value: commit.hash, label: `${commit.shortHash} ${commit.subject}`}));
    }
    return {type: "refsLoaded", kind, query, items};
  }

  private async skipBucket(bucket: string): Promise<FlowEvent> {
    const {registry} = this.services;
    const {alwaysSkipBuckets} = await registry.extras();
    await registry.saveAlwaysSkipBuckets([...alwaysSkipBuckets, bucket]);
    this.logger.info({bucket}, "skip bucket saved");
    return {type: "bucketSaved", bucket};
  }

  private async createWorktree(request: CreateRequest): Promise<FlowEvent> {
    const {registry, orchestrator, git, repoRoot, config} = this.services;
    const {name} = request;
    const path = worktreePathFor(repoRoot, name);
    const log = this.logger.child({worktree: name});

    try {
      await registry.ensureAvailable(name, path);
    } catch (error) {
      if (isDuplicate(error)) {
        return {type: "failed", message: errorMessage(error), step: "name"};
      }
      throw error;
    }

    if (request.addGitignore && (await ensureWorktreesGitignoreEntry(repoRoot))) {
      log.info("added worktrees/ to .gitignore");
    }

    const startPoint = await git.resolveStartPoint(repoRoot, request.startPoint);
    await git.addWorktree(repoRoot, name, path, startPoint);
    log.info({path, startPoint}, "git worktree created");

    try {
      await copyExtras(repoRoot, path, request.extras);
      await registry.insert({name, path, createdAt: this.now().toISOString()});
    } catch (error) {
      log.error({err: error}, "worktree setup failed, rolling back");
      const message = await this.rollback(name, path, errorMessage(error));
      return isDuplicate(error)
        ? {type: "failed", message, step: "name"}
        : {type: "failed", message};
    }

    try {
      await orchestrator.createSession(name, path, config);
    } catch (error) {
      log.error({err: error}, "tmux session creation failed");
      return {
        type: "completed",
        notice: {
          tone: "error",
          message: `Worktree '${name}' was created, but its tmux session failed: ${errorMessage(error)}. Retry from Attach.`
        }
      };
    }

    if (!request.connectNow) {
      return {
        type: "completed",
        notice: {tone: "info", message: `Created worktree '${name}' with tmux session '${name}'. Attach from the menu.`}
      };
    }
    return {type: "handoff", session: name};
  }

  /** Undo the git worktree and branch created for a record that never got saved. */
  private async rollback(name: string, path: string, cause: string): Promise<string> {
    const {git, repoRoot} = this.services;
    try {
      await git.removeWorktree(repoRoot, path, {force: true});
      await git.forceDeleteBranch(repoRoot, name);
      return cause;
    } catch (error) {
      this.logger.error({err: error, worktree: name}, "rollback failed");
      return `${cause} (cleanup of ${path} also failed: ${errorMessage(error)})`;
    }
  }

  private async attach(record: WorktreeRecord): Promise<FlowEvent> {
    const {orchestrator, config} = this.services;
    if (!(await isDirectory(record.path))) {
      return {
        type: "failed",
        message: `worktree '${record.name}' is missing at ${record.path}; delete it to clean up the registry`
      };
    }
    const {created} = await orchestrator.createSession(record.name, record.path, config);
    this.logger.info({session: record.name, created}, "handing off to tmux");
    return {type: "handoff", session: record.name};
  }

  private async delete(request: DeleteRequest): Promise<FlowEvent> {
    const {registry, orchestrator, git, repoRoot} = this.services;
    const {record} = request;
    const notes = [...request.notes];

    if (request.killSession) {
      try {
        await orchestrator.killSession(record.name);
        notes.push(`killed session '${record.name}'`);
      } catch (error) {
        if (!(error instanceof OrchestratorError && error.code === "SessionMissing")) throw error;
        notes.push(`session '${record.name}' was not running`);
      }
    }

    const known = new Set((await git.listWorktreePaths(repoRoot)).map((path) => resolve(path)));
    if (!(await isDirectory(record.path))) {
      notes.push(`path ${record.path} was already gone`);
    } else if (!known.has(resolve(record.path))) {
      notes.push(`${record.path} is not a git worktree and was left on disk`);
    } else {
      try {
        await git.removeWorktree(repoRoot, record.path, {force: request.force});
      } catch (error) {
        if (request.force || !(error instanceof GitError && error.code === "CommandFailed")) throw error;
        this.logger.warn({err: error, worktree: record.name}, "safe worktree removal refused");
        return {type: "worktreeRefused", reason: errorMessage(error), notes};
      }
      if (request.force) notes.push("forced removal");
    }

    await registry.remove(record.name);
    this.logger.info(
      {worktree: record.name, killSession: request.killSession, deleteBranch: request.deleteBranch, force: request.force},
      "worktree deleted"
    );

    if (request.deleteBranch) {
      try {
        await git.deleteBranch(repoRoot, record.name);
        notes.push(`deleted branch '${record.name}'`);
      } catch (error) {
        this.logger.warn({err: error, branch: record.name}, "branch delete failed");
        if (error instanceof GitError && error.code === "BranchNotMerged") {
          return {type: "branchRefused", reason: errorMessage(error), notes};
        }
        notes.push(`branch kept: ${errorMessage(error)}`);
      }
    }

    return {type: "completed", notice: deletedNotice(record.name, notes)};
  }

  private async forceDeleteBranch(name: string, notes: readonly string[]): Promise<FlowEvent> {
    const {git, repoRoot} = this.services;
    try {
      await git.forceDeleteBranch(repoRoot, name);
      return {type: "completed", notice: deletedNotice(name, [...notes, `force deleted branch '${name}'`])};
    } catch (error) {
      this.logger.warn({err: error, branch: name}, "force branch delete failed");
      return {
        type: "completed",
        notice: deletedNotice(name, [...notes, `branch kept: force delete failed: ${errorMessage(error)}`])
      };
    }
  }
}
