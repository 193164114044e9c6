import type {Logger} from "./utils/logger.js";
import {launchCommandParts, type Config, type WindowLaunch} from "./config.js";
import {OrchestratorError, errorMessage} from "./errors.js";
import type {CommandRunner} from "./utils/exec.js";

export interface CreateSessionResult {
  created: boolean;
}

export interface OrchestratorOptions {
  /** Whether this process already runs inside a tmux client. */
  insideTmux?: boolean;
  logger?: Logger;
}

/** Exact-match target so `foo` never resolves to a session named `foo-bar`. */
function exact(session: string): string {
  return `=${session}`;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Command arguments for a window. tmux runs a lone argument through `sh -c`,
 * so a direct program without args is quoted to reach exec unchanged.
 */
export function windowCommand(launch: WindowLaunch): string[] {
  if (launch.mode === "direct" && launch.args.length === 0) {
    return [shellQuote(launch.program)];
  }
  return launchCommandParts(launch);
}

/**
 * Maps a validated config onto tmux: one session per worktree, one window per
 * configured entry, created in file order.
 */
export class SessionOrchestrator {
  private readonly insideTmux: boolean;
  private readonly logger?: Logger;

  constructor(
    private readonly runner: CommandRunner,
    options: OrchestratorOptions = {}
  ) {
    this.insideTmux = options.insideTmux ?? Boolean(process.env.TMUX);
    this.logger = options.logger;
  }

  async sessionExists(session: string): Promise<boolean> {
    const output = await this.runner.run("tmux", ["has-session", "-t", exact(session)]);
    return output.exitCode === 0;
  }

  /**
   * Creates the session unless one with this name already exists. A failure
   * part-way leaves the windows created so far in place: the session may
   * already belong to a concurrent invocation.
   */
  async createSession(
    session: string,
    worktreePath: string,
    config: Config
  ): Promise<CreateSessionResult> {
    let exists: boolean;
    try {
      exists = await this.sessionExists(session);
    } catch (error) {
      throw OrchestratorError.spawn(session, 0, errorMessage(error));
    }
    if (exists) {
      this.logger?.info({session}, "tmux session already exists");
      return {created: false};
    }

    for (const [index, window] of config.windows.entries()) {
      const args =
        index === 0
          ? ["new-session", "-d", "-s", session, "-c", worktreePath, "-n", window.name]
          : ["new-window", "-t", `${exact(session)}:`, "-c", worktreePath, "-n", window.name];
      await this.spawnStep(session, index, [...args, ...windowCommand(window.launch)]);
    }

    await this.spawnStep(session, 0, ["select-window", "-t", `${exact(session)}:^`]);
    this.logger?.info({session, windows: config.windows.length}, "tmux session created");
    return {created: true};
  }

  /**
   * Hands the terminal to tmux and resolves once the client detaches. Inside
   * tmux the current client switches instead and returns immediately.
   */
  async attachSession(session: string): Promise<void> {
    if (!(await this.sessionExists(session))) {
      throw OrchestratorError.sessionMissing(session);
    }
    const args = this.insideTmux
      ? ["switch-client", "-t", exact(session)]
      : ["attach-session", "-t", exact(session)];
    const exitCode = await this.runner.runInteractive("tmux", args);
    if (exitCode !== 0) {
      throw new Error(`tmux ${args.join(" ")} exited with code ${exitCode}`);
    }
  }

  async killSession(session: string): Promise<void> {
    if (!(await this.sessionExists(session))) {
      throw OrchestratorError.sessionMissing(session);
    }
    const args = ["kill-session", "-t", exact(session)];
    const output = await this.runner.run("tmux", args);
    if (output.exitCode !== 0) {
      // Closed between the check and the kill.
      if (!(await this.sessionExists(session))) {
        throw OrchestratorError.sessionMissing(session);
      }
      throw new Error(
        `tmux ${args.join(" ")} exited with code ${output.exitCode}: ${output.stderr.trim()}`
      );
    }
  }

  private async spawnStep(session: string, index: number, args: string[]): Promise<void> {
    let cause: string | undefined;
    try {
      const output = await this.runner.run("tmux", args);
      if (output.exitCode !== 0) {
        cause = `tmux ${args[0]} exited with code ${output.exitCode}: ${output.stderr.trim()}`;
      }
    } catch (error) {
      cause = errorMessage(error);
    }
    if (cause !== undefined) {
      this.logger?.error({session, windowIndex: index, cause}, "tmux window creation failed");
      throw OrchestratorError.spawn(session, index, cause);
    }
  }
}
