import {render} from "ink";
import {loadConfig} from "../config.js";
import {OrchestratorError, errorMessage} from "../errors.js";
import {FlowController, type FlowServices} from "../flow/controller.js";
import {initialState, type Notice} from "../flow/state.js";
import {GitClient} from "../git.js";
import {WorktreeRegistry} from "../registry.js";
import {SessionOrchestrator} from "../tmux.js";
import {App, type AppOutcome} from "../ui/App.js";
import type {CommandRunner} from "../utils/exec.js";
import type {Logger} from "../utils/logger.js";

export interface InteractiveOptions {
  runner: CommandRunner;
  configPath: string;
  logger: Logger;
  cwd?: string;
}

async function renderOnce(controller: FlowController): Promise<AppOutcome> {
  const outcomes: AppOutcome[] = [];
  const instance = render(
    <App controller={controller} onDone={(outcome) => outcomes.push(outcome)} />,
    {exitOnCtrlC: false}
  );
  await instance.waitUntilExit();
  return outcomes[0] ?? {kind: "exit"};
}

/**
 * Startup checks shared by every flow: a valid config and a repository with
 * commits. The registry is only read by the flow step that needs it.
 */
export async function prepareServices(options: InteractiveOptions): Promise<FlowServices> {
  const {runner, logger} = options;

  const config = await loadConfig(options.configPath);
  logger.info({configPath: options.configPath, windows: config.windows.length}, "config loaded");

  const git = new GitClient(runner);
  const repoRoot = await git.repoRoot(options.cwd ?? process.cwd());
  await git.ensureHasCommits(repoRoot);

  const registry = new WorktreeRegistry(repoRoot);
  const orchestrator = new SessionOrchestrator(runner, {logger: logger.child({component: "tmux"})});
  return {repoRoot, config, registry, orchestrator, git, logger};
}

/**
 * Validates the environment up front, then alternates between the menu and
 * tmux: each handoff unmounts the menu and attaches, and the menu comes back
 * at the root once the client detaches.
 */
export async function interactiveCommand(options: InteractiveOptions): Promise<void> {
  const {logger} = options;

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("seshmux needs an interactive terminal; use `seshmux doctor` for a non-interactive check");
  }

  const services = await prepareServices(options);
  const {orchestrator} = services;

  let notice: Notice | undefined;
  for (;;) {
    const outcome = await renderOnce(new FlowController(services, initialState(notice)));
    if (outcome.kind === "exit") return;

    notice = undefined;
    try {
      await orchestrator.attachSession(outcome.session);
    } catch (error) {
      logger.error({err: error, session: outcome.session}, "attach failed");
      notice =
        error instanceof OrchestratorError && error.code === "SessionMissing"
          ? {tone: "info", message: `Session '${outcome.session}' is no longer running.`}
          : {tone: "error", message: errorMessage(error)};
    }
  }
}
