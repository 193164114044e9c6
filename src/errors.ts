/**
 * Error taxonomy shared by every component.
 *
 * Each family carries a `code` discriminant so callers can branch without
 * matching on message text.
 */

export type ConfigErrorCode =
  | "Unreadable"
  | "Parse"
  | "UnsupportedVersion"
  | "EmptyWindowList"
  | "InvalidWindow";

export type WindowProblem =
  | "empty_name"
  | "mixed_modes"
  | "missing_mode"
  | "missing_program"
  | "missing_shell"
  | "missing_shell_executable"
  | "missing_command";

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly index?: number;
  readonly reason?: WindowProblem;

  constructor(
    code: ConfigErrorCode,
    message: string,
    details: {index?: number; reason?: WindowProblem; cause?: unknown} = {}
  ) {
    super(message, {cause: details.cause});
    this.name = "ConfigError";
    this.code = code;
    this.index = details.index;
    this.reason = details.reason;
  }
}

export type RegistryErrorCode =
  | "DuplicateName"
  | "DuplicatePath"
  | "NotFound"
  | "Unreadable"
  | "Parse"
  | "InvalidSchema"
  | "Write";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string, cause?: unknown) {
    super(message, {cause});
    this.name = "RegistryError";
    this.code = code;
  }
}

export class OrchestratorError extends Error {
  readonly code: "Spawn" | "SessionMissing";
  readonly session: string;
  readonly windowIndex?: number;

  private constructor(
    code: "Spawn" | "SessionMissing",
    session: string,
    message: string,
    windowIndex?: number,
    cause?: unknown
  ) {
    super(message, {cause});
    this.name = "OrchestratorError";
    this.code = code;
    this.session = session;
    this.windowIndex = windowIndex;
  }

  static spawn(session: string, windowIndex: number, cause: string): OrchestratorError {
    return new OrchestratorError(
      "Spawn",
      session,
      `failed to create window ${windowIndex} of tmux session '${session}': ${cause}`,
      windowIndex,
      cause
    );
  }

  static sessionMissing(session: string): OrchestratorError {
    return new OrchestratorError(
      "SessionMissing",
      session,
      `no tmux session named '${session}'`
    );
  }
}

export type GitErrorCode = "CommandFailed" | "NoCommits" | "BranchNotMerged" | "Parse";

export class GitError extends Error {
  readonly code: GitErrorCode;

  constructor(code: GitErrorCode, message: string) {
    super(message);
    this.name = "GitError";
    this.code = code;
  }

  static commandFailed(args: string[], exitCode: number, stderr: string): GitError {
    const suffix = stderr.trim() ? ` ${stderr.trim()}` : "";
    return new GitError(
      "CommandFailed",
      `git command failed: git ${args.join(" ")} (exit ${exitCode})${suffix}`
    );
  }
}

export class ExtrasError extends Error {
  readonly code: "InvalidPath" | "Copy";

  constructor(code: "InvalidPath" | "Copy", message: string, cause?: unknown) {
    super(message, {cause});
    this.name = "ExtrasError";
    this.code = code;
  }
}

/**
 * Raised when a subprocess could not be started at all (missing executable,
 * permission denied). A process that ran and exited non-zero is not an error
 * at this level.
 */
export class CommandSpawnError extends Error {
  readonly program: string;

  constructor(program: string, message: string) {
    super(`failed to execute ${program}: ${message}`);
    this.name = "CommandSpawnError";
    this.program = program;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
