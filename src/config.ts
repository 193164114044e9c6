import {readFile} from "node:fs/promises";
import {homedir} from "node:os";
import {join} from "node:path";
import {parse as parseToml} from "smol-toml";
import {z} from "zod";
import {ConfigError, errorMessage, type WindowProblem} from "./errors.js";

export const CONFIG_VERSION = 1;

export type WindowLaunch =
  | {mode: "direct"; program: string; args: readonly string[]}
  | {mode: "shell"; shell: readonly string[]; command: string};

export interface WindowSpec {
  readonly name: string;
  readonly launch: WindowLaunch;
}

export interface Config {
  readonly version: typeof CONFIG_VERSION;
  readonly windows: readonly WindowSpec[];
}

const integer = z.union([z.number().int(), z.bigint()]).transform(Number);

const rawWindowSchema = z.object({
  name: z.string().optional(),
  program: z.string().optional(),
  args: z.array(z.string()).optional(),
  shell: z.array(z.string()).optional(),
  command: z.string().optional()
});

export type RawWindow = z.infer<typeof rawWindowSchema>;

const rawConfigSchema = z.object({
  version: integer,
  tmux: z
    .object({
      windows: z.array(rawWindowSchema).optional()
    })
    .optional()
});

const WINDOW_PROBLEMS: Record<WindowProblem, string> = {
  empty_name: "name must be non-empty",
  mixed_modes: "must use exactly one launch mode (direct or shell), not both",
  missing_mode: "must define either direct mode (program/args) or shell mode (shell/command)",
  missing_program: "direct mode requires non-empty program",
  missing_shell: "shell mode requires shell field",
  missing_shell_executable: "shell mode requires shell[0] executable",
  missing_command: "shell mode requires non-empty command"
};

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SESHMUX_CONFIG?.trim();
  if (override) {
    return override;
  }
  return join(env.HOME ?? homedir(), ".config", "seshmux", "config.toml");
}

/**
 * Resolve one raw window entry to its launch mode. Presence of `program` or
 * `args` selects direct mode; presence of `shell` or `command` selects shell
 * mode.
 */
export function parseWindowLaunch(window: RawWindow): WindowLaunch | WindowProblem {
  const direct = window.program !== undefined || window.args !== undefined;
  const shell = window.shell !== undefined || window.command !== undefined;

  if (direct && shell) return "mixed_modes";
  if (!direct && !shell) return "missing_mode";

  if (direct) {
    if (window.program === undefined || !window.program.trim()) {
      return "missing_program";
    }
    return {mode: "direct", program: window.program, args: [...(window.args ?? [])]};
  }

  if (window.shell === undefined) return "missing_shell";
  const [executable] = window.shell;
  if (executable === undefined || !executable.trim()) {
    return "missing_shell_executable";
  }
  if (window.command === undefined || !window.command.trim()) {
    return "missing_command";
  }
  return {mode: "shell", shell: [...window.shell], command: window.command};
}

/**
 * Argument vector a window runs: direct mode passes program and args through
 * untouched, shell mode appends the command as the shell's final argument.
 */
export function launchCommandParts(launch: WindowLaunch): string[] {
  switch (launch.mode) {
    case "direct":
      return [launch.program, ...launch.args];
    case "shell":
      return [...launch.shell, launch.command];
  }
}

export function launchExecutable(launch: WindowLaunch): string {
  switch (launch.mode) {
    case "direct":
      return launch.program;
    case "shell":
      return launch.shell[0] ?? "";
  }
}

function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return "invalid config";
  const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
  return `${path}: ${issue.message}`;
}

export function parseConfig(raw: string, source = "<inline>"): Config {
  let document: Record<string, unknown>;
  try {
    document = parseToml(raw);
  } catch (error) {
    throw new ConfigError(
      "Parse",
      `failed to parse config at ${source}: ${errorMessage(error)}`,
      {cause: error}
    );
  }

  const version = integer.safeParse(document.version);
  if (!version.success || version.data !== CONFIG_VERSION) {
    const found = version.success ? String(version.data) : "none";
    throw new ConfigError(
      "UnsupportedVersion",
      `invalid config: version must be ${CONFIG_VERSION} (found ${found})`
    );
  }

  const parsed = rawConfigSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      "Parse",
      `failed to parse config at ${source}: ${describeIssue(parsed.error)}`,
      {cause: parsed.error}
    );
  }

  const rawWindows = parsed.data.tmux?.windows ?? [];
  if (rawWindows.length === 0) {
    throw new ConfigError(
      "EmptyWindowList",
      "invalid config: at least one tmux window must be configured"
    );
  }

  const windows = rawWindows.map((window, index): WindowSpec => {
    const name = window.name ?? "";
    const launch = name.trim() ? parseWindowLaunch(window) : "empty_name";
    if (typeof launch === "string") {
      throw new ConfigError(
        "InvalidWindow",
        `invalid config: window[${index}] ${WINDOW_PROBLEMS[launch]}`,
        {index, reason: launch}
      );
    }
    return Object.freeze({name, launch: Object.freeze(launch)});
  });

  return Object.freeze({version: CONFIG_VERSION, windows: Object.freeze(windows)});
}

export async function loadConfig(path: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(
      "Unreadable",
      `failed to read config at ${path}: ${errorMessage(error)}`,
      {cause: error}
    );
  }
  return parseConfig(raw, path);
}
