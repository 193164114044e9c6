import {execa} from "execa";
import {CommandSpawnError, errorMessage} from "../errors.js";

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

/**
 * Seam between the components and the git/tmux executables.
 * `run` captures output; `runInteractive` hands the terminal to the child.
 */
export interface CommandRunner {
  run(program: string, args: string[], options?: RunOptions): Promise<CommandOutput>;
  runInteractive(program: string, args: string[], options?: RunOptions): Promise<number>;
}

interface ExitedProcess {
  exitCode: number;
  stdout?: unknown;
  stderr?: unknown;
}

function exitedWithCode(error: unknown): error is ExitedProcess {
  return (
    typeof error === "object" &&
    error !== null &&
    "exitCode" in error &&
    typeof error.exitCode === "number"
  );
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export class ExecaRunner implements CommandRunner {
  async run(program: string, args: string[], options: RunOptions = {}): Promise<CommandOutput> {
    try {
      const result = await execa(program, args, {
        cwd: options.cwd,
        stdin: "ignore"
      });
      return {exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr};
    } catch (error) {
      if (exitedWithCode(error)) {
        return {
          exitCode: error.exitCode,
          stdout: text(error.stdout),
          stderr: text(error.stderr)
        };
      }
      throw new CommandSpawnError(program, errorMessage(error));
    }
  }

  async runInteractive(program: string, args: string[], options: RunOptions = {}): Promise<number> {
    try {
      const result = await execa(program, args, {
        cwd: options.cwd,
        stdio: "inherit"
      });
      return result.exitCode;
    } catch (error) {
      if (exitedWithCode(error)) {
        return error.exitCode;
      }
      throw new CommandSpawnError(program, errorMessage(error));
    }
  }
}
