import {constants} from "node:fs";
import {access, stat} from "node:fs/promises";
import {delimiter, join} from "node:path";
import {launchExecutable, loadConfig} from "./config.js";
import {errorMessage} from "./errors.js";
import type {CommandRunner} from "./utils/exec.js";

export type CheckState = "PASS" | "FAIL";

export interface DoctorCheck {
  name: string;
  state: CheckState;
  details: string;
}

export interface DoctorOptions {
  runner: CommandRunner;
  configPath: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

const pass = (name: string, details: string): DoctorCheck => ({name, state: "PASS", details});
const fail = (name: string, details: string): DoctorCheck => ({name, state: "FAIL", details});

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    if (!(await stat(path)).isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolve a program the way a shell would: paths as given, bare names through PATH. */
export async function isExecutableInPath(
  program: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<boolean> {
  if (program.includes("/")) {
    return isExecutableFile(program);
  }
  const directories = (env.PATH ?? "").split(delimiter).filter((entry) => entry.length > 0);
  for (const directory of directories) {
    if (await isExecutableFile(join(directory, program))) return true;
  }
  return false;
}

async function checkGitWorktree(runner: CommandRunner): Promise<DoctorCheck> {
  const name = "git worktree available";
  try {
    // `git worktree -h` exits 129 after printing usage.
    const output = await runner.run("git", ["worktree", "-h"]);
    if (`${output.stdout}\n${output.stderr}`.includes("usage: git worktree")) {
      return pass(name, "git worktree command is available");
    }
    return fail(
      name,
      `git worktree help output did not match expected format (exit code ${output.exitCode})`
    );
  } catch (error) {
    return fail(name, `failed to execute git worktree check: ${errorMessage(error)}`);
  }
}

async function checkTmux(runner: CommandRunner): Promise<DoctorCheck> {
  const name = "tmux is installed";
  try {
    const output = await runner.run("tmux", ["-V"]);
    if (output.exitCode === 0) {
      return pass(name, output.stdout.trim());
    }
    return fail(name, `tmux returned exit code ${output.exitCode} with output: ${output.stderr.trim()}`);
  } catch (error) {
    return fail(name, `failed to execute tmux check: ${errorMessage(error)}`);
  }
}

async function configExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function runDoctor(options: DoctorOptions): Promise<DoctorCheck[]> {
  const {runner, configPath} = options;
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const checks: DoctorCheck[] = [];

  if (platform === "linux") checks.push(pass("os is supported", "detected Linux"));
  else if (platform === "darwin") checks.push(pass("os is supported", "detected macOS"));
  else checks.push(fail("os is supported", `detected ${platform}, expected macOS or Linux`));

  checks.push(
    (await isExecutableInPath("git", env))
      ? pass("git is installed", "git executable found in PATH")
      : fail("git is installed", "git executable not found in PATH")
  );
  checks.push(await checkGitWorktree(runner));
  checks.push(await checkTmux(runner));

  if (!(await configExists(configPath))) {
    checks.push(fail("config file exists", `expected at ${configPath}`));
    checks.push(fail("config parses and validates", "skipped because config file is missing"));
    checks.push(fail("window launch targets executable", "skipped because config file is missing"));
    return checks;
  }
  checks.push(pass("config file exists", `found at ${configPath}`));

  try {
    const config = await loadConfig(configPath);
    checks.push(pass("config parses and validates", "config is valid"));

    const missing: string[] = [];
    for (const window of config.windows) {
      const executable = launchExecutable(window.launch);
      if (!(await isExecutableInPath(executable, env))) {
        const label = window.launch.mode === "direct" ? "program" : "shell";
        missing.push(`window '${window.name}' ${label} '${executable}'`);
      }
    }
    checks.push(
      missing.length === 0
        ? pass("window launch targets executable", "all configured launch targets were found in PATH")
        : fail("window launch targets executable", `missing executables: ${missing.join(", ")}`)
    );
  } catch (error) {
    checks.push(fail("config parses and validates", errorMessage(error)));
    checks.push(fail("window launch targets executable", "skipped because config is invalid"));
  }

  return checks;
}

export function hasFailures(checks: readonly DoctorCheck[]): boolean {
  return checks.some((check) => check.state === "FAIL");
}

export function doctorSummary(checks: readonly DoctorCheck[]): string {
  const passed = checks.filter((check) => check.state === "PASS").length;
  return `${passed} passed, ${checks.length - passed} failed`;
}

export function formatDoctorReport(checks: readonly DoctorCheck[]): string {
  const header = {state: "STATUS", name: "CHECK", details: "DETAILS"};
  const nameWidth = Math.max(header.name.length, ...checks.map((check) => check.name.length));
  const stateWidth = header.state.length;
  const line = (state: string, name: string, details: string): string =>
    `${state.padEnd(stateWidth)}  ${name.padEnd(nameWidth)}  ${details}`.trimEnd();

  return [
    line(header.state, header.name, header.details),
    ...checks.map((check) => line(check.state, check.name, check.details)),
    "",
    doctorSummary(checks)
  ].join("\n");
}
