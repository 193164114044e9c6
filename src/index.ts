#!/usr/bin/env node
import {readFileSync} from "node:fs";
import {Command} from "commander";
import {doctorCommand} from "./commands/doctor.js";
import {interactiveCommand} from "./commands/interactive.js";
import {resolveConfigPath} from "./config.js";
import {errorMessage} from "./errors.js";
import {ExecaRunner} from "./utils/exec.js";
import {createDiagnostics, diagnosticsHint, type Diagnostics} from "./utils/logger.js";

type GlobalOptions = {
  diagnostics?: boolean;
};

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

const version = packageVersion();
const program = new Command();

program
  .name("seshmux")
  .description("Pair git worktrees with tmux sessions from an interactive menu")
  .version(version)
  .option("--diagnostics", "Write a diagnostics log for this run");

function openDiagnostics(): {diagnostics: Diagnostics; configPath: string} {
  const configPath = resolveConfigPath();
  const {diagnostics: enabled} = program.opts<GlobalOptions>();
  return {
    configPath,
    diagnostics: createDiagnostics({enabled: Boolean(enabled), configPath, version})
  };
}

function fatal(diagnostics: Diagnostics, error: unknown): never {
  diagnostics.logger.fatal({err: error}, "fatal error");
  console.error(`Fatal: ${errorMessage(error)}`);
  console.error(diagnosticsHint(diagnostics));
  process.exit(1);
}

program
  .command("doctor")
  .description("Check the environment and configuration")
  .action(async () => {
    const {diagnostics, configPath} = openDiagnostics();
    try {
      process.exitCode = await doctorCommand({
        runner: new ExecaRunner(),
        configPath,
        logger: diagnostics.logger.child({component: "doctor"})
      });
    } catch (error) {
      fatal(diagnostics, error);
    }
  });

program.action(async () => {
  const {diagnostics, configPath} = openDiagnostics();
  try {
    await interactiveCommand({runner: new ExecaRunner(), configPath, logger: diagnostics.logger});
  } catch (error) {
    fatal(diagnostics, error);
  }
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Fatal: ${errorMessage(error)}`);
  process.exit(1);
});
