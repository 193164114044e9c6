import {formatDoctorReport, hasFailures, runDoctor} from "../doctor.js";
import type {CommandRunner} from "../utils/exec.js";
import type {Logger} from "../utils/logger.js";

export interface DoctorCommandOptions {
  runner: CommandRunner;
  configPath: string;
  logger: Logger;
}

/** Prints the report and returns the process exit code. */
export async function doctorCommand(options: DoctorCommandOptions): Promise<number> {
  const checks = await runDoctor({runner: options.runner, configPath: options.configPath});
  const failed = checks.filter((check) => check.state === "FAIL");
  options.logger.info({checks: checks.length, failed: failed.map((check) => check.name)}, "doctor finished");

  console.log(formatDoctorReport(checks));
  return hasFailures(checks) ? 1 : 0;
}
