/**
 * Diagnostics sink. Off by default; `--diagnostics` turns on a JSON log file
 * per invocation under the config directory.
 */

import {dirname, join} from "node:path";
import pino from "pino";

export type Logger = pino.Logger;

export interface Diagnostics {
  logger: Logger;
  /** Log file path, present only when diagnostics are enabled. */
  path?: string;
}

export interface DiagnosticsOptions {
  enabled: boolean;
  configPath: string;
  version: string;
  argv?: string[];
  now?: () => number;
}

export function diagnosticsDir(configPath: string): string {
  return join(dirname(configPath), "diagnostics");
}

export function createDiagnostics(options: DiagnosticsOptions): Diagnostics {
  if (!options.enabled) {
    return {logger: pino({level: "silent"})};
  }

  const now = options.now ?? Date.now;
  const path = join(diagnosticsDir(options.configPath), `${now()}.log`);
  const logger = pino(
    {
      level: "debug",
      name: "seshmux",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({level: label})
      }
    },
    pino.destination({dest: path, sync: true, mkdir: true})
  );

  logger.info(
    {version: options.version, pid: process.pid, argv: options.argv ?? process.argv},
    "seshmux diagnostics start"
  );
  return {logger, path};
}

/** Closing line of a fatal error, pointing at the log or at the flag. */
export function diagnosticsHint(diagnostics: Diagnostics): string {
  return diagnostics.path
    ? `Diagnostics written to ${diagnostics.path}`
    : "Run `seshmux --diagnostics` to capture a diagnostics log.";
}
