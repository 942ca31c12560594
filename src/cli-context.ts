import type { Command } from "commander";
import { InvalidArgumentError } from "commander";
import { loadConfig, type GrapeConfig } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import { ConsoleLogger, parseLogLevel, type LogLevel, type Logger } from "./logger.js";
import { isArchiveDate, type ArchiveDate } from "./minute-name.js";
import type { ProcessTable, WatchdogLauncher } from "./supervisor.js";
import type { ToolRunner } from "./tools.js";

/** Seams the commands reach the outside world through; tests replace them. */
export interface CliDeps {
  run?: ToolRunner;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
  home?: string;
  launch?: WatchdogLauncher;
  processTable?: ProcessTable;
}

export interface CliContext {
  config: GrapeConfig;
  logger: Logger;
  logLevel: LogLevel;
  deps: CliDeps;
}

type GlobalOptions = {
  config?: string;
  logLevel?: string;
};

export function resolveLogLevel(command: Command): LogLevel {
  return parseLogLevel(command.optsWithGlobals<GlobalOptions>().logLevel, "info");
}

export function resolveContext(command: Command, deps: CliDeps): CliContext {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const logLevel = resolveLogLevel(command);
  const config = loadConfig({
    path: globals.config,
    home: deps.home,
    env: deps.env,
  });
  return { config, logger: new ConsoleLogger(logLevel), logLevel, deps };
}

/** commander argParser for `<date>` arguments. */
export function parseDateArgument(raw: string): ArchiveDate {
  const value = raw.trim();
  if (!isArchiveDate(value)) {
    throw new InvalidArgumentError("expected a UTC date as YYYYMMDD");
  }
  return value;
}

/**
 * Wraps a command action: errors become a single line on stderr and a
 * nonzero exit code instead of a stack trace.
 */
export function guarded<A extends unknown[]>(
  action: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      console.error(`${CLI_NAME}: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  };
}
