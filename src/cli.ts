#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { registerArchiveCommands } from "./archive-cli.js";
import type { CliDeps } from "./cli-context.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import {
  registerServiceCommands,
  registerWatchdogCommands,
} from "./watchdog-cli.js";

function packageVersion(): string {
  const file = path.join(__dirname, "..", "package.json");
  if (!fs.existsSync(file)) return "0.0.0";
  const pkg: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return pkg && typeof pkg === "object" && "version" in pkg
    ? String(pkg.version)
    : "0.0.0";
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("GRAPE IQ archive maintenance and receiver watchdog")
    .version(packageVersion());

  program
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .option("--config <file>", "config file (default: $GRAPE_CONFIG or <home>/config.json)");

  registerArchiveCommands(program, deps);
  registerWatchdogCommands(program, deps);
  registerServiceCommands(program, deps);
  return program;
}

if (require.main === module) {
  // children and the systemd unit re-launch this script by path
  const entry = process.argv[1];
  if (!process.env.GRAPE_ENTRY && entry && fs.existsSync(entry)) {
    process.env.GRAPE_ENTRY = path.resolve(entry);
  }
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`${CLI_NAME}: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}
