import { Command, InvalidArgumentError, Option } from "commander";
import { existsSync } from "node:fs";
import {
  guarded,
  resolveContext,
  type CliContext,
  type CliDeps,
} from "./cli-context.js";
import { parseLogLevelOption, renderLogRows } from "./cli-log-output.js";
import { createDaemonLogger, fetchDaemonLogs } from "./daemon-logs.js";
import {
  CommandPowerController,
  HttpHealthProbe,
  PingGatewayCheck,
} from "./device-control.js";
import { LOG_LEVELS, type LogLevel, type Logger } from "./logger.js";
import { getLivenessRecordPath, getWatchdogLogDbPath } from "./paths.js";
import { ServiceManager, defaultExecArgs } from "./service-unit.js";
import {
  WatchdogSupervisor,
  createProcessTable,
  detachedLauncher,
} from "./supervisor.js";
import { FleetWatchdog } from "./watchdog.js";

// long enough for an in-flight power cycle (settle time) to finish on SIGTERM
const STOP_GRACE_MS = 20_000;

function parseNonNegative(raw: string): number {
  const n = Number(raw);
  if (!raw.trim() || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError("expected a non-negative number");
  }
  return n;
}

function parseCount(raw: string): number {
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

/**
 * `--delay` alone means the configured startup delay, `--delay <seconds>`
 * an explicit one, no flag none at all.
 */
export function resolveStartupDelayMs(
  delay: string | boolean | undefined,
  configuredMs: number,
): number {
  if (delay === undefined || delay === false) return 0;
  if (delay === true) return configuredMs;
  return Math.round(parseNonNegative(delay) * 1000);
}

// a config file that was never written is not passed on, since an explicit
// --config must exist
function configPathToForward(ctx: CliContext): string | undefined {
  return existsSync(ctx.config.configPath) ? ctx.config.configPath : undefined;
}

function supervisorFor(ctx: CliContext): WatchdogSupervisor {
  return new WatchdogSupervisor({
    recordPath: getLivenessRecordPath(ctx.config.home),
    launch: ctx.deps.launch ?? detachedLauncher(configPathToForward(ctx)),
    processTable: ctx.deps.processTable ?? createProcessTable(STOP_GRACE_MS),
    logger: ctx.logger.child("supervisor"),
  });
}

export function createFleetWatchdog(ctx: CliContext, logger: Logger): FleetWatchdog {
  const { watchdog } = ctx.config;
  return new FleetWatchdog(watchdog.devices, watchdog, {
    probe: new HttpHealthProbe(watchdog),
    power: new CommandPowerController(
      watchdog.powerCommand,
      ctx.deps.run,
      logger.child("power"),
    ),
    gateway: watchdog.gateway
      ? new PingGatewayCheck(watchdog.gateway, watchdog.pingCommand, ctx.deps.run)
      : undefined,
    logger,
  });
}

async function runWatchdogProcess(
  ctx: CliContext,
  opts: { startupDelayMs: number; supervised: boolean },
): Promise<void> {
  const handle = createDaemonLogger(getWatchdogLogDbPath(ctx.config.home), {
    scope: "watchdog",
    echoLevel: ctx.logLevel,
  });
  const watchdog = createFleetWatchdog(ctx, handle.logger);
  const onSignal = (signal: NodeJS.Signals) => {
    handle.logger.info("stop requested", { signal });
    watchdog.stop();
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
  const supervisor = supervisorFor(ctx);
  try {
    if (opts.supervised) {
      // the starting process already wrote our pid into the record
      try {
        await watchdog.run({ startupDelayMs: opts.startupDelayMs });
      } finally {
        supervisor.record.removeIfOwnedBy(process.pid);
      }
    } else {
      await supervisor.runForeground(() =>
        watchdog.run({ startupDelayMs: opts.startupDelayMs }),
      );
    }
  } finally {
    process.off("SIGTERM", onSignal);
    process.off("SIGINT", onSignal);
    handle.close();
  }
}

function serviceManagerFor(ctx: CliContext): ServiceManager {
  return new ServiceManager({
    service: ctx.config.service,
    execArgs: defaultExecArgs(configPathToForward(ctx)),
    run: ctx.deps.run,
    logger: ctx.logger.child("service"),
    workingDirectory: ctx.config.home,
  });
}

type LogsOptions = {
  tail?: number;
  since?: number;
  absolute: boolean;
  level?: LogLevel;
  follow: boolean;
  json: boolean;
  scope?: string;
};

export function registerWatchdogCommands(program: Command, deps: CliDeps = {}) {
  const watchdog = program
    .command("watchdog")
    .description("probe the receivers and power-cycle the ones that stop answering");

  watchdog
    .command("start")
    .description("start the watchdog in the background unless it is already running")
    .option("--delay [seconds]", "wait before the first probe (default: configured startup delay)")
    .action(
      guarded(async (opts: { delay?: string | boolean }, command: Command) => {
        const ctx = resolveContext(command, deps);
        const startupDelayMs = resolveStartupDelayMs(
          opts.delay,
          ctx.config.watchdog.startupDelayMs,
        );
        const outcome = await supervisorFor(ctx).start({ startupDelayMs });
        if (outcome.status === "started") {
          console.log(`watchdog started (pid ${outcome.pid})`);
        } else {
          console.log(`watchdog already running (pid ${outcome.pid ?? "?"})`);
        }
      }),
    );

  watchdog
    .command("stop")
    .description("stop the background watchdog")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        const outcome = await supervisorFor(ctx).stop();
        console.log(
          outcome.status === "stopped"
            ? `watchdog stopped (pid ${outcome.pid})`
            : "watchdog not running",
        );
      }),
    );

  watchdog
    .command("status")
    .description("report whether the watchdog is running")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        const status = supervisorFor(ctx).status();
        if (status.status === "running") {
          console.log(`running (pid ${status.pid})`);
        } else {
          console.log(
            status.staleRemoved != null
              ? "not running (removed stale record)"
              : "not running",
          );
        }
      }),
    );

  watchdog
    .command("run")
    .description("run the watchdog in the foreground")
    .option("--delay [seconds]", "wait before the first probe (default: configured startup delay)")
    .addOption(new Option("--supervised").hideHelp().default(false))
    .addOption(
      new Option("--startup-delay-ms <ms>")
        .hideHelp()
        .argParser((v: string) => Math.round(parseNonNegative(v))),
    )
    .action(
      guarded(
        async (
          opts: { delay?: string | boolean; supervised: boolean; startupDelayMs?: number },
          command: Command,
        ) => {
          const ctx = resolveContext(command, deps);
          const startupDelayMs =
            opts.startupDelayMs ??
            resolveStartupDelayMs(opts.delay, ctx.config.watchdog.startupDelayMs);
          await runWatchdogProcess(ctx, {
            startupDelayMs,
            supervised: opts.supervised,
          });
        },
      ),
    );

  watchdog
    .command("logs")
    .description("show recent watchdog log entries")
    .option("--tail <n>", "number of entries to display", parseCount)
    .option("--since <ms>", "only entries with ts >= ms since epoch", parseCount)
    .option("--absolute", "show absolute timestamps", false)
    .option(
      "--level <level>",
      `minimum level (${LOG_LEVELS.join(", ")})`,
      parseLogLevelOption,
    )
    .option("-f, --follow", "keep printing new entries", false)
    .option("--json", "emit newline-delimited JSON", false)
    .option("--scope <scope>", "only entries with this scope")
    .action(
      guarded(async (opts: LogsOptions, command: Command) => {
        const ctx = resolveContext(command, deps);
        const dbPath = getWatchdogLogDbPath(ctx.config.home);
        const render = { json: opts.json, absolute: opts.absolute };
        const query = { minLevel: opts.level, scope: opts.scope };
        const rows = fetchDaemonLogs(dbPath, {
          ...query,
          limit: opts.tail ?? (opts.follow ? 100 : 10_000),
          sinceTs: opts.since,
          order: "desc",
        }).reverse();
        if (rows.length) {
          renderLogRows(rows, render);
        } else if (!opts.follow) {
          console.log("no logs");
          return;
        }
        if (!opts.follow) return;

        let lastId = rows.length ? rows[rows.length - 1].id : 0;
        await new Promise<void>((resolve) => {
          const timer = setInterval(() => {
            const next = fetchDaemonLogs(dbPath, { ...query, afterId: lastId });
            if (next.length) {
              renderLogRows(next, render);
              lastId = next[next.length - 1].id;
            }
          }, 1000);
          const stop = () => {
            clearInterval(timer);
            resolve();
          };
          process.once("SIGINT", stop);
          process.once("SIGTERM", stop);
        });
      }),
    );
}

export function registerServiceCommands(program: Command, deps: CliDeps = {}) {
  const service = program
    .command("service")
    .description("run the watchdog under systemd");

  service
    .command("start")
    .description("start the installed service")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const manager = serviceManagerFor(resolveContext(command, deps));
        await manager.start();
        console.log(`started ${manager.unitName}`);
      }),
    );

  service
    .command("install")
    .description("install the unit (if it changed) and enable it at boot")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const manager = serviceManagerFor(resolveContext(command, deps));
        const outcome = await manager.install();
        console.log(
          outcome.status === "unchanged"
            ? `${outcome.unitPath} already up to date`
            : `${outcome.status} ${outcome.unitPath}`,
        );
        console.log(`${manager.unitName} enabled; the watchdog will start at boot`);
      }),
    );

  service
    .command("disable")
    .description("stop the service and disable it")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const manager = serviceManagerFor(resolveContext(command, deps));
        await manager.disable();
        console.log(`${manager.unitName} stopped and disabled`);
      }),
    );

  service
    .command("status")
    .description("show the service status")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const manager = serviceManagerFor(resolveContext(command, deps));
        const { enabled, output } = await manager.status();
        if (output.trim()) console.log(output.trimEnd());
        console.log(`${manager.unitName} is ${enabled ? "enabled" : "disabled"}`);
      }),
    );
}
