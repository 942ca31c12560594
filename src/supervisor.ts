import { spawn } from "node:child_process";
import { randomBytes } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { errorCode, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { resolveSelfLaunch } from "./self-launch.js";
import { wait } from "./util.js";

export interface ProcessTable {
  isAlive(pid: number): boolean;
  /** SIGTERM, then SIGKILL if the process outlives the grace period. */
  terminate(pid: number): Promise<void>;
}

export function isPidAlive(pid: number | null | undefined): boolean {
  if (!pid || !Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // exists, but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

export function createProcessTable(graceMs = 5000): ProcessTable {
  return {
    isAlive: isPidAlive,
    async terminate(pid: number) {
      try {
        process.kill(pid, "SIGTERM");
      } catch (err) {
        if (errorCode(err) === "ESRCH") return;
        throw err;
      }
      const start = Date.now();
      while (Date.now() - start < graceMs) {
        if (!isPidAlive(pid)) return;
        await wait(100);
      }
      try {
        process.kill(pid, "SIGKILL");
      } catch (err) {
        if (errorCode(err) !== "ESRCH") throw err;
      }
    },
  };
}

/** The watchdog's pid file. Creation is atomic: a record either holds a full pid or does not exist. */
export class LivenessRecord {
  constructor(readonly path: string) {}

  read(): number | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.path, "utf8").trim();
    } catch {
      return null;
    }
    if (!/^\d+$/.test(raw)) return null;
    const pid = Number(raw);
    return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
  }

  exists(): boolean {
    return fs.existsSync(this.path);
  }

  /**
   * Create the record holding `pid` unless one already exists. The pid is
   * written to a private temp file first and then hard-linked into place,
   * and link() fails with EEXIST when another starter won.
   */
  createExclusive(pid: number): boolean {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    const tmp = `${this.path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
    fs.writeFileSync(tmp, `${pid}\n`);
    try {
      fs.linkSync(tmp, this.path);
      return true;
    } catch (err) {
      if (errorCode(err) === "EEXIST") return false;
      throw err;
    } finally {
      fs.rmSync(tmp, { force: true });
    }
  }

  remove(): void {
    fs.rmSync(this.path, { force: true });
  }

  removeIfOwnedBy(pid: number): void {
    if (this.read() === pid) this.remove();
  }
}

export type WatchdogLauncher = (opts: { startupDelayMs: number }) => number;

export type StartOutcome =
  | { status: "started"; pid: number; staleRemoved: number | null }
  | { status: "already-running"; pid: number | null };

export type StopOutcome =
  | { status: "stopped"; pid: number }
  | { status: "not-running"; staleRemoved: number | null };

export type SupervisorStatus =
  | { status: "running"; pid: number }
  | { status: "not-running"; staleRemoved: number | null };

export interface WatchdogSupervisorOptions {
  recordPath: string;
  launch?: WatchdogLauncher;
  processTable?: ProcessTable;
  logger?: Logger;
}

/** Command line that re-enters this CLI as `watchdog run --supervised`. */
export function watchdogRunArgs(opts: {
  startupDelayMs: number;
  configPath?: string;
}): string[] {
  const args = ["watchdog", "run", "--supervised"];
  if (opts.startupDelayMs > 0) {
    args.push("--startup-delay-ms", String(opts.startupDelayMs));
  }
  if (opts.configPath) {
    args.push("--config", opts.configPath);
  }
  return args;
}

export function detachedLauncher(configPath?: string): WatchdogLauncher {
  return ({ startupDelayMs }) => {
    const launcher = resolveSelfLaunch();
    const child = spawn(
      launcher.command,
      [...launcher.args, ...watchdogRunArgs({ startupDelayMs, configPath })],
      { stdio: "ignore", detached: true, env: process.env },
    );
    child.unref();
    if (!child.pid) {
      throw new Error(`failed to launch watchdog via ${launcher.command}`);
    }
    return child.pid;
  };
}

export class WatchdogSupervisor {
  readonly record: LivenessRecord;
  private readonly launch: WatchdogLauncher;
  private readonly processes: ProcessTable;
  private readonly logger: Logger;

  constructor(options: WatchdogSupervisorOptions) {
    this.record = new LivenessRecord(options.recordPath);
    this.launch = options.launch ?? detachedLauncher();
    this.processes = options.processTable ?? createProcessTable();
    this.logger = options.logger ?? new NullLogger();
  }

  /** Live pid from the record, deleting the record when it is stale. */
  private livePid(): { pid: number | null; staleRemoved: number | null } {
    if (!this.record.exists()) return { pid: null, staleRemoved: null };
    const pid = this.record.read();
    if (pid != null && this.processes.isAlive(pid)) {
      return { pid, staleRemoved: null };
    }
    this.logger.info("removing stale liveness record", {
      pid,
      record: this.record.path,
      kind: "StaleLivenessRecord",
    });
    this.record.remove();
    return { pid: null, staleRemoved: pid ?? 0 };
  }

  status(): SupervisorStatus {
    const { pid, staleRemoved } = this.livePid();
    return pid != null
      ? { status: "running", pid }
      : { status: "not-running", staleRemoved };
  }

  async start({ startupDelayMs = 0 }: { startupDelayMs?: number } = {}): Promise<StartOutcome> {
    const { pid: existing, staleRemoved } = this.livePid();
    if (existing != null) {
      return { status: "already-running", pid: existing };
    }
    const pid = this.launch({ startupDelayMs });
    if (this.record.createExclusive(pid)) {
      this.logger.info("watchdog launched", { pid, startupDelayMs });
      return { status: "started", pid, staleRemoved };
    }
    // a concurrent start created the record between our check and now
    this.logger.warn("lost start race, terminating duplicate watchdog", { pid });
    await this.processes.terminate(pid);
    return { status: "already-running", pid: this.record.read() };
  }

  async stop(): Promise<StopOutcome> {
    if (!this.record.exists()) {
      return { status: "not-running", staleRemoved: null };
    }
    const pid = this.record.read();
    if (pid == null || !this.processes.isAlive(pid)) {
      this.record.remove();
      return { status: "not-running", staleRemoved: pid ?? 0 };
    }
    try {
      await this.processes.terminate(pid);
    } catch (err) {
      this.logger.warn("failed to terminate watchdog", {
        pid,
        error: errorMessage(err),
      });
      throw err;
    }
    this.record.remove();
    this.logger.info("watchdog stopped", { pid });
    return { status: "stopped", pid };
  }

  /**
   * Run `body` in this process as the watchdog, holding the record for the
   * duration. Used when a service manager runs the watchdog in the foreground.
   */
  async runForeground<T>(body: () => Promise<T>): Promise<T> {
    const me = process.pid;
    if (!this.record.createExclusive(me)) {
      const { pid } = this.livePid();
      if (pid != null && pid !== me) {
        throw new Error(`watchdog already running (pid ${pid})`);
      }
      if (!this.record.createExclusive(me) && this.record.read() !== me) {
        throw new Error(`could not create liveness record ${this.record.path}`);
      }
    }
    try {
      return await body();
    } finally {
      this.record.removeIfOwnedBy(me);
    }
  }
}
