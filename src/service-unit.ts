import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ServiceConfig } from "./config.js";
import { SERVICE_NAME } from "./constants.js";
import { errorCode } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { resolveSelfLaunch } from "./self-launch.js";
import { assertToolOk, runTool, type ToolResult, type ToolRunner } from "./tools.js";

function shellEscape(input: string): string {
  return /^[\w@%+=:,./-]+$/.test(input)
    ? input
    : `'${input.replace(/'/g, "'\\''")}'`;
}

export function unitFileName(service: Pick<ServiceConfig, "name">): string {
  return `${service.name ?? SERVICE_NAME}.service`;
}

export function unitDirectory(
  service: Pick<ServiceConfig, "scope" | "unitDir">,
  homeDir = os.homedir(),
): string {
  if (service.unitDir) return service.unitDir;
  return service.scope === "user"
    ? path.join(homeDir, ".config", "systemd", "user")
    : "/lib/systemd/system";
}

export interface UnitTemplateInput {
  execArgs: readonly string[];
  scope: ServiceConfig["scope"];
  workingDirectory?: string;
  user?: { name: string; group: string };
}

export function renderUnit({
  execArgs,
  scope,
  workingDirectory,
  user,
}: UnitTemplateInput): string {
  const target = scope === "user" ? "default.target" : "multi-user.target";
  const lines = [
    "[Unit]",
    "Description=GRAPE receiver watchdog",
    `After=${target} network-online.target`,
    "",
    "[Service]",
    "Type=simple",
  ];
  if (scope === "system" && user) {
    lines.push(`User=${user.name}`, `Group=${user.group}`);
  }
  if (workingDirectory) {
    lines.push(`WorkingDirectory=${workingDirectory}`);
  }
  lines.push(
    `ExecStart=${execArgs.map(shellEscape).join(" ")}`,
    "Restart=on-failure",
    "Environment=GRAPE_DISABLE_LOG_ECHO=1",
    "",
    "[Install]",
    `WantedBy=${target}`,
    "",
  );
  return lines.join("\n");
}

/** `node <entry> watchdog run --delay`, plus the config file when one was given. */
export function defaultExecArgs(configPath?: string): string[] {
  const launch = resolveSelfLaunch();
  const args = [launch.command, ...launch.args, "watchdog", "run", "--delay"];
  if (configPath) args.push("--config", configPath);
  return args;
}

export type UnitSetupOutcome =
  | { status: "unchanged"; unitPath: string }
  | { status: "installed" | "replaced"; unitPath: string };

export interface ServiceManagerOptions {
  service: ServiceConfig;
  execArgs: readonly string[];
  run?: ToolRunner;
  logger?: Logger;
  /** home used to place a user-scope unit */
  homeDir?: string;
  workingDirectory?: string;
}

/** Wraps systemctl for the watchdog's unit. */
export class ServiceManager {
  readonly unitName: string;
  readonly unitPath: string;
  private readonly run: ToolRunner;
  private readonly logger: Logger;

  constructor(private readonly options: ServiceManagerOptions) {
    this.unitName = unitFileName(options.service);
    this.unitPath = path.join(
      unitDirectory(options.service, options.homeDir),
      this.unitName,
    );
    this.run = options.run ?? runTool;
    this.logger = options.logger ?? new NullLogger();
  }

  renderUnit(): string {
    const scope = this.options.service.scope;
    let user: UnitTemplateInput["user"];
    if (scope === "system") {
      const info = os.userInfo();
      user = { name: info.username, group: String(info.gid) };
    }
    return renderUnit({
      execArgs: this.options.execArgs,
      scope,
      workingDirectory: this.options.workingDirectory,
      user,
    });
  }

  /** Write the unit if the installed copy differs, then reload systemd. */
  async setup(): Promise<UnitSetupOutcome> {
    const content = this.renderUnit();
    const installed = readIfExists(this.unitPath);
    if (installed === content) {
      this.logger.info("service unit already up to date", { unitPath: this.unitPath });
      return { status: "unchanged", unitPath: this.unitPath };
    }
    if (installed != null) {
      this.logger.info("installed service unit differs from template, replacing", {
        unitPath: this.unitPath,
      });
    }
    fs.mkdirSync(path.dirname(this.unitPath), { recursive: true });
    fs.writeFileSync(this.unitPath, content);
    await this.systemctl(["daemon-reload"]);
    return {
      status: installed == null ? "installed" : "replaced",
      unitPath: this.unitPath,
    };
  }

  async install(): Promise<UnitSetupOutcome> {
    const outcome = await this.setup();
    await this.systemctl(["enable", this.unitName]);
    return outcome;
  }

  async start(): Promise<void> {
    await this.systemctl(["start", this.unitName]);
  }

  async disable(): Promise<void> {
    await this.systemctl(["stop", this.unitName]);
    await this.systemctl(["disable", this.unitName]);
  }

  /** Exit status 0 from `systemctl status` means the unit is active. */
  async status(): Promise<{ enabled: boolean; output: string }> {
    await this.setup();
    const result = await this.exec(["status", this.unitName], true);
    return { enabled: result.ok, output: result.stdout };
  }

  private scopeArgs(): string[] {
    return this.options.service.scope === "user" ? ["--user"] : [];
  }

  private exec(args: string[], captureStdout = false): Promise<ToolResult> {
    return this.run("systemctl", [...this.scopeArgs(), ...args], {
      logger: this.logger,
      captureStdout,
    });
  }

  private async systemctl(args: string[]): Promise<void> {
    const result = await this.exec(args);
    assertToolOk(result, "systemctl", { args });
  }
}

function readIfExists(p: string): string | null {
  try {
    return fs.readFileSync(p, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}
