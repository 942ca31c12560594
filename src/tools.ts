// Every external program (flac, sox, rsync, ping, the power switch, systemctl)
// is started through a ToolRunner so callers can swap in a fake.

import { spawn } from "node:child_process";
import { ExternalToolError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface ToolResult {
  code: number | null;
  ok: boolean;
  stderr: string;
  stdout: string;
}

export interface ToolRunOptions {
  logger?: Logger;
  /** keep stdout; off by default since most tools are noisy */
  captureStdout?: boolean;
}

export type ToolRunner = (
  cmd: string,
  args: readonly string[],
  opts?: ToolRunOptions,
) => Promise<ToolResult>;

export function argsJoin(args: readonly string[]): string {
  return args
    .map((a) => (/^[\w@%+=:,./-]+$/.test(a) ? a : `'${a.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

function truncateMiddle(input: string, max = 400): string {
  if (input.length <= max) return input;
  const half = Math.floor((max - 3) / 2);
  return `${input.slice(0, half)}...${input.slice(input.length - half)}`;
}

export const runTool: ToolRunner = (cmd, args, opts = {}) => {
  const t = Date.now();
  const logger = opts.logger;
  if (logger?.isLevelEnabled("debug")) {
    const preview =
      args.length > 12
        ? [...args.slice(0, 12), `(+${args.length - 12} more)`]
        : args;
    logger.debug(`run '${cmd} ${argsJoin(preview)}'`);
  }
  return new Promise<ToolResult>((resolve) => {
    const child = spawn(cmd, [...args], {
      stdio: ["ignore", opts.captureStdout ? "pipe" : "ignore", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    let settled = false;
    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      logger?.error(`${cmd} spawn error`, { error: err.message });
      resolve({ code: null, ok: false, stderr: err.message, stdout });
    });
    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      const ok = code === 0;
      logger?.debug(`${cmd} exit`, { code, elapsedMs: Date.now() - t });
      if (!ok && stderr) {
        logger?.warn(`${cmd} stderr`, { stderr: truncateMiddle(stderr) });
      }
      resolve({ code, ok, stderr, stdout });
    });
  });
};

export function assertToolOk(
  result: ToolResult,
  cmd: string,
  context?: Record<string, unknown>,
): void {
  if (result.ok) return;
  throw new ExternalToolError(
    `${cmd} exited with code ${result.code}${result.stderr ? `: ${truncateMiddle(result.stderr.trim(), 200)}` : ""}`,
    result.code,
    { ...context, cmd },
  );
}

/** `nice -n N cmd args…`, or the bare command when niceness is 0. */
export function withNice(
  niceness: number,
  command: readonly string[],
): string[] {
  return niceness > 0 ? ["nice", "-n", String(niceness), ...command] : [...command];
}

/** Raise the open-file limit for one command through a shell wrapper. */
export function withOpenFileLimit(
  limit: number,
  command: readonly string[],
): string[] {
  return ["sh", "-c", `ulimit -n ${limit} && exec "$@"`, "grape-ulimit", ...command];
}
