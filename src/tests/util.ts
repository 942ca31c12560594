import type { Dirent } from "node:fs";
import fsp from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ArchiveRepository, type ArchiveRepositoryOptions } from "../archive-repo.js";
import { parseConfig, type ArchiveConfig, type GrapeConfig } from "../config.js";
import { renderMinuteFileName } from "../minute-name.js";
import type { ToolResult, ToolRunner } from "../tools.js";

export async function makeTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(tmpdir(), `grape-${prefix}-`));
}

export function testConfig(home: string, file: unknown = {}): GrapeConfig {
  return parseConfig(file, {
    home,
    configPath: join(home, "config.json"),
    env: {},
  });
}

export function minuteName(
  date: string,
  minuteOfDay: number,
  token: string,
  extension = "flac",
): string {
  return renderMinuteFileName({
    date,
    hour: Math.floor(minuteOfDay / 60),
    minute: minuteOfDay % 60,
    channelToken: token,
    extension,
  });
}

export const ALL_MINUTES = Array.from({ length: 1440 }, (_, i) => i);

/** Writes one small file per minute of day into `dir`. */
export async function writeMinutes(
  dir: string,
  date: string,
  token: string,
  minutes: readonly number[],
  extension = "flac",
): Promise<void> {
  await fsp.mkdir(dir, { recursive: true });
  for (const m of minutes) {
    await fsp.writeFile(join(dir, minuteName(date, m, token, extension)), `iq ${m}`);
  }
}

export async function writeSilence(config: GrapeConfig): Promise<void> {
  await fsp.mkdir(config.home, { recursive: true });
  await fsp.writeFile(config.archive.silenceFile, "silence");
}

export async function fileExists(p: string): Promise<boolean> {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export interface ToolCall {
  cmd: string;
  args: string[];
}

export function ok(stdout = ""): ToolResult {
  return { code: 0, ok: true, stderr: "", stdout };
}

export function failed(code: number, stderr = ""): ToolResult {
  return { code, ok: false, stderr, stdout: "" };
}

/** A ToolRunner that records every call and answers with `handler`. */
export function fakeRunner(
  handler: (call: ToolCall) => ToolResult | Promise<ToolResult> = () => ok(),
): { run: ToolRunner; calls: ToolCall[] } {
  const calls: ToolCall[] = [];
  const run: ToolRunner = async (cmd, args) => {
    const call = { cmd, args: [...args] };
    calls.push(call);
    return handler(call);
  };
  return { run, calls };
}

/** Captures console.log lines while `fn` runs. */
export async function captureLog(fn: () => Promise<unknown>): Promise<string[]> {
  const output: string[] = [];
  const spy = jest.spyOn(console, "log").mockImplementation((msg?: unknown) => {
    output.push(String(msg));
  });
  try {
    await fn();
  } finally {
    spy.mockRestore();
  }
  return output;
}

/** Repository that fails to list the directories `unreadable` picks, as if permission were denied. */
export class UnreadableRepository extends ArchiveRepository {
  constructor(
    config: Readonly<ArchiveConfig>,
    private readonly unreadable: (dir: string) => boolean,
    options?: ArchiveRepositoryOptions,
  ) {
    super(config, options);
  }

  async readEntries(dir: string): Promise<Dirent[]> {
    if (this.unreadable(dir)) {
      throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), {
        code: "EACCES",
      });
    }
    return super.readEntries(dir);
  }
}
