import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function levelsAtOrAbove(minLevel: LogLevel): LogLevel[] {
  const threshold = LEVEL_ORDER[minLevel];
  return LOG_LEVELS.filter((lvl) => LEVEL_ORDER[lvl] >= threshold);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown> | null;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  echo?: {
    minLevel?: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
  isLevelEnabled?: (level: LogLevel) => boolean;
}

const defaultClock = () => Date.now();

// a service manager captures stderr itself, so the unit file turns echo off
function isEchoSuppressed(): boolean {
  const raw = process.env.GRAPE_DISABLE_LOG_ECHO?.trim().toLowerCase();
  if (!raw) return false;
  return raw !== "0" && raw !== "false";
}

export function formatLogLine(entry: LogEntry): string {
  const stamp = new Date(entry.ts).toISOString();
  const scopeText = entry.scope ? ` [${entry.scope}]` : "";
  const metaText =
    entry.meta && Object.keys(entry.meta).length
      ? ` ${serializeMeta(entry.meta)}`
      : "";
  return `${stamp} ${entry.level.toUpperCase()}${scopeText} ${entry.message}${metaText}`;
}

const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  process.stderr.write(`${formatLogLine(entry)}\n`);
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;
  private readonly enabled?: (level: LogLevel) => boolean;

  constructor({
    scope,
    sink,
    echo,
    clock,
    isLevelEnabled,
  }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? defaultClock;
    this.enabled = isLevelEnabled;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
      isLevelEnabled: this.enabled,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && levelAtOrAbove(this.echoMinLevel, level)) {
      this.echoWriter(entry);
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.enabled ? this.enabled(level) : true;
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({
      echo: { minLevel },
      isLevelEnabled: (level) => levelAtOrAbove(minLevel, level),
    });
  }
}

/** Collects entries in memory; handy when a caller wants to inspect what was logged. */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(entries: LogEntry[] = [], scope?: string) {
    super({ scope, sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  child(scope: string): Logger {
    return new MemoryLogger(this.entries, scope);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => !level || entry.level === level)
      .map((entry) => entry.message);
  }
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}
