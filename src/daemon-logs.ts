import { existsSync } from "node:fs";
import { openLogDb, type LogDatabase } from "./db.js";
import { errorMessage } from "./errors.js";
import {
  ConsoleLogger,
  StructuredLogger,
  isLogLevel,
  levelsAtOrAbove,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./logger.js";

const DEFAULT_KEEP_MS = envNumber("GRAPE_LOG_KEEP_MS", 30 * 24 * 60 * 60 * 1000);
const DEFAULT_KEEP_ROWS = envNumber("GRAPE_LOG_KEEP_ROWS", 100_000);

function envNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export interface DaemonLogRow {
  id: number;
  ts: number;
  level: LogLevel;
  scope: string | null;
  message: string;
  meta: Record<string, unknown> | null;
}

export interface DaemonLogQuery {
  afterId?: number;
  sinceTs?: number;
  limit?: number;
  minLevel?: LogLevel;
  order?: "asc" | "desc";
  scope?: string;
}

export interface DaemonLogStoreOptions {
  keepMs?: number;
  keepRows?: number;
}

interface StoredRow {
  id: number;
  ts: number;
  level: string;
  scope: string | null;
  message: string;
  meta: string | null;
}

export class DaemonLogStore {
  private readonly insertStmt;
  private readonly pruneByTimeStmt;
  private readonly pruneByRowsStmt;
  private readonly keepMs: number;
  private readonly keepRows: number;

  private constructor(
    private readonly db: LogDatabase,
    { keepMs, keepRows }: DaemonLogStoreOptions = {},
  ) {
    this.keepMs = keepMs ?? DEFAULT_KEEP_MS;
    this.keepRows = keepRows ?? DEFAULT_KEEP_ROWS;

    this.insertStmt = this.db.prepare<
      [number, string, string | null, string, string | null]
    >(
      `INSERT INTO daemon_logs(ts, level, scope, message, meta)
       VALUES (?, ?, ?, ?, ?)`,
    );
    this.pruneByTimeStmt = this.db.prepare<[number]>(
      `DELETE FROM daemon_logs
        WHERE ts < ?`,
    );
    this.pruneByRowsStmt = this.db.prepare<[number]>(
      `DELETE FROM daemon_logs
        WHERE id < COALESCE((
          SELECT id FROM daemon_logs
           ORDER BY id DESC
           LIMIT 1 OFFSET ?
        ), -1)`,
    );
  }

  static open(dbPath: string, options?: DaemonLogStoreOptions): DaemonLogStore {
    return new DaemonLogStore(openLogDb(dbPath), options);
  }

  append(entry: LogEntry): void {
    const ts = entry.ts;
    this.insertStmt.run(
      ts,
      entry.level,
      entry.scope ?? null,
      entry.message,
      entry.meta ? safeStringify(entry.meta) : null,
    );
    this.prune(ts);
  }

  close(): void {
    this.db.close();
  }

  private prune(now: number): void {
    if (this.keepMs > 0) {
      this.pruneByTimeStmt.run(now - this.keepMs);
    }
    if (this.keepRows > 0) {
      this.pruneByRowsStmt.run(Math.max(0, this.keepRows - 1));
    }
  }
}

export interface DaemonLoggerHandle {
  logger: Logger;
  close: () => void;
  store: DaemonLogStore;
}

export interface DaemonLoggerOptions extends DaemonLogStoreOptions {
  scope?: string;
  echoLevel?: LogLevel;
}

/** Logger for the long-running watchdog: every entry lands in SQLite, and optionally on stderr. */
export function createDaemonLogger(
  dbPath: string,
  options: DaemonLoggerOptions = {},
): DaemonLoggerHandle {
  const store = DaemonLogStore.open(dbPath, {
    keepMs: options.keepMs,
    keepRows: options.keepRows,
  });
  const fallback = new ConsoleLogger("warn");
  const sink = (entry: LogEntry) => {
    try {
      store.append(entry);
    } catch (err) {
      fallback.warn("failed to persist log entry", {
        error: errorMessage(err),
      });
    }
  };
  const logger = new StructuredLogger({
    scope: options.scope,
    sink,
    echo: options.echoLevel ? { minLevel: options.echoLevel } : undefined,
  });
  return {
    logger,
    store,
    close: () => store.close(),
  };
}

export function fetchDaemonLogs(
  dbPath: string,
  {
    afterId,
    sinceTs,
    limit = 200,
    minLevel,
    order = "asc",
    scope,
  }: DaemonLogQuery = {},
): DaemonLogRow[] {
  if (!existsSync(dbPath)) return [];
  const db = openLogDb(dbPath);
  try {
    const where: string[] = ["1 = 1"];
    const params: Array<string | number> = [];
    if (typeof afterId === "number" && Number.isFinite(afterId)) {
      where.push("id > ?");
      params.push(afterId);
    }
    if (typeof sinceTs === "number" && Number.isFinite(sinceTs)) {
      where.push("ts >= ?");
      params.push(sinceTs);
    }
    if (minLevel) {
      const levels = levelsAtOrAbove(minLevel);
      where.push(`level IN (${levels.map(() => "?").join(",")})`);
      params.push(...levels);
    }
    if (scope) {
      where.push("scope = ?");
      params.push(scope);
    }

    const rows = db
      .prepare<Array<string | number>, StoredRow>(
        `SELECT id, ts, level, scope, message, meta
           FROM daemon_logs
          WHERE ${where.join(" AND ")}
          ORDER BY id ${order === "desc" ? "DESC" : "ASC"}
          LIMIT ?`,
      )
      .all(...params, Math.max(1, limit));
    return rows.map((row): DaemonLogRow => ({
      ...row,
      level: isLogLevel(row.level) ? row.level : "info",
      meta: parseMeta(row.meta),
    }));
  } finally {
    db.close();
  }
}

function safeStringify(obj: Record<string, unknown>): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return JSON.stringify({ __error: "failed to serialize meta" });
  }
}

function parseMeta(meta: string | null): Record<string, unknown> | null {
  if (!meta) return null;
  try {
    const parsed: unknown = JSON.parse(meta);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return { value: parsed };
  } catch {
    return { __error: "failed to parse meta JSON" };
  }
}
