import { InvalidArgumentError } from "commander";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./logger.js";
import type { DaemonLogRow } from "./daemon-logs.js";

const rtf = new Intl.RelativeTimeFormat("en", { numeric: "auto" });

export function fmtAgo(input: Date | number, now = Date.now()): string {
  const t = typeof input === "number" ? input : input.getTime();
  const diff = t - now;
  const units: [Intl.RelativeTimeFormatUnit, number][] = [
    ["day", 24 * 60 * 60 * 1000],
    ["hour", 60 * 60 * 1000],
    ["minute", 60 * 1000],
    ["second", 1000],
  ];
  for (const [unit, ms] of units) {
    const val = Math.trunc(diff / ms);
    if (Math.abs(val) >= 1) return rtf.format(val, unit);
  }
  return rtf.format(0, "second");
}

/** commander argParser for `--level`. */
export function parseLogLevelOption(raw: string): LogLevel {
  const lvl = raw.trim().toLowerCase();
  if (!isLogLevel(lvl)) {
    throw new InvalidArgumentError(
      `expected one of ${LOG_LEVELS.join(", ")}`,
    );
  }
  return lvl;
}

export function formatLogRow(
  row: DaemonLogRow,
  { json, absolute, now = Date.now() }: {
    json: boolean;
    absolute: boolean;
    now?: number;
  },
): string {
  if (json) {
    return JSON.stringify({
      id: row.id,
      ts: row.ts,
      level: row.level,
      scope: row.scope,
      message: row.message,
      meta: row.meta ?? null,
    });
  }
  const scope = row.scope ? ` [${row.scope}]` : "";
  const meta =
    row.meta && Object.keys(row.meta).length
      ? ` ${JSON.stringify(row.meta)}`
      : "";
  const when = absolute ? new Date(row.ts).toISOString() : fmtAgo(row.ts, now);
  return `(${when}) ${row.level.toUpperCase()}${scope} ${row.message}${meta}`;
}

export function renderLogRows(
  rows: DaemonLogRow[],
  opts: { json: boolean; absolute: boolean },
): void {
  for (const row of rows) {
    console.log(formatLogRow(row, opts));
  }
}
