// Minute file names look like 20240615T143200Z_WWV_10_iq.flac. The fields are
// fixed width and zero padded, so sorting names sorts them by time.

import { CONSOLIDATED_BASENAME, MINUTES_PER_DAY } from "./constants.js";
import { MinuteNameParseError } from "./errors.js";

/** UTC calendar date in `YYYYMMDD` form. */
export type ArchiveDate = string;

export interface MinuteName {
  date: ArchiveDate;
  hour: number;
  minute: number;
  channelToken: string;
  extension: string;
}

const DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const NAME_RE = /^(\d{8})T(\d{2})(\d{2})00Z_(.+)_iq\.([A-Za-z0-9]+)$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function isArchiveDate(value: string): value is ArchiveDate {
  const m = DATE_RE.exec(value);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day
  );
}

export function utcDateOf(now: Date | number = Date.now()): ArchiveDate {
  const d = new Date(now);
  return `${d.getUTCFullYear()}${pad2(d.getUTCMonth() + 1)}${pad2(d.getUTCDate())}`;
}

export function previousUtcDate(now: Date | number = Date.now()): ArchiveDate {
  return utcDateOf(new Date(now).getTime() - 24 * 60 * 60 * 1000);
}

export function parseMinuteFileName(fileName: string): MinuteName {
  const m = NAME_RE.exec(fileName);
  if (!m) {
    throw new MinuteNameParseError(
      fileName,
      "expected YYYYMMDDTHHMM00Z_<channel>_iq.<ext>",
    );
  }
  const [, date, hh, mm, channelToken, extension] = m;
  if (!isArchiveDate(date)) {
    throw new MinuteNameParseError(fileName, `no such date ${date}`);
  }
  const hour = Number(hh);
  const minute = Number(mm);
  if (hour > 23) {
    throw new MinuteNameParseError(fileName, `hour ${hh} out of range`);
  }
  if (minute > 59) {
    throw new MinuteNameParseError(fileName, `minute ${mm} out of range`);
  }
  if (channelToken.includes("/")) {
    throw new MinuteNameParseError(fileName, "channel token contains '/'");
  }
  return { date, hour, minute, channelToken, extension };
}

export function tryParseMinuteFileName(fileName: string): MinuteName | null {
  try {
    return parseMinuteFileName(fileName);
  } catch (err) {
    if (err instanceof MinuteNameParseError) return null;
    throw err;
  }
}

export function renderMinuteFileName(name: MinuteName): string {
  return `${name.date}T${pad2(name.hour)}${pad2(name.minute)}00Z_${name.channelToken}_iq.${name.extension}`;
}

export function minuteOfDay(name: Pick<MinuteName, "hour" | "minute">): number {
  return name.hour * 60 + name.minute;
}

/** All 1440 names a complete channel directory holds, in time order. */
export function expectedMinuteFileNames(
  date: ArchiveDate,
  channelToken: string,
  extension: string,
): string[] {
  const names: string[] = [];
  for (let i = 0; i < MINUTES_PER_DAY; i += 1) {
    names.push(
      renderMinuteFileName({
        date,
        hour: Math.floor(i / 60),
        minute: i % 60,
        channelToken,
        extension,
      }),
    );
  }
  return names;
}

export function consolidatedFileName(extension: string): string {
  return `${CONSOLIDATED_BASENAME}.${extension}`;
}
