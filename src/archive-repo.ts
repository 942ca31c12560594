import type { Dirent } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { ArchiveConfig } from "./config.js";
import { ArchiveError, errorCode, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  consolidatedFileName,
  isArchiveDate,
  tryParseMinuteFileName,
  type ArchiveDate,
  type MinuteName,
} from "./minute-name.js";

export interface ChannelDirectory {
  date: ArchiveDate;
  /** Path relative to the date directory, e.g. `SITE/RX/WWV_10`. */
  relPath: string;
  path: string;
}

export interface MinuteFile extends MinuteName {
  fileName: string;
  path: string;
  isPlaceholder: boolean;
}

export interface ChannelScan {
  date: ArchiveDate;
  channel: ChannelDirectory;
  minuteCount: number;
  placeholderCount: number;
  consolidated: boolean;
  unrecognized: number;
  /** set when the channel directory could not be read; the counts are then 0 */
  error?: string;
}

function isHidden(name: string): boolean {
  return name.startsWith(".");
}

async function exists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export interface ArchiveRepositoryOptions {
  logger?: Logger;
}

export class ArchiveRepository {
  private readonly logger: Logger;

  constructor(
    private readonly config: Readonly<ArchiveConfig>,
    options: ArchiveRepositoryOptions = {},
  ) {
    this.logger = options.logger ?? new NullLogger();
  }

  get root(): string {
    return this.config.root;
  }

  datePath(date: ArchiveDate): string {
    return path.join(this.config.root, date);
  }

  consolidatedPath(channel: ChannelDirectory): string {
    return path.join(
      channel.path,
      consolidatedFileName(this.config.outputExtension),
    );
  }

  async listDates(): Promise<ArchiveDate[]> {
    let entries;
    try {
      entries = await this.readEntries(this.config.root);
    } catch (err) {
      throw new ArchiveError(
        "ArchiveUnavailable",
        `cannot read archive root ${this.config.root}: ${errorMessage(err)}`,
        { root: this.config.root, code: errorCode(err) },
      );
    }
    return entries
      .filter((e) => e.isDirectory() && isArchiveDate(e.name))
      .map((e) => e.name)
      .sort();
  }

  async hasDate(date: ArchiveDate): Promise<boolean> {
    try {
      return (await stat(this.datePath(date))).isDirectory();
    } catch {
      return false;
    }
  }

  async listChannelDirectories(date: ArchiveDate): Promise<ChannelDirectory[]> {
    const dateDir = this.datePath(date);
    if (!(await this.hasDate(date))) {
      throw new ArchiveError(
        "ArchiveUnavailable",
        `no archive directory for ${date} (${dateDir})`,
        { date, path: dateDir },
      );
    }
    const found: string[] = [];
    const walk = async (rel: string, depth: number) => {
      const dir = path.join(dateDir, rel);
      let entries: Dirent[];
      try {
        entries = await this.readEntries(dir);
      } catch (err) {
        if (!rel) {
          throw new ArchiveError(
            "ArchiveUnavailable",
            `cannot read ${dateDir}: ${errorMessage(err)}`,
            { date, path: dateDir, code: errorCode(err) },
          );
        }
        // the rest of the date is still usable
        this.logger.warn("skipping unreadable directory", {
          date,
          path: dir,
          kind: "ArchiveUnavailable",
          error: errorMessage(err),
        });
        return;
      }
      for (const entry of entries) {
        if (!entry.isDirectory() || isHidden(entry.name)) continue;
        const childRel = rel ? `${rel}/${entry.name}` : entry.name;
        if (depth + 1 === this.config.channelDepth) {
          found.push(childRel);
        } else {
          await walk(childRel, depth + 1);
        }
      }
    };
    await walk("", 0);
    return found.sort().map((relPath) => ({
      date,
      relPath,
      path: path.join(dateDir, ...relPath.split("/")),
    }));
  }

  async readEntries(dir: string): Promise<Dirent[]> {
    return readdir(dir, { withFileTypes: true });
  }

  /** Names of every entry in a channel directory, hidden ones included. */
  async channelEntryNames(channel: ChannelDirectory): Promise<string[]> {
    return (await this.readEntries(channel.path)).map((e) => e.name);
  }

  /** Minute files of one channel sorted by file name, i.e. by time. */
  async listMinuteFiles(channel: ChannelDirectory): Promise<MinuteFile[]> {
    const names = (await this.channelEntryNames(channel)).sort();
    const files: MinuteFile[] = [];
    for (const fileName of names) {
      if (isHidden(fileName)) continue;
      const parsed = tryParseMinuteFileName(fileName);
      if (!parsed || parsed.extension !== this.config.minuteExtension) continue;
      const full = path.join(channel.path, fileName);
      const st = await lstat(full);
      if (!st.isFile()) continue;
      files.push({
        ...parsed,
        fileName,
        path: full,
        isPlaceholder: st.nlink > 1,
      });
    }
    return files;
  }

  async scanChannel(channel: ChannelDirectory): Promise<ChannelScan> {
    const files = await this.listMinuteFiles(channel);
    const consolidatedName = consolidatedFileName(this.config.outputExtension);
    let regular = 0;
    for (const entry of await this.readEntries(channel.path)) {
      if (entry.isFile() && !isHidden(entry.name)) regular += 1;
    }
    const consolidated = await exists(path.join(channel.path, consolidatedName));
    return {
      date: channel.date,
      channel,
      minuteCount: files.length,
      placeholderCount: files.filter((f) => f.isPlaceholder).length,
      consolidated,
      unrecognized: regular - files.length - (consolidated ? 1 : 0),
    };
  }

  /**
   * Ordered (date, channel) pairs with their file counts. An unreadable
   * channel is reported in its entry; an unreadable date is skipped when
   * scanning the whole archive and fails the scan when it was asked for.
   */
  async scan(dates?: readonly ArchiveDate[]): Promise<ChannelScan[]> {
    const targets = dates ? [...dates].sort() : await this.listDates();
    const result: ChannelScan[] = [];
    for (const date of targets) {
      let channels: ChannelDirectory[];
      try {
        channels = await this.listChannelDirectories(date);
      } catch (err) {
        if (dates || !(err instanceof ArchiveError)) throw err;
        this.logger.warn("date skipped", { date, error: err.message });
        continue;
      }
      for (const channel of channels) {
        try {
          result.push(await this.scanChannel(channel));
        } catch (err) {
          this.logger.warn("cannot scan channel", {
            date,
            channel: channel.relPath,
            kind: "ArchiveUnavailable",
            error: errorMessage(err),
          });
          result.push({
            date,
            channel,
            minuteCount: 0,
            placeholderCount: 0,
            consolidated: false,
            unrecognized: 0,
            error: errorMessage(err),
          });
        }
      }
    }
    return result;
  }
}
