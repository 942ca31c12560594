import { link, stat } from "node:fs/promises";
import path from "node:path";
import type { ArchiveRepository, ChannelDirectory } from "./archive-repo.js";
import type { ArchiveConfig } from "./config.js";
import {
  ArchiveError,
  errorCode,
  errorMessage,
  type ArchiveErrorKind,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import {
  expectedMinuteFileNames,
  tryParseMinuteFileName,
  utcDateOf,
  type ArchiveDate,
} from "./minute-name.js";

export type ChannelRepairResult =
  | {
      channel: ChannelDirectory;
      status: "complete";
      channelToken: string;
      present: number;
      linked: string[];
    }
  | {
      channel: ChannelDirectory;
      status: "repaired";
      channelToken: string;
      present: number;
      linked: string[];
    }
  | {
      channel: ChannelDirectory;
      status: "skipped" | "failed";
      kind: ArchiveErrorKind;
      error: string;
      linked: string[];
    };

export type DateRepairResult =
  | { date: ArchiveDate; skipped: "current-date" }
  | { date: ArchiveDate; skipped?: undefined; channels: ChannelRepairResult[] };

export interface GapRepairOptions {
  logger?: Logger;
  /** clock used to decide which date is still being recorded */
  now?: () => Date;
}

export class GapRepairEngine {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly repo: ArchiveRepository,
    private readonly config: Readonly<ArchiveConfig>,
    options: GapRepairOptions = {},
  ) {
    this.logger = options.logger ?? new NullLogger();
    this.now = options.now ?? (() => new Date());
  }

  async repairDate(
    date: ArchiveDate,
    currentDate: ArchiveDate = utcDateOf(this.now()),
  ): Promise<DateRepairResult> {
    if (date === currentDate) {
      this.logger.info("skipping repair of the current UTC date", { date });
      return { date, skipped: "current-date" };
    }
    await this.assertPlaceholder();
    const channels: ChannelRepairResult[] = [];
    for (const channel of await this.repo.listChannelDirectories(date)) {
      channels.push(await this.repairChannel(channel));
    }
    return { date, channels };
  }

  /** Repair every date except the one still accumulating; "today" is fixed at batch start. */
  async repairAll(): Promise<DateRepairResult[]> {
    const currentDate = utcDateOf(this.now());
    await this.assertPlaceholder();
    const results: DateRepairResult[] = [];
    for (const date of await this.repo.listDates()) {
      try {
        results.push(await this.repairDate(date, currentDate));
      } catch (err) {
        if (!(err instanceof ArchiveError && err.kind === "ArchiveUnavailable")) {
          throw err;
        }
        this.logger.warn("date skipped", { date, error: err.message });
      }
    }
    return results;
  }

  async repairChannel(channel: ChannelDirectory): Promise<ChannelRepairResult> {
    let existing: Set<string>;
    try {
      existing = new Set(await this.repo.channelEntryNames(channel));
    } catch (err) {
      this.logger.error("cannot read channel directory", {
        channel: channel.relPath,
        date: channel.date,
        kind: "ArchiveUnavailable",
        error: errorMessage(err),
      });
      return {
        channel,
        status: "failed",
        kind: "ArchiveUnavailable",
        error: errorMessage(err),
        linked: [],
      };
    }
    const token = this.deriveChannelToken(existing);
    if (!token) {
      const error = `no ${this.config.minuteExtension} minute file to take the channel token from`;
      this.logger.warn("channel skipped", {
        channel: channel.relPath,
        date: channel.date,
        kind: "UnknownChannelToken",
      });
      return {
        channel,
        status: "skipped",
        kind: "UnknownChannelToken",
        error,
        linked: [],
      };
    }

    const expected = expectedMinuteFileNames(
      channel.date,
      token,
      this.config.minuteExtension,
    );
    const missing = expected.filter((name) => !existing.has(name));
    const linked: string[] = [];
    for (const name of missing) {
      try {
        await link(this.config.silenceFile, path.join(channel.path, name));
        linked.push(name);
      } catch (err) {
        // another repair got there first
        if (errorCode(err) === "EEXIST") continue;
        this.logger.error("failed to link silence placeholder", {
          channel: channel.relPath,
          date: channel.date,
          file: name,
          error: errorMessage(err),
        });
        return {
          channel,
          status: "failed",
          kind: "ArchiveUnavailable",
          error: errorMessage(err),
          linked,
        };
      }
    }

    if (linked.length) {
      this.logger.info("filled missing minutes with silence", {
        channel: channel.relPath,
        date: channel.date,
        linked: linked.length,
      });
    }
    return {
      channel,
      status: linked.length ? "repaired" : "complete",
      channelToken: token,
      present: expected.length - missing.length,
      linked,
    };
  }

  private deriveChannelToken(names: Iterable<string>): string | null {
    for (const name of [...names].sort()) {
      const parsed = tryParseMinuteFileName(name);
      if (parsed && parsed.extension === this.config.minuteExtension) {
        return parsed.channelToken;
      }
    }
    return null;
  }

  private async assertPlaceholder(): Promise<void> {
    try {
      const st = await stat(this.config.silenceFile);
      if (st.isFile()) return;
    } catch (err) {
      throw new ArchiveError(
        "ArchiveUnavailable",
        `silence placeholder ${this.config.silenceFile} is missing: ${errorMessage(err)}`,
        { silenceFile: this.config.silenceFile },
      );
    }
    throw new ArchiveError(
      "ArchiveUnavailable",
      `silence placeholder ${this.config.silenceFile} is not a regular file`,
      { silenceFile: this.config.silenceFile },
    );
  }
}
