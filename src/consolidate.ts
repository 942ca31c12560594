import { randomBytes } from "node:crypto";
import { link, mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import path from "node:path";
import type {
  ArchiveRepository,
  ChannelDirectory,
  MinuteFile,
} from "./archive-repo.js";
import type { ArchiveConfig, ConsolidateConfig } from "./config.js";
import { CONSOLIDATED_BASENAME, MINUTES_PER_DAY } from "./constants.js";
import {
  ArchiveError,
  errorCode,
  errorMessage,
  type ArchiveErrorKind,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { minuteOfDay, type ArchiveDate } from "./minute-name.js";
import {
  assertToolOk,
  runTool,
  withNice,
  withOpenFileLimit,
  type ToolRunner,
} from "./tools.js";

export type ConsolidationResult = {
  channel: ChannelDirectory;
  output: string;
  status: "exists" | "created";
};

export type ChannelConsolidation =
  | ConsolidationResult
  | {
      channel: ChannelDirectory;
      output: string;
      status: "failed";
      kind: ArchiveErrorKind;
      error: string;
    };

export interface ConsolidationOptions {
  logger?: Logger;
  run?: ToolRunner;
}

async function fileExists(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

function decodedName(file: MinuteFile): string {
  return `${path.basename(file.fileName, path.extname(file.fileName))}.wav`;
}

/**
 * Returns a reason the files do not cover every minute of the day once, or
 * null when they do. Expects the files sorted by name.
 */
export function coverageProblem(
  date: ArchiveDate,
  files: readonly MinuteFile[],
): string | null {
  if (files.length !== MINUTES_PER_DAY) {
    return `found ${files.length} minute files, expected ${MINUTES_PER_DAY}`;
  }
  for (let i = 0; i < files.length; i += 1) {
    const file = files[i];
    if (file.date !== date) {
      return `${file.fileName} belongs to ${file.date}, not ${date}`;
    }
    if (minuteOfDay(file) !== i) {
      return `minute ${i} is missing or duplicated near ${file.fileName}`;
    }
  }
  return null;
}

export class ConsolidationPipeline {
  private readonly logger: Logger;
  private readonly run: ToolRunner;

  constructor(
    private readonly repo: ArchiveRepository,
    private readonly config: {
      archive: Readonly<ArchiveConfig>;
      consolidate: Readonly<ConsolidateConfig>;
    },
    options: ConsolidationOptions = {},
  ) {
    this.logger = options.logger ?? new NullLogger();
    this.run = options.run ?? runTool;
  }

  async consolidateChannel(
    channel: ChannelDirectory,
  ): Promise<ConsolidationResult> {
    const output = this.repo.consolidatedPath(channel);
    if (await fileExists(output)) {
      this.logger.debug("consolidated file exists, nothing to do", { output });
      return { channel, output, status: "exists" };
    }

    const files = await this.repo.listMinuteFiles(channel);
    const problem = coverageProblem(channel.date, files);
    if (problem) {
      throw new ArchiveError("IncompleteChannel", `${channel.relPath}: ${problem}`, {
        date: channel.date,
        channel: channel.relPath,
        count: files.length,
      });
    }

    const { consolidate } = this.config;
    await mkdir(consolidate.scratchRoot, { recursive: true });
    const scratch = await mkdtemp(
      path.join(consolidate.scratchRoot, `consolidate-${process.pid}-`),
    );
    const partial = path.join(
      channel.path,
      `.${CONSOLIDATED_BASENAME}.${randomBytes(4).toString("hex")}.partial.${this.config.archive.outputExtension}`,
    );
    const t0 = Date.now();
    let published = true;
    try {
      await this.exec(
        withNice(consolidate.niceness, [
          ...consolidate.decoder,
          "-s",
          `--output-prefix=${scratch}${path.sep}`,
          "-d",
          ...files.map((f) => f.path),
        ]),
        channel,
        consolidate.decoder[0],
      );

      const decoded = files.map((f) => path.join(scratch, decodedName(f)));
      // the merge opens every decoded file at once
      await this.exec(
        withOpenFileLimit(
          consolidate.openFileLimit,
          withNice(consolidate.niceness, [
            ...consolidate.resampler,
            ...decoded,
            partial,
            "rate",
            String(consolidate.targetRate),
          ]),
        ),
        channel,
        consolidate.resampler[0],
      );

      if (!(await fileExists(partial))) {
        throw new ArchiveError(
          "ExternalToolFailure",
          `${consolidate.resampler[0]} reported success but wrote no output`,
          { channel: channel.relPath, partial },
        );
      }
      // link() never replaces a file another run already published
      try {
        await link(partial, output);
      } catch (err) {
        if (errorCode(err) !== "EEXIST") throw err;
        published = false;
      }
    } finally {
      await rm(partial, { force: true });
      await rm(scratch, { recursive: true, force: true });
    }

    if (!published) {
      this.logger.info("consolidated file appeared during the merge, keeping it", {
        output,
      });
      return { channel, output, status: "exists" };
    }

    this.logger.info("created consolidated file", {
      output,
      elapsedMs: Date.now() - t0,
    });
    return { channel, output, status: "created" };
  }

  /** Consolidate each channel of a date in order; one failure does not stop the rest. */
  async consolidateDate(date: ArchiveDate): Promise<ChannelConsolidation[]> {
    const results: ChannelConsolidation[] = [];
    for (const channel of await this.repo.listChannelDirectories(date)) {
      try {
        results.push(await this.consolidateChannel(channel));
      } catch (err) {
        const kind: ArchiveErrorKind =
          err instanceof ArchiveError ? err.kind : "ArchiveUnavailable";
        this.logger.error("consolidation failed", {
          date,
          channel: channel.relPath,
          kind,
          error: errorMessage(err),
        });
        results.push({
          channel,
          output: this.repo.consolidatedPath(channel),
          status: "failed",
          kind,
          error: errorMessage(err),
        });
      }
    }
    return results;
  }

  private async exec(
    command: readonly string[],
    channel: ChannelDirectory,
    tool: string,
  ): Promise<void> {
    const [cmd, ...args] = command;
    const result = await this.run(cmd, args, { logger: this.logger });
    assertToolOk(result, tool, { channel: channel.relPath, date: channel.date });
  }
}
