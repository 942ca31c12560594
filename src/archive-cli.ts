import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { Command } from "commander";
import { ArchiveRepository, type ChannelScan } from "./archive-repo.js";
import {
  guarded,
  parseDateArgument,
  resolveContext,
  type CliContext,
  type CliDeps,
} from "./cli-context.js";
import {
  ConsolidationPipeline,
  type ChannelConsolidation,
} from "./consolidate.js";
import { MINUTES_PER_DAY } from "./constants.js";
import { GapRepairEngine, type DateRepairResult } from "./gap-repair.js";
import { previousUtcDate, type ArchiveDate } from "./minute-name.js";
import { purgeEmptyDates } from "./retention.js";
import { uploadConsolidated } from "./upload.js";

function components(ctx: CliContext) {
  const { config, logger, deps } = ctx;
  const repo = new ArchiveRepository(config.archive, {
    logger: logger.child("archive"),
  });
  return {
    repo,
    repair: new GapRepairEngine(repo, config.archive, {
      logger: logger.child("repair"),
      now: deps.now,
    }),
    pipeline: new ConsolidationPipeline(repo, config, {
      logger: logger.child("consolidate"),
      run: deps.run,
    }),
  };
}

export function renderStatusTable(title: string, scans: ChannelScan[]): string {
  const table = new AsciiTable3(title)
    .setHeading("Date", "Channel", "Minutes", "Silence", "Missing", "24h file")
    .setStyle("unicode-round");
  [0, 1].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  [2, 3, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.RIGHT));
  for (const scan of scans) {
    if (scan.error) {
      table.addRow(scan.date, scan.channel.relPath, "-", "-", "-", "unreadable");
      continue;
    }
    table.addRow(
      scan.date,
      scan.channel.relPath,
      String(scan.minuteCount),
      String(scan.placeholderCount),
      String(Math.max(0, MINUTES_PER_DAY - scan.minuteCount)),
      scan.consolidated ? "yes" : "no",
    );
  }
  return table.toString();
}

function printRepair(result: DateRepairResult): boolean {
  if (result.skipped) {
    console.log(`${result.date}: still being recorded, skipped`);
    return true;
  }
  let ok = true;
  for (const ch of result.channels) {
    const where = `${result.date}/${ch.channel.relPath}`;
    if (ch.status === "complete" || ch.status === "repaired") {
      console.log(`${where}: ${ch.status}, ${ch.present} present, ${ch.linked.length} filled`);
    } else {
      // an unknown token only means the channel has nothing to repair from
      if (ch.status === "failed") ok = false;
      console.log(`${where}: ${ch.status} (${ch.kind}): ${ch.error}`);
    }
  }
  return ok;
}

function printConsolidation(results: ChannelConsolidation[]): boolean {
  let ok = true;
  for (const r of results) {
    const where = `${r.channel.date}/${r.channel.relPath}`;
    if (r.status === "failed") {
      ok = false;
      console.log(`${where}: failed (${r.kind}): ${r.error}`);
    } else {
      console.log(`${where}: ${r.status} ${r.output}`);
    }
  }
  return ok;
}

async function runDaily(ctx: CliContext, date: ArchiveDate): Promise<boolean> {
  const { repair, pipeline } = components(ctx);
  const logger = ctx.logger.child("daily");
  logger.info("daily run", { date });
  let ok = printRepair(await repair.repairDate(date));
  ok = printConsolidation(await pipeline.consolidateDate(date)) && ok;
  if (!ctx.config.upload.destination) {
    logger.info("no upload destination configured, skipping upload");
    return ok;
  }
  const result = await uploadConsolidated(ctx.config, {
    logger: logger.child("upload"),
    run: ctx.deps.run,
  });
  return result.ok && ok;
}

export function registerArchiveCommands(program: Command, deps: CliDeps = {}) {
  program
    .command("consolidate")
    .description("merge each complete channel of a date into one 10 sps file")
    .argument("<date>", "UTC date (YYYYMMDD)", parseDateArgument)
    .action(
      guarded(async (date: ArchiveDate, _opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        const { pipeline } = components(ctx);
        if (!printConsolidation(await pipeline.consolidateDate(date))) {
          process.exitCode = 1;
        }
      }),
    );

  program
    .command("status")
    .description("show minute and silence counts for each channel of a date")
    .argument("<date>", "UTC date (YYYYMMDD)", parseDateArgument)
    .option("--json", "emit JSON", false)
    .action(
      guarded(async (date: ArchiveDate, opts: { json: boolean }, command: Command) => {
        const ctx = resolveContext(command, deps);
        const scans = await components(ctx).repo.scan([date]);
        printScans(`Archive ${date}`, scans, opts.json);
      }),
    );

  program
    .command("status-all")
    .description("show channel status for every date in the archive")
    .option("--json", "emit JSON", false)
    .action(
      guarded(async (opts: { json: boolean }, command: Command) => {
        const ctx = resolveContext(command, deps);
        const scans = await components(ctx).repo.scan();
        printScans("Archive", scans, opts.json);
      }),
    );

  program
    .command("repair")
    .description("fill missing minutes of a date with the silence placeholder")
    .argument("<date>", "UTC date (YYYYMMDD)", parseDateArgument)
    .action(
      guarded(async (date: ArchiveDate, _opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        if (!printRepair(await components(ctx).repair.repairDate(date))) {
          process.exitCode = 1;
        }
      }),
    );

  program
    .command("repair-all")
    .description("repair every date except the one still being recorded")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        let ok = true;
        for (const result of await components(ctx).repair.repairAll()) {
          ok = printRepair(result) && ok;
        }
        if (!ok) process.exitCode = 1;
      }),
    );

  program
    .command("purge-empty")
    .description("delete date trees that contain no files")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        const results = await purgeEmptyDates(components(ctx).repo, {
          logger: ctx.logger.child("retention"),
        });
        for (const r of results) {
          if (r.action === "kept") {
            console.log(`${r.date}: kept (${r.files} files)`);
          } else if (r.action === "purged") {
            console.log(`${r.date}: purged`);
          } else {
            process.exitCode = 1;
            console.log(`${r.date}: failed: ${r.error}`);
          }
        }
      }),
    );

  program
    .command("upload-all")
    .description("rsync every consolidated file to the configured destination")
    .action(
      guarded(async (_opts: unknown, command: Command) => {
        const ctx = resolveContext(command, deps);
        const result = await uploadConsolidated(ctx.config, {
          logger: ctx.logger.child("upload"),
          run: deps.run,
        });
        if (!result.ok) process.exitCode = 1;
      }),
    );

  program
    .command("daily")
    .description("repair, consolidate and upload the previous UTC day")
    .option("--date <date>", "process this UTC date instead", parseDateArgument)
    .action(
      guarded(async (opts: { date?: ArchiveDate }, command: Command) => {
        const ctx = resolveContext(command, deps);
        const now = deps.now?.() ?? new Date();
        if (!(await runDaily(ctx, opts.date ?? previousUtcDate(now)))) {
          process.exitCode = 1;
        }
      }),
    );
}

function printScans(title: string, scans: ChannelScan[], json: boolean) {
  if (json) {
    console.log(
      JSON.stringify(
        scans.map((s) => ({
          date: s.date,
          channel: s.channel.relPath,
          minutes: s.minuteCount,
          silence: s.placeholderCount,
          consolidated: s.consolidated,
          ...(s.error ? { error: s.error } : {}),
        })),
        null,
        2,
      ),
    );
    return;
  }
  if (!scans.length) {
    console.log("no channels");
    return;
  }
  console.log(renderStatusTable(title, scans));
}
