import { promises as fs } from "node:fs";
import { join } from "node:path";
import { ArchiveRepository, type ChannelDirectory } from "../archive-repo.js";
import type { GrapeConfig } from "../config.js";
import { GapRepairEngine } from "../gap-repair.js";
import { MemoryLogger } from "../logger.js";
import {
  ALL_MINUTES,
  UnreadableRepository,
  makeTmp,
  minuteName,
  testConfig,
  writeMinutes,
  writeSilence,
} from "./util.js";

const DATE = "20240615";
// a clock well after DATE, so DATE is repairable
const LATER = () => new Date(Date.UTC(2024, 5, 20, 3, 0));

describe("GapRepairEngine", () => {
  let home: string;
  let config: GrapeConfig;
  let repo: ArchiveRepository;
  let channelDir: string;

  beforeEach(async () => {
    home = await makeTmp("repair");
    config = testConfig(home);
    repo = new ArchiveRepository(config.archive);
    channelDir = join(config.archive.root, DATE, "S1", "RX1", "WWV_10");
    await writeSilence(config);
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  it("links every missing minute to the silence placeholder", async () => {
    const present = ALL_MINUTES.filter((m) => m !== 5 && m !== 600);
    await writeMinutes(channelDir, DATE, "WWV_10", present);
    const engine = new GapRepairEngine(repo, config.archive, { now: LATER });

    const result = await engine.repairDate(DATE);
    if (result.skipped) throw new Error("unexpected skip");
    expect(result.channels).toHaveLength(1);
    expect(result.channels[0]).toMatchObject({
      status: "repaired",
      channelToken: "WWV_10",
      present: 1438,
      linked: [minuteName(DATE, 5, "WWV_10"), minuteName(DATE, 600, "WWV_10")],
    });

    const silence = await fs.stat(config.archive.silenceFile);
    const filled = await fs.stat(join(channelDir, minuteName(DATE, 600, "WWV_10")));
    expect(filled.ino).toBe(silence.ino);
    expect((await fs.readdir(channelDir)).length).toBe(1440);
  });

  it("changes nothing on a second run", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", [0, 1, 2]);
    const engine = new GapRepairEngine(repo, config.archive, { now: LATER });
    await engine.repairDate(DATE);
    const before = (await fs.readdir(channelDir)).sort();

    const second = await engine.repairDate(DATE);
    if (second.skipped) throw new Error("unexpected skip");
    expect(second.channels[0]).toMatchObject({
      status: "complete",
      present: 1440,
      linked: [],
    });
    expect((await fs.readdir(channelDir)).sort()).toEqual(before);
  });

  it("leaves the current UTC date alone", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", [0]);
    const engine = new GapRepairEngine(repo, config.archive, {
      now: () => new Date(Date.UTC(2024, 5, 15, 23, 59)),
    });
    expect(await engine.repairDate(DATE)).toEqual({
      date: DATE,
      skipped: "current-date",
    });
    expect(await fs.readdir(channelDir)).toHaveLength(1);
  });

  it("skips a channel with no minute file to take the token from", async () => {
    await fs.mkdir(channelDir, { recursive: true });
    await fs.writeFile(join(channelDir, "readme.txt"), "x");
    const logger = new MemoryLogger();
    const engine = new GapRepairEngine(repo, config.archive, { now: LATER, logger });

    const result = await engine.repairDate(DATE);
    if (result.skipped) throw new Error("unexpected skip");
    expect(result.channels[0]).toMatchObject({
      status: "skipped",
      kind: "UnknownChannelToken",
      linked: [],
    });
    expect(await fs.readdir(channelDir)).toEqual(["readme.txt"]);
    expect(logger.messages("warn")).toEqual(["channel skipped"]);
  });

  it("refuses to run without the placeholder", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", [0]);
    await fs.rm(config.archive.silenceFile);
    const engine = new GapRepairEngine(repo, config.archive, { now: LATER });
    await expect(engine.repairDate(DATE)).rejects.toMatchObject({
      kind: "ArchiveUnavailable",
    });
    expect(await fs.readdir(channelDir)).toHaveLength(1);
  });

  it("repairs every date except today", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", [0]);
    const todayDir = join(config.archive.root, "20240620", "S1", "RX1", "WWV_10");
    await writeMinutes(todayDir, "20240620", "WWV_10", [0]);
    const engine = new GapRepairEngine(repo, config.archive, { now: LATER });

    const results = await engine.repairAll();
    expect(results.map((r) => [r.date, r.skipped ?? "repaired"])).toEqual([
      [DATE, "repaired"],
      ["20240620", "current-date"],
    ]);
    expect(await fs.readdir(channelDir)).toHaveLength(1440);
    expect(await fs.readdir(todayDir)).toHaveLength(1);
  });

  it("keeps repairing later dates when a channel cannot be read", async () => {
    const bad = join(config.archive.root, "20240614", "S1", "RX1", "WWV_BAD");
    await writeMinutes(bad, "20240614", "WWV_BAD", [0]);
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES.slice(1));
    const logger = new MemoryLogger();
    const engine = new GapRepairEngine(
      new UnreadableRepository(config.archive, (dir) => dir === bad),
      config.archive,
      { now: LATER, logger },
    );

    const results = await engine.repairAll();
    const statuses = results.flatMap((r) =>
      r.skipped ? [] : r.channels.map((c) => [r.date, c.channel.relPath, c.status]),
    );
    expect(statuses).toEqual([
      ["20240614", "S1/RX1/WWV_BAD", "failed"],
      [DATE, "S1/RX1/WWV_10", "repaired"],
    ]);
    const [first] = results;
    if (first.skipped) throw new Error("unexpected skip");
    expect(first.channels[0]).toMatchObject({
      kind: "ArchiveUnavailable",
      error: `EACCES: permission denied, scandir '${bad}'`,
      linked: [],
    });
    expect(await fs.readdir(channelDir)).toHaveLength(1440);
    expect(await fs.readdir(bad)).toHaveLength(1);
    expect(logger.messages("error")).toEqual(["cannot read channel directory"]);
  });

  it("reports a channel whose links fail and moves on to the next one", async () => {
    const gone = join(config.archive.root, DATE, "S1", "RX0", "WWV_5");
    await writeMinutes(gone, DATE, "WWV_5", [0]);
    await writeMinutes(channelDir, DATE, "WWV_10", [0]);

    // the first channel disappears between listing and linking
    class VanishingRepository extends ArchiveRepository {
      async channelEntryNames(channel: ChannelDirectory): Promise<string[]> {
        const names = await super.channelEntryNames(channel);
        if (channel.path === gone) await fs.rm(gone, { recursive: true });
        return names;
      }
    }
    const engine = new GapRepairEngine(
      new VanishingRepository(config.archive),
      config.archive,
      { now: LATER },
    );

    const result = await engine.repairDate(DATE);
    if (result.skipped) throw new Error("unexpected skip");
    expect(result.channels.map((c) => [c.channel.relPath, c.status])).toEqual([
      ["S1/RX0/WWV_5", "failed"],
      ["S1/RX1/WWV_10", "repaired"],
    ]);
    const [failedChannel] = result.channels;
    if (failedChannel.status !== "failed") throw new Error("expected a failure");
    expect(failedChannel.kind).toBe("ArchiveUnavailable");
    expect(failedChannel.linked).toEqual([]);
    expect(failedChannel.error).toMatch(/^ENOENT/);
    expect(await fs.readdir(channelDir)).toHaveLength(1440);
  });
});
