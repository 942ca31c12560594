import { promises as fs } from "node:fs";
import { basename, extname, join } from "node:path";
import { ArchiveRepository } from "../archive-repo.js";
import type { GrapeConfig } from "../config.js";
import { ConsolidationPipeline, coverageProblem } from "../consolidate.js";
import { ExternalToolError } from "../errors.js";
import {
  ALL_MINUTES,
  failed,
  fakeRunner,
  fileExists,
  makeTmp,
  ok,
  testConfig,
  writeMinutes,
  type ToolCall,
} from "./util.js";

const DATE = "20240615";

/** Pretends to be flac and sox: writes the files they would write. */
async function fakeTools(call: ToolCall) {
  const prefixArg = call.args.find((a) => a.startsWith("--output-prefix="));
  if (prefixArg) {
    const prefix = prefixArg.slice("--output-prefix=".length);
    const inputs = call.args.slice(call.args.indexOf("-d") + 1);
    for (const input of inputs) {
      await fs.writeFile(`${prefix}${basename(input, extname(input))}.wav`, "pcm");
    }
    return ok();
  }
  const rate = call.args.indexOf("rate");
  if (rate > 0) {
    await fs.writeFile(call.args[rate - 1], "merged");
  }
  return ok();
}

async function entries(dir: string): Promise<string[]> {
  return (await fileExists(dir)) ? fs.readdir(dir) : [];
}

describe("ConsolidationPipeline", () => {
  let home: string;
  let config: GrapeConfig;
  let repo: ArchiveRepository;
  let channelDir: string;

  beforeEach(async () => {
    home = await makeTmp("consolidate");
    config = testConfig(home);
    repo = new ArchiveRepository(config.archive);
    channelDir = join(config.archive.root, DATE, "S1", "RX1", "WWV_10");
  });

  afterEach(async () => {
    await fs.rm(home, { recursive: true, force: true });
  });

  async function onlyChannel() {
    const [channel] = await repo.listChannelDirectories(DATE);
    return channel;
  }

  it("decodes then merges a complete channel under nice and a raised file limit", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const { run, calls } = fakeRunner(fakeTools);
    const pipeline = new ConsolidationPipeline(repo, config, { run });

    const result = await pipeline.consolidateChannel(await onlyChannel());
    const output = join(channelDir, "24_hour_10sps_iq.wav");
    expect(result).toMatchObject({ status: "created", output });
    expect(await fs.readFile(output, "utf8")).toBe("merged");

    expect(calls).toHaveLength(2);
    const [decode, merge] = calls;
    expect(decode.cmd).toBe("nice");
    expect(decode.args.slice(0, 4)).toEqual(["-n", "19", "flac", "-s"]);
    expect(
      decode.args[4].startsWith(
        `--output-prefix=${join(config.consolidate.scratchRoot, "consolidate-")}`,
      ),
    ).toBe(true);
    expect(decode.args[5]).toBe("-d");
    expect(decode.args).toHaveLength(6 + 1440);
    expect(decode.args[6]).toBe(join(channelDir, "20240615T000000Z_WWV_10_iq.flac"));

    expect(merge.cmd).toBe("sh");
    expect(merge.args.slice(0, 7)).toEqual([
      "-c",
      'ulimit -n 2048 && exec "$@"',
      "grape-ulimit",
      "nice",
      "-n",
      "19",
      "sox",
    ]);
    expect(merge.args.slice(-2)).toEqual(["rate", "10"]);
    expect(merge.args).toHaveLength(7 + 1440 + 3);

    // scratch and the hidden partial are gone
    expect(await entries(config.consolidate.scratchRoot)).toEqual([]);
    expect((await fs.readdir(channelDir)).filter((n) => n.startsWith("."))).toEqual([]);
  });

  it("does nothing when the consolidated file already exists", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const { run, calls } = fakeRunner(fakeTools);
    const pipeline = new ConsolidationPipeline(repo, config, { run });
    const channel = await onlyChannel();
    await pipeline.consolidateChannel(channel);

    const again = await pipeline.consolidateChannel(channel);
    expect(again.status).toBe("exists");
    expect(calls).toHaveLength(2);
  });

  it("refuses an incomplete channel without running any tool", async () => {
    await writeMinutes(
      channelDir,
      DATE,
      "WWV_10",
      ALL_MINUTES.filter((m) => m !== 1439),
    );
    const { run, calls } = fakeRunner(fakeTools);
    const pipeline = new ConsolidationPipeline(repo, config, { run });

    await expect(pipeline.consolidateChannel(await onlyChannel())).rejects.toMatchObject({
      kind: "IncompleteChannel",
    });
    expect(calls).toEqual([]);
    expect(await fileExists(join(channelDir, "24_hour_10sps_iq.wav"))).toBe(false);
    expect(await entries(config.consolidate.scratchRoot)).toEqual([]);
  });

  it("leaves no output and no scratch when the decoder fails", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const { run, calls } = fakeRunner(() => failed(1, "flac: bad header"));
    const pipeline = new ConsolidationPipeline(repo, config, { run });

    const err = await pipeline.consolidateChannel(await onlyChannel()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalToolError);
    expect(err).toMatchObject({
      kind: "ExternalToolFailure",
      message: "flac exited with code 1: flac: bad header",
    });
    expect(calls).toHaveLength(1);
    expect(await fileExists(join(channelDir, "24_hour_10sps_iq.wav"))).toBe(false);
    expect(await entries(config.consolidate.scratchRoot)).toEqual([]);
  });

  it("treats a merge that writes nothing as a failure", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const { run } = fakeRunner(async (call) =>
      call.cmd === "sh" ? ok() : fakeTools(call),
    );
    const pipeline = new ConsolidationPipeline(repo, config, { run });
    await expect(pipeline.consolidateChannel(await onlyChannel())).rejects.toMatchObject({
      kind: "ExternalToolFailure",
    });
    expect(await fileExists(join(channelDir, "24_hour_10sps_iq.wav"))).toBe(false);
  });

  it("keeps a consolidated file that another run published during the merge", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const output = join(channelDir, "24_hour_10sps_iq.wav");
    const { run } = fakeRunner(async (call) => {
      if (call.cmd === "sh") await fs.writeFile(output, "from the other run");
      return fakeTools(call);
    });
    const pipeline = new ConsolidationPipeline(repo, config, { run });

    const result = await pipeline.consolidateChannel(await onlyChannel());
    expect(result).toMatchObject({ status: "exists", output });
    expect(await fs.readFile(output, "utf8")).toBe("from the other run");
    expect((await fs.readdir(channelDir)).filter((n) => n.startsWith("."))).toEqual([]);
  });

  it("publishes once when two runs consolidate the same channel", async () => {
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    const written: string[] = [];
    const { run } = fakeRunner(async (call) => {
      const rate = call.args.indexOf("rate");
      if (rate < 0) return fakeTools(call);
      const content = `merge ${written.length + 1}`;
      written.push(content);
      await fs.writeFile(call.args[rate - 1], content);
      return ok();
    });
    const pipeline = new ConsolidationPipeline(repo, config, { run });
    const channel = await onlyChannel();

    const results = await Promise.all([
      pipeline.consolidateChannel(channel),
      pipeline.consolidateChannel(channel),
    ]);
    expect(results.map((r) => r.status).sort()).toEqual(["created", "exists"]);
    expect(written).toContain(await fs.readFile(join(channelDir, "24_hour_10sps_iq.wav"), "utf8"));
    expect((await fs.readdir(channelDir)).filter((n) => n.startsWith("."))).toEqual([]);
  });

  it("continues with the next channel after a failure", async () => {
    const partialDir = join(config.archive.root, DATE, "S1", "RX1", "WWV_15");
    await writeMinutes(channelDir, DATE, "WWV_10", ALL_MINUTES);
    await writeMinutes(partialDir, DATE, "WWV_15", [0, 1]);
    const { run } = fakeRunner(fakeTools);
    const pipeline = new ConsolidationPipeline(repo, config, { run });

    const results = await pipeline.consolidateDate(DATE);
    expect(results.map((r) => [r.channel.relPath, r.status])).toEqual([
      ["S1/RX1/WWV_10", "created"],
      ["S1/RX1/WWV_15", "failed"],
    ]);
    expect(results[1]).toMatchObject({ kind: "IncompleteChannel" });
  });
});

describe("coverageProblem", () => {
  const file = (date: string, hour: number, minute: number) => ({
    date,
    hour,
    minute,
    channelToken: "T",
    extension: "flac",
    fileName: `${date}T${hour}${minute}`,
    path: "/x",
    isPlaceholder: false,
  });

  it("accepts exactly the 1440 minutes of the date", () => {
    const files = ALL_MINUTES.map((m) => file(DATE, Math.floor(m / 60), m % 60));
    expect(coverageProblem(DATE, files)).toBeNull();
  });

  it("notices a file from another date", () => {
    const files = ALL_MINUTES.map((m) => file(DATE, Math.floor(m / 60), m % 60));
    files[1439] = file("20240616", 23, 59);
    expect(coverageProblem(DATE, files)).toMatch(/belongs to 20240616/);
  });
});
