import type { DeviceConfig } from "../config.js";
import type {
  GatewayCheck,
  HealthProbe,
  PowerController,
  PowerState,
  ProbeOutcome,
} from "../device-control.js";
import { MemoryLogger } from "../logger.js";
import { FleetWatchdog, type WatchdogSleep } from "../watchdog.js";

const devices: DeviceConfig[] = [
  { id: "kiwi1", address: "10.0.0.11", powerChannel: "1" },
  { id: "kiwi2", address: "10.0.0.12", powerChannel: "2" },
  { id: "kiwi3", address: "10.0.0.13", powerChannel: "3" },
];

const timing = {
  settleMs: 10_000,
  cycleIntervalMs: 60_000,
  gatewayRetryMs: 30_000,
  cooldownMs: 0,
};

function fakeProbe(down: Set<string>): HealthProbe & { probed: string[] } {
  const probed: string[] = [];
  return {
    probed,
    async probe(device): Promise<ProbeOutcome> {
      probed.push(device.id);
      return down.has(device.id)
        ? { ok: false, error: "connect ECONNREFUSED" }
        : { ok: true };
    },
  };
}

function fakePower(failOn?: PowerState): PowerController & { sent: string[] } {
  const sent: string[] = [];
  return {
    sent,
    async setPower(device, state) {
      sent.push(`${device.id}:${state}`);
      if (state === failOn) throw new Error("relay board not responding");
    },
  };
}

function recordingSleep(): { sleep: WatchdogSleep; slept: number[] } {
  const slept: number[] = [];
  return {
    slept,
    sleep: async (ms) => {
      slept.push(ms);
    },
  };
}

describe("FleetWatchdog", () => {
  it("power-cycles only the device that failed, once, off then on", async () => {
    const probe = fakeProbe(new Set(["kiwi2"]));
    const power = fakePower();
    const { sleep, slept } = recordingSleep();
    const logger = new MemoryLogger();
    const watchdog = new FleetWatchdog(devices, timing, { probe, power, sleep, logger });

    const report = await watchdog.runCycle();
    expect(report.devices).toEqual([
      { id: "kiwi1", outcome: "ok" },
      { id: "kiwi2", outcome: "power-cycled", error: "connect ECONNREFUSED", powerErrors: [] },
      { id: "kiwi3", outcome: "ok" },
    ]);
    expect(probe.probed).toEqual(["kiwi1", "kiwi2", "kiwi3"]);
    expect(power.sent).toEqual(["kiwi2:off", "kiwi2:on"]);
    expect(slept).toEqual([10_000]);
    expect(watchdog.devices().map((d) => d.state)).toEqual(["OK", "CYCLING", "OK"]);
    const failure = logger.entries.find((e) => e.level === "error");
    expect(failure?.meta).toMatchObject({ device: "kiwi2", kind: "DeviceHealthCheckFailure" });
  });

  it("still switches a device back on when switching it off failed", async () => {
    const probe = fakeProbe(new Set(["kiwi1"]));
    const power = fakePower("off");
    const { sleep } = recordingSleep();
    const watchdog = new FleetWatchdog(devices, timing, { probe, power, sleep });

    const report = await watchdog.runCycle();
    expect(power.sent).toEqual(["kiwi1:off", "kiwi1:on"]);
    expect(report.devices[0]).toEqual({
      id: "kiwi1",
      outcome: "power-cycled",
      error: "connect ECONNREFUSED",
      powerErrors: ["off: relay board not responding"],
    });
    expect(probe.probed).toEqual(["kiwi1", "kiwi2", "kiwi3"]);
  });

  it("waits for the gateway before probing anything", async () => {
    let attempts = 0;
    const gateway: GatewayCheck = {
      target: "10.0.0.1",
      reachable: async () => ++attempts > 2,
    };
    const probe = fakeProbe(new Set());
    const { sleep, slept } = recordingSleep();
    const logger = new MemoryLogger();
    const watchdog = new FleetWatchdog(devices, timing, {
      probe,
      power: fakePower(),
      gateway,
      sleep,
      logger,
    });

    expect(await watchdog.waitForGateway()).toBe(true);
    expect(attempts).toBe(3);
    expect(slept).toEqual([30_000, 30_000]);
    expect(probe.probed).toEqual([]);
    expect(
      logger.entries.filter((e) => e.meta?.kind === "NetworkUnreachable"),
    ).toHaveLength(2);
  });

  it("runs cycles after the startup delay until stopped", async () => {
    const probe = fakeProbe(new Set());
    const slept: number[] = [];
    let watchdog: FleetWatchdog | undefined;
    const sleep: WatchdogSleep = async (ms) => {
      slept.push(ms);
      if (slept.filter((s) => s === timing.cycleIntervalMs).length === 2) {
        watchdog?.stop();
      }
    };
    watchdog = new FleetWatchdog(devices, timing, { probe, power: fakePower(), sleep });

    await watchdog.run({ startupDelayMs: 5_000 });
    expect(slept).toEqual([5_000, 60_000, 60_000]);
    expect(probe.probed).toHaveLength(6);
    expect(watchdog.stopped).toBe(true);
  });

  it("does not probe a freshly cycled device during its cooldown", async () => {
    let now = 0;
    const probe = fakeProbe(new Set(["kiwi3"]));
    const power = fakePower();
    const watchdog = new FleetWatchdog(
      devices,
      { ...timing, cooldownMs: 120_000 },
      { probe, power, sleep: recordingSleep().sleep, clock: () => now },
    );

    await watchdog.runCycle();
    now = 60_000;
    const second = await watchdog.runCycle();
    expect(second.devices[2]).toEqual({ id: "kiwi3", outcome: "cooldown" });
    now = 200_000;
    await watchdog.runCycle();
    expect(power.sent).toEqual(["kiwi3:off", "kiwi3:on", "kiwi3:off", "kiwi3:on"]);
  });
});
