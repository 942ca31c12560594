import type { DeviceConfig, WatchdogConfig } from "./config.js";
import type {
  GatewayCheck,
  HealthProbe,
  PowerController,
  PowerState,
} from "./device-control.js";
import { errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { wait } from "./util.js";

export type DeviceHealth = "OK" | "FAILED" | "CYCLING";

export interface ReceiverDevice extends DeviceConfig {
  state: DeviceHealth;
  lastProbeAt: number | null;
  lastCycledAt: number | null;
}

export type DeviceCycleOutcome =
  | { id: string; outcome: "ok" }
  | { id: string; outcome: "cooldown" }
  | {
      id: string;
      outcome: "power-cycled";
      error: string;
      powerErrors: string[];
    };

export interface CycleReport {
  startedAt: number;
  devices: DeviceCycleOutcome[];
}

export interface StopSignal {
  stopped: boolean;
}

/** Sleeps for `ms`, returning early once `stop.stopped` is set. */
export type WatchdogSleep = (ms: number, stop: StopSignal) => Promise<void>;

export const sliceSleep: WatchdogSleep = async (ms, stop) => {
  for (let elapsed = 0; elapsed < ms && !stop.stopped; elapsed += 250) {
    await wait(Math.min(250, ms - elapsed));
  }
};

export interface FleetWatchdogDeps {
  probe: HealthProbe;
  power: PowerController;
  gateway?: GatewayCheck;
  logger?: Logger;
  sleep?: WatchdogSleep;
  clock?: () => number;
}

type WatchdogTiming = Pick<
  WatchdogConfig,
  "settleMs" | "cycleIntervalMs" | "gatewayRetryMs" | "cooldownMs"
>;

export class FleetWatchdog {
  private readonly fleet: ReceiverDevice[];
  private readonly logger: Logger;
  private readonly sleep: WatchdogSleep;
  private readonly clock: () => number;
  private readonly stopSignal: StopSignal = { stopped: false };

  constructor(
    devices: readonly DeviceConfig[],
    private readonly timing: WatchdogTiming,
    private readonly deps: FleetWatchdogDeps,
  ) {
    this.fleet = devices.map((d): ReceiverDevice => ({
      ...d,
      state: "OK",
      lastProbeAt: null,
      lastCycledAt: null,
    }));
    this.logger = deps.logger ?? new NullLogger();
    this.sleep = deps.sleep ?? sliceSleep;
    this.clock = deps.clock ?? Date.now;
  }

  get stopped(): boolean {
    return this.stopSignal.stopped;
  }

  devices(): ReceiverDevice[] {
    return this.fleet.map((d) => ({ ...d }));
  }

  stop(): void {
    this.stopSignal.stopped = true;
  }

  /**
   * Blocks until the gateway answers. A dead local link would make every
   * receiver look down, so nothing is probed until it comes back.
   * Returns false if stopped while waiting.
   */
  async waitForGateway(): Promise<boolean> {
    const gateway = this.deps.gateway;
    if (!gateway) return !this.stopped;
    while (!this.stopped) {
      if (await gateway.reachable()) return true;
      this.logger.warn("gateway unreachable, assuming the local network is down", {
        gateway: gateway.target,
        kind: "NetworkUnreachable",
        retryMs: this.timing.gatewayRetryMs,
      });
      await this.sleep(this.timing.gatewayRetryMs, this.stopSignal);
    }
    return false;
  }

  /** One pass over the fleet in list order. */
  async runCycle(): Promise<CycleReport> {
    const startedAt = this.clock();
    const devices: DeviceCycleOutcome[] = [];
    for (const device of this.fleet) {
      if (this.inCooldown(device, startedAt)) {
        this.logger.debug("device in cooldown", { device: device.id });
        devices.push({ id: device.id, outcome: "cooldown" });
        continue;
      }
      device.lastProbeAt = this.clock();
      const result = await this.deps.probe.probe(device);
      if (result.ok) {
        if (device.state !== "OK") {
          this.logger.info("device is responding again", { device: device.id });
        }
        device.state = "OK";
        devices.push({ id: device.id, outcome: "ok" });
        continue;
      }
      device.state = "FAILED";
      this.logger.error("device failed health probe, power cycling", {
        device: device.id,
        address: device.address,
        kind: "DeviceHealthCheckFailure",
        error: result.error,
        settleMs: this.timing.settleMs,
      });
      const powerErrors = await this.powerCycle(device);
      devices.push({
        id: device.id,
        outcome: "power-cycled",
        error: result.error,
        powerErrors,
      });
    }
    return { startedAt, devices };
  }

  async run({ startupDelayMs = 0 }: { startupDelayMs?: number } = {}): Promise<void> {
    if (startupDelayMs > 0) {
      this.logger.info("watchdog will start after a delay", { startupDelayMs });
      await this.sleep(startupDelayMs, this.stopSignal);
    }
    this.logger.info("watchdog started", { devices: this.fleet.length });
    while (!this.stopped) {
      try {
        if (!(await this.waitForGateway())) break;
        const report = await this.runCycle();
        const cycled = report.devices.filter((d) => d.outcome === "power-cycled");
        this.logger.debug("cycle complete", {
          probed: report.devices.length,
          powerCycled: cycled.map((d) => d.id),
        });
      } catch (err) {
        this.logger.error("watchdog cycle error", { error: errorMessage(err) });
      }
      await this.sleep(this.timing.cycleIntervalMs, this.stopSignal);
    }
    this.logger.info("watchdog stopped");
  }

  private inCooldown(device: ReceiverDevice, now: number): boolean {
    return (
      this.timing.cooldownMs > 0 &&
      device.lastCycledAt != null &&
      now - device.lastCycledAt < this.timing.cooldownMs
    );
  }

  // Off, settle, on. The "on" is always sent, even after a failed "off" or a
  // stop request, so a receiver is never left switched off.
  private async powerCycle(device: ReceiverDevice): Promise<string[]> {
    device.state = "CYCLING";
    const errors: string[] = [];
    const send = async (state: PowerState) => {
      try {
        await this.deps.power.setPower(device, state);
      } catch (err) {
        errors.push(`${state}: ${errorMessage(err)}`);
        this.logger.error("power control failed", {
          device: device.id,
          state,
          error: errorMessage(err),
        });
      }
    };
    await send("off");
    await this.sleep(this.timing.settleMs, { stopped: false });
    await send("on");
    device.lastCycledAt = this.clock();
    this.logger.info("power cycled device", {
      device: device.id,
      powerChannel: device.powerChannel,
    });
    return errors;
  }
}
