import type { DeviceConfig, WatchdogConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { assertToolOk, runTool, type ToolRunner } from "./tools.js";

export type ProbeOutcome = { ok: true } | { ok: false; error: string };

export interface HealthProbe {
  probe(device: DeviceConfig): Promise<ProbeOutcome>;
}

export type PowerState = "on" | "off";

export interface PowerController {
  setPower(device: DeviceConfig, state: PowerState): Promise<void>;
}

export interface GatewayCheck {
  readonly target: string;
  reachable(): Promise<boolean>;
}

type FetchLike = (
  url: string,
  init: { signal: AbortSignal },
) => Promise<{ status: number; arrayBuffer(): Promise<ArrayBuffer> }>;

/**
 * GET http://<address>:<port><path> with a hard timeout. Any HTTP answer
 * means the receiver's web server is up; only a timeout or a connection
 * error counts as a failure.
 */
export class HttpHealthProbe implements HealthProbe {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly opts: Pick<
      WatchdogConfig,
      "probePort" | "probePath" | "probeTimeoutMs"
    >,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  url(device: DeviceConfig): string {
    const host = device.address.includes(":")
      ? device.address
      : `${device.address}:${this.opts.probePort}`;
    return `http://${host}${this.opts.probePath}`;
  }

  async probe(device: DeviceConfig): Promise<ProbeOutcome> {
    try {
      const res = await this.fetchImpl(this.url(device), {
        signal: AbortSignal.timeout(this.opts.probeTimeoutMs),
      });
      await res.arrayBuffer();
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }
}

/** Runs `<powerCommand…> <powerChannel> on|off`. */
export class CommandPowerController implements PowerController {
  constructor(
    private readonly command: readonly string[],
    private readonly run: ToolRunner = runTool,
    private readonly logger?: Logger,
  ) {}

  async setPower(device: DeviceConfig, state: PowerState): Promise<void> {
    const [cmd, ...prefix] = this.command;
    const result = await this.run(cmd, [...prefix, device.powerChannel, state], {
      logger: this.logger,
    });
    assertToolOk(result, cmd, { device: device.id, state });
  }
}

export class PingGatewayCheck implements GatewayCheck {
  constructor(
    readonly target: string,
    private readonly command: readonly string[],
    private readonly run: ToolRunner = runTool,
  ) {}

  async reachable(): Promise<boolean> {
    const [cmd, ...prefix] = this.command;
    const result = await this.run(cmd, [...prefix, this.target]);
    return result.ok;
  }
}
