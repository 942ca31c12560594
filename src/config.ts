import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { errorCode, errorMessage } from "./errors.js";
import {
  expandHome,
  explicitConfigPath,
  getConfigPath,
  getGrapeHome,
} from "./paths.js";
import { deepFreeze } from "./util.js";

const pathString = z
  .string()
  .trim()
  .min(1)
  .transform((p) => path.resolve(expandHome(p)));

const extension = z
  .string()
  .regex(/^[A-Za-z0-9]+$/, "extension must be alphanumeric without a dot");

const command = z.array(z.string().min(1)).min(1);

const deviceSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  address: z.string().trim().min(1),
  powerChannel: z.union([z.string().min(1), z.number()]).transform(String),
});

const fileSchema = z.object({
  archive: z
    .object({
      root: pathString.optional(),
      silenceFile: pathString.optional(),
      minuteExtension: extension.default("flac"),
      outputExtension: extension.default("wav"),
      channelDepth: z.number().int().min(1).max(8).default(3),
    })
    .default({}),
  consolidate: z
    .object({
      scratchRoot: pathString.optional(),
      decoder: command.default(["flac"]),
      resampler: command.default(["sox"]),
      // the output file name says 10 sps
      targetRate: z.literal(10).default(10),
      niceness: z.number().int().min(0).max(19).default(19),
      openFileLimit: z.number().int().min(64).default(2048),
    })
    .default({}),
  upload: z
    .object({
      destination: z.string().trim().min(1).optional(),
      rsync: command.default(["rsync"]),
      extraArgs: z.array(z.string()).default(["-av"]),
    })
    .default({}),
  watchdog: z
    .object({
      gateway: z.string().trim().min(1).optional(),
      devices: z.array(deviceSchema).default([]),
      probePort: z.number().int().min(1).max(65535).default(8073),
      probePath: z.string().startsWith("/").default("/status"),
      probeTimeoutMs: z.number().int().positive().default(5000),
      settleMs: z.number().int().min(0).default(10_000),
      cycleIntervalMs: z.number().int().positive().default(60_000),
      gatewayRetryMs: z.number().int().positive().default(60_000),
      startupDelayMs: z.number().int().min(0).default(60_000),
      cooldownMs: z.number().int().min(0).default(0),
      powerCommand: command.default(["sain_control"]),
      pingCommand: command.default(["ping", "-c", "1", "-W", "2"]),
    })
    .default({}),
  service: z
    .object({
      name: z.string().regex(/^[A-Za-z0-9@._-]+$/).optional(),
      scope: z.enum(["user", "system"]).default("user"),
      unitDir: pathString.optional(),
    })
    .default({}),
});

type ParsedConfigFile = z.output<typeof fileSchema>;

export type DeviceConfig = z.output<typeof deviceSchema>;

export interface ArchiveConfig {
  root: string;
  silenceFile: string;
  minuteExtension: string;
  outputExtension: string;
  channelDepth: number;
}

export type ConsolidateConfig = Omit<
  ParsedConfigFile["consolidate"],
  "scratchRoot"
> & { scratchRoot: string };

export type UploadConfig = ParsedConfigFile["upload"];

export type WatchdogConfig = ParsedConfigFile["watchdog"];

export type ServiceConfig = ParsedConfigFile["service"];

export interface GrapeConfig {
  readonly home: string;
  readonly configPath: string;
  readonly archive: Readonly<ArchiveConfig>;
  readonly consolidate: Readonly<ConsolidateConfig>;
  readonly upload: Readonly<UploadConfig>;
  readonly watchdog: Readonly<WatchdogConfig>;
  readonly service: Readonly<ServiceConfig>;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface LoadConfigOptions {
  path?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string, required: boolean): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    if (!required && errorCode(err) === "ENOENT") {
      return {};
    }
    throw new ConfigError(
      `cannot read config ${configPath}: ${errorMessage(err)}`,
      configPath,
    );
  }
  if (!raw.trim()) return {};
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `config ${configPath} is not valid JSON: ${errorMessage(err)}`,
      configPath,
    );
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(
  input: unknown,
  { home, configPath, env = process.env }: {
    home: string;
    configPath: string;
    env?: NodeJS.ProcessEnv;
  },
): GrapeConfig {
  const parsed = fileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `invalid config ${configPath}: ${formatIssues(parsed.error)}`,
      configPath,
    );
  }
  const file = parsed.data;
  const envRoot = env.GRAPE_ARCHIVE_ROOT?.trim();
  const root = envRoot
    ? path.resolve(expandHome(envRoot))
    : (file.archive.root ?? path.join(home, "wav-archive.d"));

  return deepFreeze({
    home,
    configPath,
    archive: {
      ...file.archive,
      root,
      silenceFile:
        file.archive.silenceFile ??
        path.join(home, `silent_iq.${file.archive.minuteExtension}`),
    },
    consolidate: {
      ...file.consolidate,
      scratchRoot: file.consolidate.scratchRoot ?? path.join(home, "scratch"),
    },
    upload: file.upload,
    watchdog: file.watchdog,
    service: file.service,
  });
}

export function loadConfig(options: LoadConfigOptions = {}): GrapeConfig {
  const env = options.env ?? process.env;
  const home = options.home ?? getGrapeHome(env);
  const explicit = options.path ?? explicitConfigPath(env);
  const configPath = explicit
    ? path.resolve(expandHome(explicit))
    : getConfigPath(home, env);
  const input = readConfigFile(configPath, explicit != null);
  return parseConfig(input, { home, configPath, env });
}
