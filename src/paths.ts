import fs from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { CLI_NAME } from "./constants.js";

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return join(os.homedir(), p.slice(2));
  return p;
}

function ensureDir(p: string): string {
  fs.mkdirSync(p, { recursive: true });
  return p;
}

export function getGrapeHome(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.GRAPE_HOME?.trim();
  if (explicit) {
    return ensureDir(expandHome(explicit));
  }

  const xdg = env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) {
    return ensureDir(join(expandHome(xdg), CLI_NAME));
  }

  return ensureDir(join(os.homedir(), ".local", "share", CLI_NAME));
}

/** `GRAPE_CONFIG`, when set; like `--config`, it names a file that must exist. */
export function explicitConfigPath(
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return env.GRAPE_CONFIG?.trim() || undefined;
}

export function getConfigPath(
  home = getGrapeHome(),
  env: NodeJS.ProcessEnv = process.env,
): string {
  const explicit = explicitConfigPath(env);
  return explicit ? expandHome(explicit) : join(home, "config.json");
}

export function getWatchdogLogDbPath(home = getGrapeHome()): string {
  return join(home, "watchdog.db");
}

export function getLivenessRecordPath(home = getGrapeHome()): string {
  return join(home, "watchdog.pid");
}
