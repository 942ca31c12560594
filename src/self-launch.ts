import fs from "node:fs";
import path from "node:path";

function resolveEntryPath(): string {
  const candidates: Array<string | undefined> = [
    process.env.GRAPE_ENTRY,
    process.argv[1],
  ];
  for (const candidate of candidates) {
    if (candidate && fs.existsSync(candidate)) {
      return path.resolve(candidate);
    }
  }
  return "";
}

/** How to start this CLI again: `node <entry>` or, failing that, the bare executable. */
export function resolveSelfLaunch(): { command: string; args: string[] } {
  const entry = resolveEntryPath();
  if (!entry || entry === process.execPath) {
    return { command: process.execPath, args: [] };
  }
  return { command: process.execPath, args: [entry] };
}
