import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import type { ArchiveRepository } from "./archive-repo.js";
import { errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { ArchiveDate } from "./minute-name.js";

export type DateRetention =
  | { date: ArchiveDate; action: "kept"; files: number }
  | { date: ArchiveDate; action: "purged" }
  | { date: ArchiveDate; action: "failed"; error: string };

export async function countRetainedFiles(dir: string): Promise<number> {
  let count = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      count += await countRetainedFiles(path.join(dir, entry.name));
    } else {
      count += 1;
    }
  }
  return count;
}

/**
 * Removes date trees that hold no files at all. Anything with even one file
 * is left alone, so this is safe to run on the date still being recorded.
 */
export async function purgeEmptyDates(
  repo: ArchiveRepository,
  { logger = new NullLogger() }: { logger?: Logger } = {},
): Promise<DateRetention[]> {
  const results: DateRetention[] = [];
  for (const date of await repo.listDates()) {
    const dir = repo.datePath(date);
    try {
      const files = await countRetainedFiles(dir);
      if (files > 0) {
        logger.debug("keeping date tree", { date, files });
        results.push({ date, action: "kept", files });
        continue;
      }
      await rm(dir, { recursive: true });
      logger.info("purged empty date tree", { date, path: dir });
      results.push({ date, action: "purged" });
    } catch (err) {
      logger.warn("retention failed for date", { date, error: errorMessage(err) });
      results.push({ date, action: "failed", error: errorMessage(err) });
    }
  }
  return results;
}
