import type { ArchiveConfig, UploadConfig } from "./config.js";
import { ArchiveError } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { consolidatedFileName } from "./minute-name.js";
import { runTool, type ToolResult, type ToolRunner } from "./tools.js";

export function ensureTrailingSlash(root: string): string {
  return root.endsWith("/") ? root : root + "/";
}

/** rsync arguments that carry only the consolidated files, keeping the date tree layout. */
export function uploadArgs(
  archive: Readonly<ArchiveConfig>,
  upload: Readonly<UploadConfig>,
  destination: string,
): string[] {
  return [
    ...upload.extraArgs,
    "--prune-empty-dirs",
    "--include=*/",
    `--include=${consolidatedFileName(archive.outputExtension)}`,
    "--exclude=*",
    ensureTrailingSlash(archive.root),
    ensureTrailingSlash(destination),
  ];
}

/**
 * Push every consolidated file to the remote archive. A failed transfer is
 * logged and returned; the next run simply tries again.
 */
export async function uploadConsolidated(
  config: { archive: Readonly<ArchiveConfig>; upload: Readonly<UploadConfig> },
  {
    logger = new NullLogger(),
    run = runTool,
  }: { logger?: Logger; run?: ToolRunner } = {},
): Promise<ToolResult> {
  const destination = config.upload.destination;
  if (!destination) {
    throw new ArchiveError(
      "ArchiveUnavailable",
      "no upload destination configured (upload.destination)",
    );
  }
  const [cmd, ...prefix] = config.upload.rsync;
  const args = [...prefix, ...uploadArgs(config.archive, config.upload, destination)];
  const t0 = Date.now();
  const result = await run(cmd, args, { logger });
  if (result.ok) {
    logger.info("uploaded consolidated files", {
      destination,
      elapsedMs: Date.now() - t0,
    });
  } else {
    logger.error("upload failed", {
      destination,
      code: result.code,
      stderr: result.stderr.trim().slice(-400),
    });
  }
  return result;
}
