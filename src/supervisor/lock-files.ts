import fs from "node:fs";
import { promises as fsp } from "node:fs";
import { logger } from "../logger";

/**
 * Deletes leftover lock/lease files so a lock held by a killed process never
 * blocks the next launch. Missing files are fine; returns the paths removed.
 */
export async function clearStaleLocks(lockFiles: readonly string[]): Promise<string[]> {
  const removed: string[] = [];
  for (const lockFile of lockFiles) {
    if (!fs.existsSync(lockFile)) {
      continue;
    }
    await fsp.rm(lockFile, { force: true });
    removed.push(lockFile);
  }
  if (removed.length > 0) {
    logger.debug({ removed }, "Removed stale lock files");
  }
  return removed;
}
