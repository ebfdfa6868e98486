import fs from "node:fs";
import { promises as fsp } from "node:fs";
import path from "node:path";
import { logger } from "../logger";

export interface ManagedFileMapping {
  source: string;
  target: string;
}

/**
 * Copies version-controlled files (prompts, skills, the declared jobs file)
 * over their runtime copies. Missing sources are skipped with a warning.
 */
export async function seedManagedFiles(mappings: readonly ManagedFileMapping[]): Promise<string[]> {
  const seeded: string[] = [];
  for (const { source, target } of mappings) {
    if (!fs.existsSync(source)) {
      logger.warn({ source }, "Managed file source missing; skipping");
      continue;
    }
    await fsp.mkdir(path.dirname(target), { recursive: true });
    await fsp.cp(source, target, { recursive: true, force: true });
    seeded.push(target);
  }
  if (seeded.length > 0) {
    logger.info({ count: seeded.length }, "Seeded managed files");
  }
  return seeded;
}
