import { promises as fsp } from "node:fs";
import path from "node:path";

export interface WriteFileAtomicOptions {
  mode?: number;
}

async function fsyncPath(targetPath: string): Promise<void> {
  const handle = await fsp.open(targetPath, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Replaces `filePath` with `raw` via a synced temp file and a rename, so
 * readers see either the old or the new content in full.
 */
export async function writeFileAtomic(
  filePath: string,
  raw: string,
  options: WriteFileAtomicOptions = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fsp.mkdir(dir, { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  await fsp.writeFile(tempPath, raw, { encoding: "utf-8", mode: options.mode ?? 0o644 });
  await fsyncPath(tempPath);

  try {
    await fsp.rename(tempPath, filePath);
  } catch (error) {
    await fsp.rm(tempPath, { force: true });
    throw error;
  }

  // Directory fsync is unsupported on some platforms; the rename already landed.
  await fsyncPath(dir).catch(() => undefined);
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}
