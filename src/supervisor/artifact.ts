import { promises as fsp } from "node:fs";
import { z } from "zod";
import { writeJsonAtomic } from "../utils/fs-atomic";

export const STARTUP_ERROR_KINDS = [
  "circuit_breaker_open",
  "config_invalid_json",
  "launch_failed",
] as const;
export type StartupErrorKind = (typeof STARTUP_ERROR_KINDS)[number];

export const StartupErrorArtifactSchema = z.object({
  error: z.enum(STARTUP_ERROR_KINDS),
  message: z.string(),
  exitCode: z.number().int().optional(),
  crashCount: z.number().int().nonnegative().optional(),
  stderr: z.string().optional(),
  timestamp: z.string(),
});

export type StartupErrorArtifact = z.infer<typeof StartupErrorArtifactSchema>;

export function createStartupErrorArtifact(
  error: StartupErrorKind,
  message: string,
  details: { exitCode?: number | null; crashCount?: number; stderr?: string } = {},
  now: Date = new Date(),
): StartupErrorArtifact {
  const artifact: StartupErrorArtifact = { error, message, timestamp: now.toISOString() };
  if (typeof details.exitCode === "number") {
    artifact.exitCode = details.exitCode;
  }
  if (details.crashCount !== undefined) {
    artifact.crashCount = details.crashCount;
  }
  if (details.stderr !== undefined) {
    artifact.stderr = details.stderr;
  }
  return artifact;
}

/**
 * Single-slot JSON file describing why the service could not start. The
 * supervisor is its only writer; status readers treat its presence as
 * "permanently failed".
 */
export class StartupErrorStore {
  constructor(readonly filePath: string) {}

  async write(artifact: StartupErrorArtifact): Promise<void> {
    await writeJsonAtomic(this.filePath, artifact);
  }

  /** Raw file content, or null when no failure has been recorded. */
  async readRaw(): Promise<string | null> {
    try {
      return await fsp.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  /** Parsed artifact; null when absent or not in the expected shape. */
  async read(): Promise<StartupErrorArtifact | null> {
    const raw = await this.readRaw();
    if (raw === null) {
      return null;
    }
    return parseStartupErrorArtifact(raw);
  }

  async clear(): Promise<void> {
    await fsp.rm(this.filePath, { force: true });
  }
}

export function parseStartupErrorArtifact(raw: string): StartupErrorArtifact | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = StartupErrorArtifactSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
