import fs from "node:fs";
import { promises as fsp } from "node:fs";
import type { z } from "zod";
import { logger } from "../logger";
import { isMissingFileError } from "../supervisor/artifact";
import { DuplicateJobNameError, MalformedStateError } from "../supervisor/errors";
import { writeJsonAtomic } from "../utils/fs-atomic";
import { findDuplicateNames } from "./reconcile";
import { DeclaredJobListSchema, RuntimeJobSchema } from "./schema";
import type { DeclaredJob, DuplicateNamePolicy, RuntimeJob } from "./types";

export interface DeclaredJobsFile {
  path: string;
  jobs: DeclaredJob[];
}

/** How the runtime file was laid out on disk, so it can be written back alike. */
export type RuntimeFileShape =
  | { kind: "array" }
  | { kind: "object"; extra: Record<string, unknown> };

export interface RuntimeJobsFile {
  path: string;
  jobs: RuntimeJob[];
  /** Entries without a usable name; written back verbatim after `jobs`. */
  unrecognized: unknown[];
  shape: RuntimeFileShape;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new MalformedStateError(`Invalid JSON in ${filePath}`, { filePath, cause: error });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function findDeclaredJobsFile(candidates: readonly string[]): string | null {
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

/**
 * Reads the first declared jobs file that exists among `candidates`.
 * Returns null when none does; throws `MalformedStateError` when the file
 * is not a valid list of declared jobs.
 */
export async function loadDeclaredJobs(
  candidates: readonly string[],
  duplicateNames: DuplicateNamePolicy = "reject",
): Promise<DeclaredJobsFile | null> {
  const filePath = findDeclaredJobsFile(candidates);
  if (!filePath) {
    return null;
  }
  const raw = await fsp.readFile(filePath, "utf-8");
  const parsed = DeclaredJobListSchema.safeParse(parseJson(raw, filePath));
  if (!parsed.success) {
    throw new MalformedStateError(
      `Invalid declared jobs in ${filePath}: ${formatIssues(parsed.error)}`,
      { filePath, cause: parsed.error },
    );
  }
  if (duplicateNames === "reject") {
    const duplicates = findDuplicateNames(parsed.data);
    if (duplicates.length > 0) {
      throw new DuplicateJobNameError(duplicates, { filePath });
    }
  }
  return { path: filePath, jobs: parsed.data };
}

function splitEntries(entries: unknown[]): { jobs: RuntimeJob[]; unrecognized: unknown[] } {
  const jobs: RuntimeJob[] = [];
  const unrecognized: unknown[] = [];
  for (const entry of entries) {
    const parsed = RuntimeJobSchema.safeParse(entry);
    if (parsed.success) {
      jobs.push(parsed.data);
    } else {
      unrecognized.push(entry);
    }
  }
  return { jobs, unrecognized };
}

function emptyRuntimeFile(filePath: string): RuntimeJobsFile {
  return { path: filePath, jobs: [], unrecognized: [], shape: { kind: "array" } };
}

/**
 * Reads the runtime jobs file: a bare array, or an object with a `jobs`
 * array. A missing file is an empty list; an unreadable one is logged and
 * also treated as empty.
 */
export async function loadRuntimeJobs(filePath: string): Promise<RuntimeJobsFile> {
  let raw: string;
  try {
    raw = await fsp.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return emptyRuntimeFile(filePath);
    }
    throw error;
  }

  try {
    const value = parseJson(raw, filePath);
    if (Array.isArray(value)) {
      return { path: filePath, ...splitEntries(value), shape: { kind: "array" } };
    }
    const entries: unknown = isRecord(value) ? value.jobs : undefined;
    if (isRecord(value) && Array.isArray(entries)) {
      const { jobs: _jobs, ...extra } = value;
      return {
        path: filePath,
        ...splitEntries(entries),
        shape: { kind: "object", extra },
      };
    }
    throw new MalformedStateError(`Runtime jobs in ${filePath} are neither a list nor { jobs: [] }`, {
      filePath,
    });
  } catch (error) {
    if (!(error instanceof MalformedStateError)) {
      throw error;
    }
    logger.warn({ err: error, filePath }, "Runtime jobs file is malformed; treating it as empty");
    return emptyRuntimeFile(filePath);
  }
}

export function serializeRuntimeJobs(file: RuntimeJobsFile, jobs: readonly RuntimeJob[]): unknown {
  const entries: unknown[] = [...jobs, ...file.unrecognized];
  if (file.shape.kind === "object") {
    return { ...file.shape.extra, jobs: entries };
  }
  return entries;
}

export async function saveRuntimeJobs(
  file: RuntimeJobsFile,
  jobs: readonly RuntimeJob[],
): Promise<void> {
  await writeJsonAtomic(file.path, serializeRuntimeJobs(file, jobs));
}
