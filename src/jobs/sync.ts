import path from "node:path";
import { logger as rootLogger } from "../logger";
import type { ReconcileConfig } from "../config/schema";
import { MalformedStateError } from "../supervisor/errors";
import { reconcileJobs, summarizeReconcile } from "./reconcile";
import { loadDeclaredJobs, loadRuntimeJobs, saveRuntimeJobs, type DeclaredJobsFile } from "./store";
import type { ReconcileSummary } from "./types";

export type JobSyncResult =
  | { status: "skipped"; reason: "no_declared_file" | "no_runtime_file" }
  | { status: "malformed"; error: MalformedStateError }
  | {
      status: "reconciled";
      declaredPath: string;
      runtimePath: string;
      summary: ReconcileSummary;
    };

export interface JobSyncOptions {
  now?: number;
  generateId?: () => string;
}

/**
 * Reconciles the declared jobs file into the runtime jobs file on disk.
 * A malformed declared file leaves the runtime file untouched and is
 * reported, never thrown.
 */
export async function syncDeclaredJobs(
  config: ReconcileConfig,
  options: JobSyncOptions = {},
): Promise<JobSyncResult> {
  const log = rootLogger.child({ component: "reconcile" });
  if (!config.runtimeJobsFile) {
    return { status: "skipped", reason: "no_runtime_file" };
  }
  const candidates = [config.declaredJobsFile, ...config.declaredJobsFallbacks].filter(
    (candidate): candidate is string => typeof candidate === "string",
  );

  let declared: DeclaredJobsFile | null;
  try {
    declared = await loadDeclaredJobs(candidates, config.duplicateNames);
  } catch (error) {
    if (error instanceof MalformedStateError) {
      log.error({ err: error, filePath: error.filePath }, "Declared jobs file is malformed; skipping reconciliation");
      return { status: "malformed", error };
    }
    throw error;
  }
  if (!declared) {
    log.info({ candidates }, "No declared jobs file found; skipping reconciliation");
    return { status: "skipped", reason: "no_declared_file" };
  }

  const runtime = await loadRuntimeJobs(config.runtimeJobsFile);

  if (runtime.unrecognized.length > 0) {
    log.warn(
      { count: runtime.unrecognized.length, filePath: runtime.path },
      "Runtime jobs without a name are kept as they are",
    );
  }

  const merged = reconcileJobs(declared.jobs, runtime.jobs, {
    now: options.now,
    generateId: options.generateId,
    defaultAgentId: config.defaultAgentId,
    duplicateNames: config.duplicateNames,
  });
  await saveRuntimeJobs(runtime, merged);

  const summary = summarizeReconcile(runtime.jobs, merged, declared.jobs);
  log.info(
    {
      ...summary,
      unrecognized: runtime.unrecognized.length,
      declared: path.relative(process.cwd(), declared.path) || declared.path,
    },
    "Reconciled declared jobs",
  );
  return {
    status: "reconciled",
    declaredPath: declared.path,
    runtimePath: runtime.path,
    summary,
  };
}
