import { randomUUID } from "node:crypto";
import { DuplicateJobNameError } from "../supervisor/errors";
import type {
  DeclaredJob,
  DuplicateNamePolicy,
  ReconcileOptions,
  ReconcileSummary,
  RuntimeJob,
  ScheduledJob,
} from "./types";

export const DEFAULT_AGENT_ID = "main";

export function findDuplicateNames(declared: readonly DeclaredJob[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const job of declared) {
    if (seen.has(job.name)) {
      duplicates.add(job.name);
    }
    seen.add(job.name);
  }
  return [...duplicates];
}

function indexByName(
  declared: readonly DeclaredJob[],
  policy: DuplicateNamePolicy,
): Map<string, DeclaredJob> {
  if (policy === "reject") {
    const duplicates = findDuplicateNames(declared);
    if (duplicates.length > 0) {
      throw new DuplicateJobNameError(duplicates);
    }
  }
  // later entries overwrite earlier ones under "last-wins"
  return new Map(declared.map((job) => [job.name, job]));
}

function mergeMatched(runtime: RuntimeJob, declared: DeclaredJob, now: number): RuntimeJob {
  const merged: RuntimeJob = {
    ...runtime,
    schedule: declared.schedule,
    sessionTarget: declared.sessionTarget,
    wakeMode: declared.wakeMode,
    payload: declared.payload,
    updatedAtMs: now,
  };
  // optional declared fields only override when set
  if (declared.agentId !== undefined) {
    merged.agentId = declared.agentId;
  }
  if (declared.enabled !== undefined) {
    merged.enabled = declared.enabled;
  }
  if (declared.delivery !== undefined) {
    merged.delivery = declared.delivery;
  }
  return merged;
}

function createFromDeclared(
  declared: DeclaredJob,
  id: string,
  now: number,
  defaultAgentId: string,
): ScheduledJob {
  const job: ScheduledJob = {
    id,
    agentId: declared.agentId ?? defaultAgentId,
    name: declared.name,
    enabled: declared.enabled ?? true,
    createdAtMs: now,
    updatedAtMs: now,
    schedule: declared.schedule,
    sessionTarget: declared.sessionTarget,
    wakeMode: declared.wakeMode,
    payload: declared.payload,
    state: {},
  };
  if (declared.delivery !== undefined) {
    job.delivery = declared.delivery;
  }
  return job;
}

/**
 * Merges declared jobs into the runtime list, joined by exact `name`.
 *
 * - matched: declared fields win; `id`, `createdAtMs`, `state` and any
 *   other runtime-only keys are kept, `updatedAtMs` is bumped;
 * - runtime only: emitted unchanged (never deleted);
 * - declared only: appended as a new job with a fresh id.
 *
 * Pure apart from the default clock and id generator, both overridable.
 */
export function reconcileJobs(
  declared: readonly DeclaredJob[],
  runtime: readonly RuntimeJob[],
  options: ReconcileOptions = {},
): RuntimeJob[] {
  const now = options.now ?? Date.now();
  const generateId = options.generateId ?? randomUUID;
  const defaultAgentId = options.defaultAgentId ?? DEFAULT_AGENT_ID;
  const declaredByName = indexByName(declared, options.duplicateNames ?? "reject");

  const merged: RuntimeJob[] = [];
  const consumed = new Set<string>();
  const usedIds = new Set(runtime.map((job) => job.id));

  for (const job of runtime) {
    const match = declaredByName.get(job.name);
    if (match) {
      merged.push(mergeMatched(job, match, now));
      consumed.add(job.name);
    } else {
      merged.push(job);
    }
  }

  for (const [name, job] of declaredByName) {
    if (consumed.has(name)) {
      continue;
    }
    let id = generateId();
    while (usedIds.has(id)) {
      id = generateId();
    }
    usedIds.add(id);
    merged.push(createFromDeclared(job, id, now, defaultAgentId));
  }

  return merged;
}

export function summarizeReconcile(
  runtime: readonly RuntimeJob[],
  merged: readonly RuntimeJob[],
  declared: readonly DeclaredJob[],
): ReconcileSummary {
  const declaredNames = new Set(declared.map((job) => job.name));
  const updated = runtime.filter((job) => declaredNames.has(job.name)).length;
  return {
    total: merged.length,
    updated,
    added: merged.length - runtime.length,
    kept: runtime.length - updated,
  };
}
