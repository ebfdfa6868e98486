import type { z } from "zod";
import type {
  DeclaredJobSchema,
  RuntimeJobSchema,
  SESSION_TARGETS,
  WAKE_MODES,
} from "./schema";

export type SessionTarget = (typeof SESSION_TARGETS)[number];
export type WakeMode = (typeof WAKE_MODES)[number];

/** Desired state, checked into version control. Has no id or bookkeeping. */
export type DeclaredJob = z.infer<typeof DeclaredJobSchema>;

export type Schedule = DeclaredJob["schedule"];

/**
 * Runtime copy owned by the service. `id` and `state` only ever come from
 * here; extra keys the service writes are carried along untouched.
 */
export type RuntimeJob = z.infer<typeof RuntimeJobSchema>;

/** A runtime job as first written for a newly declared name. */
export type ScheduledJob = {
  id: string;
  agentId: string;
  name: string;
  enabled: boolean;
  createdAtMs: number;
  updatedAtMs: number;
  schedule: Schedule;
  sessionTarget: SessionTarget;
  wakeMode: WakeMode;
  payload: Record<string, unknown>;
  delivery?: Record<string, unknown>;
  state: Record<string, unknown>;
};

export type DuplicateNamePolicy = "reject" | "last-wins";

export interface ReconcileOptions {
  /** Epoch milliseconds used for `updatedAtMs`/`createdAtMs`. */
  now?: number;
  generateId?: () => string;
  /** Owner for declared jobs that name none. */
  defaultAgentId?: string;
  duplicateNames?: DuplicateNamePolicy;
}

export interface ReconcileSummary {
  total: number;
  updated: number;
  added: number;
  kept: number;
}
