export { DEFAULT_AGENT_ID, findDuplicateNames, reconcileJobs, summarizeReconcile } from "./reconcile";
export { DeclaredJobListSchema, DeclaredJobSchema, RuntimeJobSchema } from "./schema";
export {
  findDeclaredJobsFile,
  loadDeclaredJobs,
  loadRuntimeJobs,
  saveRuntimeJobs,
  serializeRuntimeJobs,
  type DeclaredJobsFile,
  type RuntimeFileShape,
  type RuntimeJobsFile,
} from "./store";
export { syncDeclaredJobs, type JobSyncOptions, type JobSyncResult } from "./sync";
export { seedManagedFiles, type ManagedFileMapping } from "./managed-files";
export type {
  DeclaredJob,
  DuplicateNamePolicy,
  ReconcileOptions,
  ReconcileSummary,
  RuntimeJob,
  Schedule,
  ScheduledJob,
  SessionTarget,
  WakeMode,
} from "./types";
