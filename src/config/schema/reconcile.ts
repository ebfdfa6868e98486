import { z } from "zod";

const ManagedFilesSchema = z
  .object({
    source: z.string().min(1),
    target: z.string().min(1),
  })
  .strict();

export const ReconcileSchema = z
  .object({
    declaredJobsFile: z.string().min(1).optional(),
    declaredJobsFallbacks: z.array(z.string().min(1)).default([]),
    runtimeJobsFile: z.string().min(1).optional(),
    defaultAgentId: z.string().min(1).default("main"),
    duplicateNames: z.enum(["reject", "last-wins"]).default("reject"),
    managedFiles: z.array(ManagedFilesSchema).default([]),
  })
  .strict();

export type ReconcileConfig = z.infer<typeof ReconcileSchema>;
