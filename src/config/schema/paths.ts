import { z } from "zod";

// Every entry is filled in by applyConfigDefaults before validation.
export const PathsSchema = z
  .object({
    baseDir: z.string(),
    errorArtifact: z.string(),
    stderrLog: z.string(),
    pidFile: z.string(),
    logFile: z.string(),
  })
  .strict();

export type PathsConfig = z.infer<typeof PathsSchema>;
