import { z } from "zod";

export const SupervisorSchema = z
  .object({
    restartDelayMs: z.number().int().nonnegative().default(5_000),
    shutdownTimeoutMs: z.number().int().positive().default(10_000),
    restartOnCleanExit: z.boolean().default(true),
    lockFiles: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const BreakerSchema = z
  .object({
    windowMs: z.number().int().positive().default(30_000),
    maxCrashesInWindow: z.number().int().positive().default(3),
    stderrTailLines: z.number().int().positive().default(50),
  })
  .strict();

export const StartupSchema = z
  .object({
    timeoutMs: z.number().int().positive().default(180_000),
    probeIntervalMs: z.number().int().positive().default(500),
  })
  .strict();

export type SupervisorSettings = z.infer<typeof SupervisorSchema>;
export type BreakerSettings = z.infer<typeof BreakerSchema>;
export type StartupSettings = z.infer<typeof StartupSchema>;
