import { CronExpressionParser } from "cron-parser";
import { z } from "zod";

export const SESSION_TARGETS = ["main", "isolated"] as const;
export const WAKE_MODES = ["now", "next-heartbeat"] as const;

const OpaqueObjectSchema = z.record(z.unknown());

function checkCronExpression(
  schedule: { kind: string; expr?: string; tz?: string },
  ctx: z.RefinementCtx,
): void {
  if (schedule.kind !== "cron" || schedule.expr === undefined) {
    return;
  }
  try {
    CronExpressionParser.parse(schedule.expr, schedule.tz ? { tz: schedule.tz } : {});
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["expr"],
      message: `Invalid cron expression "${schedule.expr}": ${
        error instanceof Error ? error.message : String(error)
      }`,
    });
  }
}

// Declared jobs are hand-edited, so unknown keys are rejected to catch typos.
const DeclaredScheduleSchema = z
  .discriminatedUnion("kind", [
    z.object({ kind: z.literal("at"), atMs: z.number().int().nonnegative() }).strict(),
    z
      .object({
        kind: z.literal("every"),
        everyMs: z.number().int().positive(),
        anchorMs: z.number().int().nonnegative().optional(),
      })
      .strict(),
    z
      .object({ kind: z.literal("cron"), expr: z.string().min(1), tz: z.string().min(1).optional() })
      .strict(),
  ])
  .superRefine(checkCronExpression);

export const DeclaredJobSchema = z
  .object({
    name: z.string().min(1),
    agentId: z.string().min(1).optional(),
    enabled: z.boolean().optional(),
    schedule: DeclaredScheduleSchema,
    sessionTarget: z.enum(SESSION_TARGETS),
    wakeMode: z.enum(WAKE_MODES),
    payload: OpaqueObjectSchema,
    delivery: OpaqueObjectSchema.optional(),
  })
  .strict();

export const DeclaredJobListSchema = z.array(DeclaredJobSchema);

// Runtime jobs are written by the service itself, possibly by an older or
// newer release. Only the name is needed to match one; every other key is
// carried through untouched.
export const RuntimeJobSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
  })
  .passthrough();
