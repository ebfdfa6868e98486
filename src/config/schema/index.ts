import { z } from "zod";
import { LoggingSchema } from "./logging";
import { PathsSchema } from "./paths";
import { ReconcileSchema } from "./reconcile";
import { ServiceSchema } from "./service";
import { BreakerSchema, StartupSchema, SupervisorSchema } from "./supervisor";

export const WardenConfigSchema = z
  .object({
    $schema: z.string().optional(),
    service: ServiceSchema.default({}),
    supervisor: SupervisorSchema.default({}),
    breaker: BreakerSchema.default({}),
    startup: StartupSchema.default({}),
    paths: PathsSchema,
    reconcile: ReconcileSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict();

export type WardenConfig = z.infer<typeof WardenConfigSchema>;

export { DEFAULT_SERVICE_PORT, type ServiceConfig } from "./service";
export type { BreakerSettings, StartupSettings, SupervisorSettings } from "./supervisor";
export type { PathsConfig } from "./paths";
export type { ReconcileConfig } from "./reconcile";
