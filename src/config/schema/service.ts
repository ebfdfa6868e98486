import { z } from "zod";

export const DEFAULT_SERVICE_PORT = 18789;

export const ServiceSchema = z
  .object({
    command: z.string().min(1).optional(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().min(1).optional(),
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(1).max(65535).default(DEFAULT_SERVICE_PORT),
    // JSON config the service reads at boot; checked before the first launch.
    configFile: z.string().min(1).optional(),
  })
  .strict();

export type ServiceConfig = z.infer<typeof ServiceSchema>;
