export {
  applyConfigDefaults,
  loadConfig,
  resolveConfigPath,
  type ConfigLoadResult,
} from "./loader";
export {
  DEFAULT_SERVICE_PORT,
  WardenConfigSchema,
  type BreakerSettings,
  type PathsConfig,
  type ReconcileConfig,
  type ServiceConfig,
  type StartupSettings,
  type SupervisorSettings,
  type WardenConfig,
} from "./schema";
