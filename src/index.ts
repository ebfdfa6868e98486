export * from "./supervisor";
export * from "./jobs";
export * from "./service";
export { loadConfig, resolveConfigPath, type ConfigLoadResult, type WardenConfig } from "./config";
export { runSupervise, wireShutdownSignals, type SuperviseDeps, type SuperviseOptions } from "./boot/boot";
export { preflightServiceConfig } from "./boot/preflight";
export { configureLogger, logger, type Logger } from "./logger";
export { APP_VERSION } from "./version";
