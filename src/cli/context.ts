import pc from "picocolors";
import { loadConfig, type WardenConfig } from "../config";
import { configureLogger } from "../logger";
import { PidFile } from "../service/pid-file";
import { SupervisorLocator } from "../service/locator";
import { StartupErrorStore } from "../supervisor/artifact";

export interface CommandContext {
  config: WardenConfig;
  configPath: string;
  pidFile: PidFile;
  locator: SupervisorLocator;
  store: StartupErrorStore;
}

/** Loads configuration for a CLI command, printing errors and exiting on failure. */
export function loadCommandContext(configPath?: string): CommandContext {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    console.error(pc.red(`Error: failed to load configuration from ${result.path}`));
    for (const error of result.errors ?? []) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }
  const config = result.config;
  configureLogger(config.logging.level);
  const pidFile = new PidFile(config.paths.pidFile);
  return {
    config,
    configPath: result.path,
    pidFile,
    locator: new SupervisorLocator(pidFile),
    store: new StartupErrorStore(config.paths.errorArtifact),
  };
}
