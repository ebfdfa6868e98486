import pc from "picocolors";
import { loadConfig } from "../../config";

export async function validateConfig(configPath?: string) {
  const result = loadConfig(configPath);
  if (result.success) {
    const source = result.fromFile ? result.path : `${result.path} (not found, defaults only)`;
    console.log(pc.green(`Config check passed: ${source}`));
    if (!result.config?.service.command) {
      console.log(pc.yellow("Warning: service.command is not set; `warden supervise` will refuse to start."));
    }
    return;
  }
  console.error(pc.red("Config check failed. Invalid config file:"));
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exit(1);
}
