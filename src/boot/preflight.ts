import fs from "node:fs";
import { promises as fsp } from "node:fs";
import { logger } from "../logger";
import {
  createStartupErrorArtifact,
  type StartupErrorArtifact,
  type StartupErrorStore,
} from "../supervisor/artifact";

/**
 * Refuses to start the service on a config file that is not valid JSON;
 * the service would only crash-loop on it. Writes a `config_invalid_json`
 * artifact and returns it, or returns null when the file is fine or absent.
 */
export async function preflightServiceConfig(
  configFile: string | undefined,
  store: StartupErrorStore,
): Promise<StartupErrorArtifact | null> {
  if (!configFile || !fs.existsSync(configFile)) {
    return null;
  }
  const raw = await fsp.readFile(configFile, "utf-8");
  try {
    JSON.parse(raw);
    return null;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const artifact = createStartupErrorArtifact(
      "config_invalid_json",
      `Service config ${configFile} is not valid JSON: ${reason}`,
    );
    await store.write(artifact);
    logger.fatal({ configFile, reason }, "Service config is not valid JSON");
    return artifact;
  }
}
