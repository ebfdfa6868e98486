import type { LaunchSpec } from "../supervisor/process";

/**
 * Builds the command that starts `warden supervise` in the background by
 * re-running the current entry script with the same Node flags, which carry
 * the tsx loader when running from source.
 */
export function resolveSupervisorLaunchTarget(params: {
  execPath: string;
  execArgv: readonly string[];
  entryScript: string;
  configPath: string;
}): LaunchSpec {
  return {
    command: params.execPath,
    args: [...params.execArgv, params.entryScript, "supervise", "--config", params.configPath],
    env: { WARDEN_CONFIG: params.configPath, WARDEN_DETACHED: "true" },
  };
}
