import pc from "picocolors";
import { ServiceController } from "../../service/controller";
import { resolveSupervisorLaunchTarget } from "../../service/launch-target";
import { ProcessExitError, StartupTimeoutError } from "../../supervisor/errors";
import { ChildProcessLauncher } from "../../supervisor/process";
import { StartupRaceDetector } from "../../supervisor/startup-race";
import { StderrLog } from "../../supervisor/stderr-log";
import { loadCommandContext } from "../context";

export async function ensureService(options: { config?: string } = {}) {
  const ctx = loadCommandContext(options.config);
  const { config } = ctx;
  const entryScript = process.argv[1];
  if (!entryScript) {
    console.error(pc.red("Error: cannot determine the warden entry script."));
    process.exit(1);
  }

  const controller = new ServiceController(
    {
      launch: resolveSupervisorLaunchTarget({
        execPath: process.execPath,
        execArgv: process.execArgv,
        entryScript,
        configPath: ctx.configPath,
      }),
      race: {
        host: config.service.host,
        port: config.service.port,
        timeoutMs: config.startup.timeoutMs,
        probeIntervalMs: config.startup.probeIntervalMs,
      },
      stderrTailLines: config.breaker.stderrTailLines,
    },
    {
      locator: ctx.locator,
      launcher: new ChildProcessLauncher({ detached: { logFile: config.paths.logFile } }),
      detector: new StartupRaceDetector(),
      store: ctx.store,
      serviceStderr: new StderrLog(config.paths.stderrLog),
      supervisorLog: new StderrLog(config.paths.logFile),
    },
  );

  try {
    const result = await controller.ensureService();
    const how = result.reattached ? "already running" : "started";
    console.log(
      `${pc.green("Service is up")} (${how}, PID: ${result.pid ?? "?"}) on ${config.service.host}:${config.service.port}`,
    );
    console.log(pc.dim(`Logs: ${config.paths.logFile}`));
  } catch (error) {
    if (error instanceof ProcessExitError || error instanceof StartupTimeoutError) {
      console.error(pc.red(`Error: ${error.message}`));
      if (error.stderr) {
        console.error(pc.dim(error.stderr));
      }
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
