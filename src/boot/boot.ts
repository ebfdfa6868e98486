import type { EventEmitter } from "node:events";
import { loadConfig, type WardenConfig } from "../config";
import { configureLogger, logger as rootLogger } from "../logger";
import { seedManagedFiles } from "../jobs/managed-files";
import { syncDeclaredJobs } from "../jobs/sync";
import { PidFile } from "../service/pid-file";
import { StartupErrorStore } from "../supervisor/artifact";
import { CircuitBreaker } from "../supervisor/circuit-breaker";
import { CircuitBreakerOpenError, LaunchError } from "../supervisor/errors";
import { ChildProcessLauncher, type ProcessLauncher } from "../supervisor/process";
import { StderrLog } from "../supervisor/stderr-log";
import { ProcessSupervisor } from "../supervisor/supervisor";
import { preflightServiceConfig } from "./preflight";
import { registerProcessErrorHandlers } from "./process-error-handlers";

export interface SuperviseOptions {
  config?: string;
}

export interface SuperviseDeps {
  /** Replaces the real child-process launcher. */
  launcher?: ProcessLauncher;
  /** Where SIGTERM/SIGINT are listened for; `process` by default. */
  signals?: EventEmitter;
  pid?: number;
}

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT"] as const;

/**
 * Wires termination signals to `controller`. Only the first signal counts;
 * later ones are logged and ignored. Returns a function that unwires them.
 */
export function wireShutdownSignals(signals: EventEmitter, controller: AbortController): () => void {
  const log = rootLogger.child({ component: "boot" });
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      log.warn({ signal }, "Shutdown already in progress");
      return;
    }
    log.info({ signal }, "Received signal; shutting down");
    controller.abort();
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, onSignal);
  }
  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, onSignal);
    }
  };
}

async function prepareJobs(config: WardenConfig): Promise<void> {
  await seedManagedFiles(config.reconcile.managedFiles);
  await syncDeclaredJobs(config.reconcile);
}

/**
 * `warden supervise`: prepares runtime state, then keeps the service alive
 * until a signal arrives or the circuit breaker opens. Resolves with the
 * process exit code.
 */
export async function runSupervise(options: SuperviseOptions = {}, deps: SuperviseDeps = {}): Promise<number> {
  registerProcessErrorHandlers();
  const log = rootLogger.child({ component: "boot" });

  const result = loadConfig(options.config);
  if (!result.success || !result.config) {
    log.fatal({ path: result.path, errors: result.errors }, "Failed to load configuration");
    return 1;
  }
  const config = result.config;
  configureLogger(config.logging.level);

  const command = config.service.command;
  if (!command) {
    log.fatal({ path: result.path }, "service.command is not configured");
    return 1;
  }

  const pid = deps.pid ?? process.pid;
  const pidFile = new PidFile(config.paths.pidFile);
  try {
    pidFile.write(pid);
  } catch (error) {
    log.fatal({ err: error }, "Another supervisor owns the PID file");
    return 1;
  }

  const controller = new AbortController();
  const unwire = wireShutdownSignals(deps.signals ?? process, controller);
  try {
    await prepareJobs(config);

    const store = new StartupErrorStore(config.paths.errorArtifact);
    if (await preflightServiceConfig(config.service.configFile, store)) {
      return 1;
    }

    const stderrLog = new StderrLog(config.paths.stderrLog);
    await stderrLog.prepare();

    const breaker = new CircuitBreaker(
      {
        windowMs: config.breaker.windowMs,
        maxCrashesInWindow: config.breaker.maxCrashesInWindow,
        restartDelayMs: config.supervisor.restartDelayMs,
        stderrTailLines: config.breaker.stderrTailLines,
      },
      { store, stderrLog },
    );
    const supervisor = new ProcessSupervisor(
      {
        launch: {
          command,
          args: config.service.args,
          env: config.service.env,
          cwd: config.service.cwd,
        },
        restartOnCleanExit: config.supervisor.restartOnCleanExit,
        shutdownTimeoutMs: config.supervisor.shutdownTimeoutMs,
        lockFiles: config.supervisor.lockFiles,
      },
      {
        launcher: deps.launcher ?? new ChildProcessLauncher({ stderrLog, mirrorStderr: process.stderr }),
        breaker,
        store,
      },
    );

    log.info({ pid, config: result.path, command }, "Supervisor started");
    try {
      const outcome = await supervisor.run(controller.signal);
      log.info({ restarts: outcome.restarts }, "Supervisor stopped");
      return 0;
    } catch (error) {
      if (error instanceof CircuitBreakerOpenError) {
        log.fatal({ crashCount: error.artifact.crashCount }, error.message);
        return 1;
      }
      if (error instanceof LaunchError) {
        log.fatal({ err: error, command: error.command }, "Service could not be launched");
        return 1;
      }
      throw error;
    } finally {
      await stderrLog.flush();
    }
  } finally {
    unwire();
    pidFile.remove(pid);
  }
}
