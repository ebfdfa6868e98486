import { logger as rootLogger } from "../logger";
import type { StartupErrorStore } from "../supervisor/artifact";
import { ProcessExitError, StartupTimeoutError } from "../supervisor/errors";
import {
  AttachedProcessHandle,
  ExitWaitTimeout,
  type LaunchSpec,
  type ProcessHandle,
  type ProcessLauncher,
} from "../supervisor/process";
import type { StartupOutcome, StartupRaceDetector, StartupRaceOptions } from "../supervisor/startup-race";
import type { StderrLog } from "../supervisor/stderr-log";
import type { LocatedSupervisor } from "./locator";

export interface ServiceControllerOptions {
  launch: LaunchSpec;
  race: StartupRaceOptions;
  stderrTailLines: number;
  /** How long a re-attached process gets to die after SIGKILL. */
  killTimeoutMs?: number;
}

export interface ServiceControllerDeps {
  locator: { locate(): Promise<LocatedSupervisor | null> };
  launcher: ProcessLauncher;
  detector: StartupRaceDetector;
  store: StartupErrorStore;
  /** Captured stderr of the supervised service. */
  serviceStderr: StderrLog;
  /** Output of the detached supervisor itself. */
  supervisorLog?: StderrLog;
  attach?: (located: LocatedSupervisor) => ProcessHandle;
}

export interface EnsureResult {
  pid: number | undefined;
  reattached: boolean;
  elapsedMs: number;
}

const DEFAULT_KILL_TIMEOUT_MS = 5_000;
const STARTUP_LOG_TAIL_LINES = 20;

/**
 * Makes sure a supervisor is running and its service is reachable, reusing
 * one that is already up when possible.
 */
export class ServiceController {
  private readonly log = rootLogger.child({ component: "service-controller" });

  constructor(
    private readonly options: ServiceControllerOptions,
    private readonly deps: ServiceControllerDeps,
  ) {}

  async ensureService(): Promise<EnsureResult> {
    const located = await this.deps.locator.locate();
    if (located) {
      const attach =
        this.deps.attach ?? ((found: LocatedSupervisor) => new AttachedProcessHandle(found.pid, found.command ?? "warden supervise"));
      const handle = attach(located);
      this.log.info({ pid: located.pid, source: located.source }, "Re-attaching to running supervisor");

      const outcome = await this.deps.detector.detect(handle, this.options.race);
      if (outcome.kind === "reachable") {
        return { pid: handle.pid, reattached: true, elapsedMs: outcome.elapsedMs };
      }
      if (outcome.kind === "exited") {
        throw await this.exitError(outcome);
      }
      this.log.warn(
        { pid: located.pid, timeoutMs: this.options.race.timeoutMs },
        "Running supervisor never became reachable; replacing it",
      );
      await this.forceKill(handle);
    }

    const handle = await this.deps.launcher.launch(this.options.launch);
    this.log.info({ pid: handle.pid, command: handle.command }, "Launched supervisor");

    const outcome = await this.deps.detector.detect(handle, this.options.race);
    if (outcome.kind === "reachable") {
      await this.logStartupTail();
      return { pid: handle.pid, reattached: false, elapsedMs: outcome.elapsedMs };
    }
    if (outcome.kind === "exited") {
      throw await this.exitError(outcome);
    }
    const stderr = await this.deps.serviceStderr.tail(this.options.stderrTailLines);
    throw new StartupTimeoutError(
      `Service did not become reachable on ${this.options.race.host}:${this.options.race.port} within ${this.options.race.timeoutMs}ms`,
      { timeoutMs: this.options.race.timeoutMs, stderr },
    );
  }

  private async exitError(outcome: Extract<StartupOutcome, { kind: "exited" }>): Promise<ProcessExitError> {
    const artifact = (await this.deps.store.read()) ?? undefined;
    const stderr = await this.deps.serviceStderr.tail(this.options.stderrTailLines);
    const message = artifact
      ? `Supervisor exited during startup: ${artifact.message}`
      : `Supervisor exited during startup with code ${outcome.exitCode ?? "unknown"}`;
    return new ProcessExitError(message, { exitCode: outcome.exitCode, artifact, stderr });
  }

  private async forceKill(handle: ProcessHandle): Promise<void> {
    handle.kill("SIGKILL");
    const timeoutMs = this.options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;
    try {
      await handle.waitForExit({ timeoutMs });
    } catch (error) {
      if (!(error instanceof ExitWaitTimeout)) {
        throw error;
      }
      this.log.warn({ pid: handle.pid, timeoutMs }, "Supervisor still alive after SIGKILL");
    }
  }

  private async logStartupTail(): Promise<void> {
    if (!this.deps.supervisorLog) {
      return;
    }
    const tail = await this.deps.supervisorLog.tail(STARTUP_LOG_TAIL_LINES);
    if (tail) {
      this.log.debug({ tail }, "Startup log");
    }
  }
}
