import { setTimeout as sleep } from "node:timers/promises";
import { logger as rootLogger } from "../logger";
import { createStartupErrorArtifact, type StartupErrorStore } from "./artifact";
import type { CircuitBreaker } from "./circuit-breaker";
import { CircuitBreakerOpenError, LaunchError } from "./errors";
import { clearStaleLocks } from "./lock-files";
import {
  describeCommand,
  ExitWaitTimeout,
  type LaunchSpec,
  type ProcessHandle,
  type ProcessLauncher,
} from "./process";

export type SupervisorState =
  | "starting"
  | "running"
  | "exited_clean"
  | "exited_crash"
  | "stopped"
  | "breaker_open";

export interface SupervisorOutcome {
  state: "stopped";
  /** Launches after the first one. */
  restarts: number;
}

export interface SupervisorOptions {
  launch: LaunchSpec;
  /** When false, exit code 0 ends the loop instead of feeding the breaker. */
  restartOnCleanExit: boolean;
  shutdownTimeoutMs: number;
  lockFiles: readonly string[];
}

export interface SupervisorDeps {
  launcher: ProcessLauncher;
  breaker: CircuitBreaker;
  store: StartupErrorStore;
  now?: () => number;
  /** Restart backoff; must settle early once `signal` aborts. */
  delay?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export type StateListener = (state: SupervisorState, previous: SupervisorState) => void;

async function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
}

/**
 * Keeps exactly one instance of the service alive. Every exit goes through
 * the circuit breaker; the loop ends on shutdown or when the breaker opens.
 * All loop state lives on the instance so independent supervisors can
 * coexist in one process.
 */
export class ProcessSupervisor {
  private readonly controller = new AbortController();
  private readonly listeners = new Set<StateListener>();
  private readonly now: () => number;
  private readonly delay: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly log = rootLogger.child({ component: "supervisor" });
  private currentState: SupervisorState = "starting";
  private active: ProcessHandle | null = null;
  private termination: { handle: ProcessHandle; done: Promise<void> } | null = null;
  private running = false;

  constructor(
    private readonly options: SupervisorOptions,
    private readonly deps: SupervisorDeps,
  ) {
    this.now = deps.now ?? Date.now;
    this.delay = deps.delay ?? abortableDelay;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get activeProcess(): ProcessHandle | null {
    return this.active;
  }

  get shutdownRequested(): boolean {
    return this.controller.signal.aborted;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs the restart loop. Resolves once shutdown completes; rejects with
   * `LaunchError` when the service cannot be spawned and with
   * `CircuitBreakerOpenError` when crashes look persistent.
   */
  async run(signal?: AbortSignal): Promise<SupervisorOutcome> {
    if (this.running) {
      throw new Error("Supervisor is already running");
    }
    this.running = true;

    const onAbort = () => {
      this.shutdown().catch((err: unknown) => {
        this.log.error({ err }, "Shutdown after abort signal failed");
      });
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    let restarts = 0;
    try {
      await this.deps.store.clear();

      while (!this.shutdownRequested) {
        const handle = await this.launchOnce();
        if (this.shutdownRequested) {
          // shutdown() ran while we were spawning and saw no active child
          await this.terminate(handle);
          break;
        }

        const startedAt = this.now();
        const exit = await handle.waitForExit();
        const uptimeMs = this.now() - startedAt;
        this.active = null;

        if (this.shutdownRequested) {
          this.log.info({ exitCode: exit.exitCode }, "Service stopped for shutdown");
          break;
        }

        const clean = exit.exitCode === 0;
        this.transition(clean ? "exited_clean" : "exited_crash");
        this.log.warn(
          { exitCode: exit.exitCode, signal: exit.signal, uptimeMs },
          "Service exited",
        );

        if (clean && !this.options.restartOnCleanExit) {
          break;
        }

        const verdict = await this.deps.breaker.classify({ uptimeMs, exitCode: exit.exitCode });
        if (verdict.action === "open") {
          this.transition("breaker_open");
          throw new CircuitBreakerOpenError(verdict.artifact);
        }
        if (this.shutdownRequested) {
          break;
        }

        this.log.info({ delayMs: verdict.delayMs }, "Restarting service after delay");
        await this.delay(verdict.delayMs, this.controller.signal);
        if (!this.shutdownRequested) {
          restarts += 1;
        }
      }

      this.transition("stopped");
      return { state: "stopped", restarts };
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.active = null;
      this.termination = null;
      this.running = false;
    }
  }

  /**
   * Stops the loop and the active child. Idempotent and safe to call while
   * `run()` is in progress; once called no further restart happens.
   */
  async shutdown(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.log.info({ pid: this.active?.pid }, "Shutdown requested");
      this.controller.abort();
    }
    if (this.active) {
      await this.terminate(this.active);
    }
  }

  private async launchOnce(): Promise<ProcessHandle> {
    this.transition("starting");
    await clearStaleLocks(this.options.lockFiles);

    const spec = this.options.launch;
    let handle: ProcessHandle;
    try {
      handle = await this.deps.launcher.launch(spec);
    } catch (error) {
      const launchError =
        error instanceof LaunchError
          ? error
          : new LaunchError(`Failed to launch ${describeCommand(spec)}`, {
              command: describeCommand(spec),
              cause: error,
            });
      this.log.fatal({ err: launchError, command: launchError.command }, "Service launch failed");
      await this.deps.store.write(createStartupErrorArtifact("launch_failed", launchError.message));
      throw launchError;
    }

    this.active = handle;
    this.transition("running");
    this.log.info({ pid: handle.pid, command: handle.command }, "Service started");
    return handle;
  }

  /** Shared by concurrent callers so a child is signalled only once. */
  private terminate(handle: ProcessHandle): Promise<void> {
    if (this.termination?.handle === handle) {
      return this.termination.done;
    }
    const done = this.signalAndWait(handle);
    this.termination = { handle, done };
    return done;
  }

  private async signalAndWait(handle: ProcessHandle): Promise<void> {
    if (handle.status === "exited") {
      return;
    }
    const timeoutMs = this.options.shutdownTimeoutMs;
    handle.kill("SIGTERM");
    try {
      await handle.waitForExit({ timeoutMs });
    } catch (error) {
      if (!(error instanceof ExitWaitTimeout)) {
        throw error;
      }
      this.log.warn({ pid: handle.pid, timeoutMs }, "Service ignored SIGTERM; sending SIGKILL");
      handle.kill("SIGKILL");
      await handle.waitForExit({ timeoutMs });
    }
  }

  private transition(next: SupervisorState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    this.log.debug({ from: previous, to: next }, "Supervisor state change");
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
