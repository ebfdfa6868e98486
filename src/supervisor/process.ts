import { spawn, type ChildProcess } from "node:child_process";
import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { Writable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import { LaunchError } from "./errors";
import type { StderrLog } from "./stderr-log";

export type ProcessStatus = "starting" | "running" | "exited";

export interface ExitResult {
  /** Null when the process was killed by a signal or its code is unobservable. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface ExitWaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProcessHandle {
  readonly id: string;
  readonly pid: number | undefined;
  readonly command: string;
  readonly status: ProcessStatus;
  /** Undefined until the process has exited. */
  readonly exitCode: number | null | undefined;
  readonly startedAtMs: number;
  /** Rejects with `ExitWaitTimeout` when `timeoutMs` elapses first. */
  waitForExit(options?: ExitWaitOptions): Promise<ExitResult>;
  kill(signal?: NodeJS.Signals): void;
}

export interface LaunchSpec {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface ProcessLauncher {
  launch(spec: LaunchSpec): Promise<ProcessHandle>;
}

export class ExitWaitTimeout extends Error {
  constructor(pid: number | undefined, timeoutMs: number) {
    super(`Process ${pid ?? "?"} still running after ${timeoutMs}ms`);
    this.name = "ExitWaitTimeout";
  }
}

export function describeCommand(spec: LaunchSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

/**
 * Races `exited` against an optional timeout and abort signal, clearing the
 * timer whichever way it settles.
 */
function awaitExit(
  exited: Promise<ExitResult>,
  pid: number | undefined,
  options: ExitWaitOptions,
): Promise<ExitResult> {
  const { timeoutMs, signal } = options;
  if (timeoutMs === undefined && !signal) {
    return exited;
  }
  return new Promise<ExitResult>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;
    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(signal?.reason);
    };
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new ExitWaitTimeout(pid, timeoutMs));
      }, timeoutMs);
    }
    exited.then(
      (result) => {
        cleanup();
        resolve(result);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

const STDIO_DRAIN_MS = 250;

export class ChildProcessHandle implements ProcessHandle {
  readonly id = randomUUID();
  readonly startedAtMs = Date.now();
  private currentStatus: ProcessStatus = "starting";
  private result: ExitResult | undefined;
  private readonly exited: Promise<ExitResult>;
  /** Last error the child emitted after spawning (a failed kill, for instance). */
  lastError: Error | undefined;

  constructor(
    private readonly child: ChildProcess,
    readonly command: string,
  ) {
    child.on("error", (error) => {
      this.lastError = error;
    });
    this.exited = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        const result: ExitResult = { exitCode: code, signal };
        this.currentStatus = "exited";
        this.result = result;
        // "close" waits for every holder of the stdio pipes, including
        // grandchildren; give the stderr tail a bounded moment to drain.
        const timer = setTimeout(() => resolve(result), STDIO_DRAIN_MS);
        child.once("close", () => {
          clearTimeout(timer);
          resolve(result);
        });
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get status(): ProcessStatus {
    return this.currentStatus;
  }

  get exitCode(): number | null | undefined {
    return this.result?.exitCode;
  }

  markRunning(): void {
    if (this.currentStatus === "starting") {
      this.currentStatus = "running";
    }
  }

  waitForExit(options: ExitWaitOptions = {}): Promise<ExitResult> {
    return awaitExit(this.exited, this.pid, options);
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.currentStatus !== "exited") {
      this.child.kill(signal);
    }
  }
}

export interface SpawnProcessOptions {
  /** Captures stderr; ignored for detached processes. */
  stderrLog?: StderrLog;
  /** Where captured stderr is echoed, usually `process.stderr`. */
  mirrorStderr?: Writable;
  /** Run in its own session with stdout/stderr appended to `logFile`. */
  detached?: { logFile: string };
}

/**
 * Spawns `spec` and resolves once the OS reports the process started.
 * Spawn failures (missing executable, bad cwd) reject with `LaunchError`.
 */
export function spawnProcess(
  spec: LaunchSpec,
  options: SpawnProcessOptions = {},
): Promise<ChildProcessHandle> {
  const command = describeCommand(spec);
  const env = { ...process.env, ...spec.env };

  let child: ChildProcess;
  let logFd: number | undefined;
  try {
    if (options.detached) {
      fs.mkdirSync(path.dirname(options.detached.logFile), { recursive: true });
      logFd = fs.openSync(options.detached.logFile, "a");
      child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env,
        detached: true,
        stdio: ["ignore", logFd, logFd],
      });
    } else {
      child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env,
        stdio: ["ignore", "inherit", options.stderrLog ? "pipe" : "inherit"],
      });
    }
  } catch (error) {
    if (logFd !== undefined) {
      fs.closeSync(logFd);
    }
    return Promise.reject(
      new LaunchError(`Failed to launch ${command}`, { command, cause: error }),
    );
  }

  const handle = new ChildProcessHandle(child, command);
  if (child.stderr && options.stderrLog) {
    options.stderrLog.attach(child.stderr, options.mirrorStderr);
  }

  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      if (logFd !== undefined) {
        fs.closeSync(logFd);
      }
      if (options.detached) {
        child.unref();
      }
      handle.markRunning();
      resolve(handle);
    };
    const onError = (error: Error) => {
      child.off("spawn", onSpawn);
      if (logFd !== undefined) {
        fs.closeSync(logFd);
      }
      reject(new LaunchError(`Failed to launch ${command}: ${error.message}`, { command, cause: error }));
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

export class ChildProcessLauncher implements ProcessLauncher {
  constructor(private readonly options: SpawnProcessOptions = {}) {}

  launch(spec: LaunchSpec): Promise<ProcessHandle> {
    return spawnProcess(spec, this.options);
  }
}

export function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks if the process exists without actually sending a signal
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

const ATTACHED_POLL_MS = 200;

/**
 * Handle for a process this supervisor did not spawn (found through the pid
 * file or the process table). Exit is detected by polling, so the exit code
 * is never known.
 */
export class AttachedProcessHandle implements ProcessHandle {
  readonly id: string;
  readonly startedAtMs = Date.now();
  private exitedResult: ExitResult | undefined;
  private exited: Promise<ExitResult> | undefined;

  constructor(
    readonly pid: number,
    readonly command: string,
    private readonly pollMs = ATTACHED_POLL_MS,
  ) {
    this.id = `pid:${pid}`;
  }

  get status(): ProcessStatus {
    if (this.exitedResult) {
      return "exited";
    }
    return isProcessRunning(this.pid) ? "running" : "exited";
  }

  get exitCode(): number | null | undefined {
    return this.status === "exited" ? null : undefined;
  }

  waitForExit(options: ExitWaitOptions = {}): Promise<ExitResult> {
    this.exited ??= this.poll();
    return awaitExit(this.exited, this.pid, options);
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (isProcessRunning(this.pid)) {
      process.kill(this.pid, signal);
    }
  }

  private async poll(): Promise<ExitResult> {
    while (isProcessRunning(this.pid)) {
      // unref'd so an abandoned wait never holds the event loop open
      await sleep(this.pollMs, undefined, { ref: false });
    }
    this.exitedResult = { exitCode: null, signal: null };
    return this.exitedResult;
  }
}
