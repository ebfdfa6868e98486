import { logger as rootLogger } from "../logger";
import { PortWaitTimeout, waitForPort, type PortProbe } from "./port-probe";
import { ExitWaitTimeout, type ProcessHandle } from "./process";

export type StartupOutcome =
  | { kind: "reachable"; elapsedMs: number }
  | { kind: "exited"; exitCode: number | null; elapsedMs: number }
  | { kind: "timeout"; elapsedMs: number };

export interface StartupRaceOptions {
  host: string;
  port: number;
  /** Shared by both waits. */
  timeoutMs: number;
  probeIntervalMs?: number;
}

type Verdict = { kind: "reachable" } | { kind: "exited"; exitCode: number | null } | { kind: "timeout" };

class RaceAborted extends Error {
  constructor() {
    super("startup race settled");
    this.name = "RaceAborted";
  }
}

/**
 * Waits for a freshly launched (or re-attached) process to either accept TCP
 * connections or exit, whichever happens first, so a crash during boot is
 * reported immediately instead of after the full startup timeout.
 */
export class StartupRaceDetector {
  private readonly log = rootLogger.child({ component: "startup-race" });

  constructor(private readonly probe: PortProbe = waitForPort) {}

  async detect(handle: ProcessHandle, options: StartupRaceOptions): Promise<StartupOutcome> {
    const startedAt = Date.now();
    const controller = new AbortController();
    const { signal } = controller;

    this.log.debug(
      { pid: handle.pid, host: options.host, port: options.port, timeoutMs: options.timeoutMs },
      "Waiting for port or exit",
    );

    const reachable = this.probe({
      host: options.host,
      port: options.port,
      timeoutMs: options.timeoutMs,
      intervalMs: options.probeIntervalMs,
      signal,
    }).then(
      (): Verdict => ({ kind: "reachable" }),
      (error: unknown): Verdict => {
        if (error instanceof PortWaitTimeout) {
          return { kind: "timeout" };
        }
        throw error;
      },
    );

    const exited = handle.waitForExit({ timeoutMs: options.timeoutMs, signal }).then(
      (result): Verdict => ({ kind: "exited", exitCode: result.exitCode }),
      (error: unknown): Verdict => {
        if (error instanceof ExitWaitTimeout) {
          return { kind: "timeout" };
        }
        throw error;
      },
    );

    // The loser is abandoned: its late result or abort rejection is discarded.
    const losers = [reachable, exited].map((wait) =>
      wait.catch((error: unknown) => {
        if (!signal.aborted) {
          this.log.debug({ err: error }, "Abandoned startup wait failed");
        }
      }),
    );

    try {
      const verdict = await Promise.race([reachable, exited]);
      return { ...verdict, elapsedMs: Date.now() - startedAt };
    } finally {
      controller.abort(new RaceAborted());
      void Promise.all(losers);
    }
  }
}
