import { logger as rootLogger } from "../logger";
import {
  createStartupErrorArtifact,
  type StartupErrorArtifact,
  type StartupErrorStore,
} from "./artifact";
import { advanceCrashWindow, EMPTY_CRASH_WINDOW, isQuickCrash, type CrashWindow } from "./crash-window";
import type { StderrLog } from "./stderr-log";

export interface CircuitBreakerOptions {
  windowMs: number;
  maxCrashesInWindow: number;
  restartDelayMs: number;
  stderrTailLines: number;
}

export const DEFAULT_CIRCUIT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  windowMs: 30_000,
  maxCrashesInWindow: 3,
  restartDelayMs: 5_000,
  stderrTailLines: 50,
};

export interface ExitSample {
  uptimeMs: number;
  exitCode: number | null;
}

export type BreakerVerdict =
  | { action: "restart"; delayMs: number; window: CrashWindow }
  | { action: "open"; artifact: StartupErrorArtifact; window: CrashWindow };

export interface CircuitBreakerDeps {
  store: StartupErrorStore;
  stderrLog?: StderrLog;
  now?: () => number;
}

const NO_STDERR = "(no stderr captured)";

/**
 * Classifies exits by uptime: a crash after a healthy run is forgiven, while
 * `maxCrashesInWindow` quick crashes inside `windowMs` open the breaker for
 * good and leave an error artifact behind.
 */
export class CircuitBreaker {
  private window: CrashWindow = { ...EMPTY_CRASH_WINDOW };
  private openedWith: StartupErrorArtifact | null = null;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;
  private readonly log = rootLogger.child({ component: "circuit-breaker" });

  constructor(
    options: Partial<CircuitBreakerOptions>,
    private readonly deps: CircuitBreakerDeps,
  ) {
    this.options = { ...DEFAULT_CIRCUIT_BREAKER_OPTIONS, ...options };
    this.now = deps.now ?? Date.now;
  }

  get crashWindow(): CrashWindow {
    return { ...this.window };
  }

  get isOpen(): boolean {
    return this.openedWith !== null;
  }

  async classify(sample: ExitSample): Promise<BreakerVerdict> {
    if (this.openedWith) {
      return { action: "open", artifact: this.openedWith, window: this.crashWindow };
    }

    const { windowMs, maxCrashesInWindow, restartDelayMs } = this.options;
    const nowMs = this.now();
    this.window = advanceCrashWindow(this.window, { uptimeMs: sample.uptimeMs, nowMs }, windowMs);

    if (!isQuickCrash(sample.uptimeMs, windowMs)) {
      this.log.info(
        { uptimeMs: sample.uptimeMs, exitCode: sample.exitCode },
        "Exit after healthy uptime; crash window reset",
      );
      return { action: "restart", delayMs: restartDelayMs, window: this.crashWindow };
    }

    this.log.warn(
      {
        uptimeMs: sample.uptimeMs,
        exitCode: sample.exitCode,
        crashCount: this.window.count,
        maxCrashesInWindow,
        windowElapsedMs: nowMs - this.window.windowStartMs,
      },
      "Quick crash detected",
    );

    if (this.window.count < maxCrashesInWindow) {
      return { action: "restart", delayMs: restartDelayMs, window: this.crashWindow };
    }

    const artifact = await this.open(sample);
    return { action: "open", artifact, window: this.crashWindow };
  }

  private async open(sample: ExitSample): Promise<StartupErrorArtifact> {
    const { windowMs, stderrTailLines } = this.options;
    const windowSec = Math.round(windowMs / 1000);
    const stderr = await this.readStderrTail(stderrTailLines);
    const artifact = createStartupErrorArtifact(
      "circuit_breaker_open",
      `Service crashed ${this.window.count} times within ${windowSec}s. Likely a configuration error.`,
      { exitCode: sample.exitCode, crashCount: this.window.count, stderr },
      new Date(this.now()),
    );
    this.openedWith = artifact;

    this.log.error(
      { crashCount: this.window.count, windowMs, artifact: this.deps.store.filePath },
      "Circuit breaker open; restarts halted",
    );
    await this.deps.store.write(artifact);
    return artifact;
  }

  private async readStderrTail(lines: number): Promise<string> {
    if (!this.deps.stderrLog) {
      return NO_STDERR;
    }
    try {
      const tail = await this.deps.stderrLog.tail(lines);
      return tail || NO_STDERR;
    } catch (err) {
      this.log.warn({ err }, "Could not read stderr log for error artifact");
      return "(stderr unavailable)";
    }
  }
}
