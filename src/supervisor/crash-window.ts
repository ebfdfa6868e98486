/**
 * Sliding count of quick crashes. `windowStartMs` is the time of the first
 * crash counted in the current window.
 */
export interface CrashWindow {
  count: number;
  windowStartMs: number;
}

export const EMPTY_CRASH_WINDOW: Readonly<CrashWindow> = Object.freeze({
  count: 0,
  windowStartMs: 0,
});

export interface CrashSample {
  /** How long the process ran before exiting. */
  uptimeMs: number;
  /** When the exit was observed. */
  nowMs: number;
}

/**
 * Next window after an exit. A process that ran for at least `windowMs`
 * counts as healthy and clears the window; quicker exits either extend the
 * current window or open a fresh one once the old one has aged out.
 */
export function advanceCrashWindow(
  window: CrashWindow,
  sample: CrashSample,
  windowMs: number,
): CrashWindow {
  if (!isQuickCrash(sample.uptimeMs, windowMs)) {
    return { ...EMPTY_CRASH_WINDOW };
  }
  if (window.count === 0 || sample.nowMs - window.windowStartMs >= windowMs) {
    return { count: 1, windowStartMs: sample.nowMs };
  }
  return { count: window.count + 1, windowStartMs: window.windowStartMs };
}

/** An exit counts against the breaker only when uptime stayed under the window. */
export function isQuickCrash(uptimeMs: number, windowMs: number): boolean {
  return uptimeMs < windowMs;
}
