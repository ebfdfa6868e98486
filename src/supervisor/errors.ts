import type { StartupErrorArtifact } from "./artifact";

export type SupervisorErrorCode =
  | "LAUNCH_FAILED"
  | "STARTUP_TIMEOUT"
  | "PROCESS_EXITED"
  | "CIRCUIT_BREAKER_OPEN"
  | "MALFORMED_STATE"
  | "DUPLICATE_JOB_NAME";

export abstract class SupervisorError extends Error {
  abstract readonly code: SupervisorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The executable or its environment is broken. Never retried.
 */
export class LaunchError extends SupervisorError {
  readonly code = "LAUNCH_FAILED";
  readonly command: string;

  constructor(message: string, options: { command: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.command = options.command;
  }
}

/**
 * The process neither became reachable nor exited within the startup budget.
 */
export class StartupTimeoutError extends SupervisorError {
  readonly code = "STARTUP_TIMEOUT";
  readonly timeoutMs: number;
  readonly stderr?: string;

  constructor(message: string, options: { timeoutMs: number; stderr?: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.timeoutMs = options.timeoutMs;
    this.stderr = options.stderr;
  }
}

export class ProcessExitError extends SupervisorError {
  readonly code = "PROCESS_EXITED";
  /** Null when the process died from a signal or was re-attached. */
  readonly exitCode: number | null;
  /** Error artifact written by the circuit breaker, when one exists. */
  readonly artifact?: StartupErrorArtifact;
  readonly stderr?: string;

  constructor(
    message: string,
    options: { exitCode: number | null; artifact?: StartupErrorArtifact; stderr?: string },
  ) {
    super(message);
    this.exitCode = options.exitCode;
    this.artifact = options.artifact;
    this.stderr = options.stderr;
  }
}

export class CircuitBreakerOpenError extends SupervisorError {
  readonly code = "CIRCUIT_BREAKER_OPEN";
  readonly artifact: StartupErrorArtifact;

  constructor(artifact: StartupErrorArtifact) {
    super(artifact.message);
    this.artifact = artifact;
  }
}

/**
 * A job file could not be parsed or validated. Callers fall back to a safe
 * default instead of aborting.
 */
export class MalformedStateError extends SupervisorError {
  readonly code: SupervisorErrorCode = "MALFORMED_STATE";
  readonly filePath?: string;

  constructor(message: string, options: { filePath?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.filePath = options.filePath;
  }
}

export class DuplicateJobNameError extends MalformedStateError {
  override readonly code = "DUPLICATE_JOB_NAME";
  readonly names: string[];

  constructor(names: string[], options: { filePath?: string } = {}) {
    super(`Declared jobs contain duplicate names: ${names.join(", ")}`, options);
    this.names = names;
  }
}

export function isSupervisorError(error: unknown): error is SupervisorError {
  return error instanceof SupervisorError;
}
