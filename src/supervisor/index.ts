export {
  createStartupErrorArtifact,
  parseStartupErrorArtifact,
  STARTUP_ERROR_KINDS,
  StartupErrorArtifactSchema,
  StartupErrorStore,
  type StartupErrorArtifact,
  type StartupErrorKind,
} from "./artifact";
export {
  CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_OPTIONS,
  type BreakerVerdict,
  type CircuitBreakerDeps,
  type CircuitBreakerOptions,
  type ExitSample,
} from "./circuit-breaker";
export { advanceCrashWindow, EMPTY_CRASH_WINDOW, isQuickCrash, type CrashSample, type CrashWindow } from "./crash-window";
export {
  CircuitBreakerOpenError,
  DuplicateJobNameError,
  isSupervisorError,
  LaunchError,
  MalformedStateError,
  ProcessExitError,
  StartupTimeoutError,
  SupervisorError,
  type SupervisorErrorCode,
} from "./errors";
export { clearStaleLocks } from "./lock-files";
export { canConnect, PortWaitTimeout, waitForPort, type PortProbe, type PortWaitOptions } from "./port-probe";
export {
  AttachedProcessHandle,
  ChildProcessHandle,
  ChildProcessLauncher,
  ExitWaitTimeout,
  isProcessRunning,
  spawnProcess,
  type ExitResult,
  type LaunchSpec,
  type ProcessHandle,
  type ProcessLauncher,
  type ProcessStatus,
} from "./process";
export { StartupRaceDetector, type StartupOutcome, type StartupRaceOptions } from "./startup-race";
export { StderrLog, tailLines } from "./stderr-log";
export {
  ProcessSupervisor,
  type SupervisorDeps,
  type SupervisorOptions,
  type SupervisorOutcome,
  type SupervisorState,
} from "./supervisor";
