export { ServiceController, type EnsureResult, type ServiceControllerDeps, type ServiceControllerOptions } from "./controller";
export { resolveSupervisorLaunchTarget } from "./launch-target";
export {
  isSupervisorCommand,
  listProcesses,
  parseProcessTable,
  SupervisorLocator,
  type LocatedSupervisor,
  type ProcessEntry,
  type ProcessLister,
} from "./locator";
export { PidFile } from "./pid-file";
export { describeArtifact, getServiceStatus, type ServiceStatus, type ServiceStatusDeps } from "./status";
