export type {
  InstalledPackage,
  InstalledPackages,
  InstalledPackageInfo,
  EnvAssignment,
  ListOptions,
  InstallOptions,
  UninstallOptions,
  InstallOutcome,
  PackageManager,
  PackageListChanges,
  StateChanges,
  StateResult,
  StateContext,
} from "./lib/types.js";
export { CommandNotFoundError, CommandExecutionError, isCapabilityError } from "./lib/errors.js";
export type { CapabilityError } from "./lib/errors.js";
export { parsePackageSpec, formatPackageSpec } from "./lib/package-spec.js";
export type { PackageSpec } from "./lib/package-spec.js";
export {
  installed,
  removed,
  bootstrap,
  npmInstalledModule,
  npmRemovedModule,
  npmBootstrapModule,
  runStates,
  buildSteps,
} from "./lib/modules/index.js";
export type {
  NpmInstalledParams,
  NpmRemovedParams,
  NpmBootstrapParams,
  StateStep,
  StepResult,
  OrchestratorResult,
  StateModule,
  StateName,
  StateParams,
} from "./lib/modules/index.js";
export * from "./lib/config/index.js";
export { StateReport } from "./components/StateReport.js";
