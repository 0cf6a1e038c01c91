/**
 * @armory/core
 *
 * Types shared by every Armory package: manifests, plans, ledger entries,
 * install results, the RegistryClient contract, and warnings.
 */

export const PACKAGE_NAME = "@armory/core" as const;

export type {
  ComponentResult,
  ComponentStatus,
  ComponentVariables,
  FailedResult,
  InstalledResult,
  InstallPolicy,
  InstallProgressEvent,
  InstallReport,
  SkippedResult,
} from "./install-types.js";
export type { LedgerEntry, LedgerFileRecord } from "./ledger-types.js";
export {
  COMPONENT_TYPES,
  type ComponentType,
  componentId,
  type JsonValue,
  type Manifest,
  type ManifestDependency,
  type ManifestFile,
} from "./manifest-types.js";
export type { ComponentRequest, InstallPlan, PlanStep } from "./plan-types.js";
export type { Bundle, RegistryClient } from "./registry-types.js";
export {
  type ArmoryWarning,
  type ArmoryWarningCode,
  resolveWarningHandler,
  type WarningHandler,
} from "./warning-types.js";
