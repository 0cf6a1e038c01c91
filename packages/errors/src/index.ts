/**
 * @armory/errors
 *
 * Shared error taxonomy for the Armory component package manager.
 *
 * Every error carries a `.code` from the catalog. Use `error.code === "XXX"`
 * for fine-grained matching, or `instanceof` a family base
 * (ManifestDomainError, ResolutionError, InstallError) for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { ArmoryError, type ErrorJSON, isArmoryError } from "./base.js";

export {
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getCatalogEntry,
  getErrnoCode,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isInstallError,
  isManifestDomainError,
  isResolutionError,
} from "./guards.js";

// ============================================================================
// ERROR CLASSES
// ============================================================================

export { ConfigError } from "./config.js";
export {
  FileConflictError,
  type FileOwner,
  InstallCancelledError,
  InstallError,
  IOError,
  type IOOperation,
  LedgerError,
  SkippedDueToDependencyFailure,
} from "./install.js";
export { InternalError } from "./internal.js";
export {
  ConstraintParseError,
  ManifestDomainError,
  ManifestError,
  type ManifestIssue,
} from "./manifest.js";
export { RegistryFetchError, type RegistryFetchReason } from "./registry.js";
export { ConflictError, CycleError, ResolutionError, ResolutionLimitError } from "./resolution.js";
export { TemplateError } from "./template.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@armory/errors";
