/**
 * Type guards for the Armory error families + code-level discrimination.
 */

import type { ArmoryError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { InstallError } from "./install.js";
import { ManifestDomainError } from "./manifest.js";
import { ResolutionError } from "./resolution.js";

/** Manifest or constraint validation failure */
export function isManifestDomainError(error: unknown): error is ManifestDomainError {
  return error instanceof ManifestDomainError;
}

/** Cycle, conflict, or non-convergence while resolving */
export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

/** Failure recorded against a component during installation */
export function isInstallError(error: unknown): error is InstallError {
  return error instanceof InstallError;
}

/**
 * Check if an ArmoryError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: ArmoryError,
  code: C,
): error is ArmoryError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected, user-actionable condition.
 * Returns false for non-Armory errors.
 */
export function isExpectedError(error: unknown): boolean {
  if (error !== null && typeof error === "object" && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
