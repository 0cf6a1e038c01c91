/**
 * Install errors — raised (or recorded in the install report) while writing
 * components into a target tree.
 *
 * Abstract base: InstallError
 * Concrete:
 *   - FileConflictError              (INSTALL_FILE_CONFLICT)
 *   - IOError                        (INSTALL_IO_FAILED)
 *   - SkippedDueToDependencyFailure  (INSTALL_DEPENDENCY_FAILED)
 *   - InstallCancelledError          (INSTALL_CANCELLED)
 *   - LedgerError                    (INSTALL_LEDGER_INVALID)
 */

import { ArmoryError } from "./base.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class InstallError extends ArmoryError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

/** Component that the ledger says wrote a file. */
export interface FileOwner {
  readonly name: string;
  readonly version: string;
}

/**
 * A destination file already exists and the install policy does not allow
 * overwriting it. `owner` is set when the ledger attributes the file to a
 * previously installed component.
 */
export class FileConflictError extends InstallError {
  readonly _tag = "FileConflictError" as const;
  readonly code = "INSTALL_FILE_CONFLICT" as const;
  readonly path: string;
  readonly owner: FileOwner | undefined;

  constructor(path: string, owner?: FileOwner) {
    const ownedBy = owner ? ` (installed by ${owner.name}@${owner.version})` : "";
    super(`File already exists: ${path}${ownedBy}`, { path });
    this.path = path;
    this.owner = owner;
  }
}

export type IOOperation = "stat" | "read" | "mkdir" | "write" | "fsync" | "rename" | "hash" | "remove";

/**
 * A filesystem operation failed. The underlying Node error is kept as `cause`.
 */
export class IOError extends InstallError {
  readonly _tag = "IOError" as const;
  readonly code = "INSTALL_IO_FAILED" as const;
  readonly path: string;
  readonly operation: IOOperation;

  constructor(operation: IOOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(
      `Failed to ${operation} ${path}${reason}`,
      { path, operation },
      cause instanceof Error ? { cause } : undefined,
    );
    this.path = path;
    this.operation = operation;
  }
}

/**
 * A component was never attempted because a dependency failed or was skipped.
 * `failedDependency` is the direct dependency whose failure caused the skip.
 */
export class SkippedDueToDependencyFailure extends InstallError {
  readonly _tag = "SkippedDueToDependencyFailure" as const;
  readonly code = "INSTALL_DEPENDENCY_FAILED" as const;
  readonly componentName: string;
  readonly failedDependency: string;

  constructor(componentName: string, failedDependency: string) {
    super(`Skipped '${componentName}': dependency '${failedDependency}' did not install`, {
      component: componentName,
      dependency: failedDependency,
    });
    this.componentName = componentName;
    this.failedDependency = failedDependency;
  }
}

export class InstallCancelledError extends InstallError {
  readonly _tag = "InstallCancelledError" as const;
  readonly code = "INSTALL_CANCELLED" as const;
  readonly componentName: string;

  constructor(componentName: string) {
    super(`Install of '${componentName}' was cancelled`, { component: componentName });
    this.componentName = componentName;
  }
}

/**
 * The ledger file is unreadable or contains a malformed line.
 * `line` is 1-based and set only for parse failures.
 */
export class LedgerError extends InstallError {
  readonly _tag = "LedgerError" as const;
  readonly code = "INSTALL_LEDGER_INVALID" as const;
  readonly path: string;
  readonly line: number | undefined;

  constructor(path: string, message: string, line?: number, options?: ErrorOptions) {
    const at = line !== undefined ? ` at line ${line}` : "";
    super(`Ledger ${path}${at}: ${message}`, { path }, options);
    this.path = path;
    this.line = line;
  }
}
