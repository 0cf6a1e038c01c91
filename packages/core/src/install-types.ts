import type {
  ArmoryError,
  InstallCancelledError,
  SkippedDueToDependencyFailure,
} from "@armory/errors";
import type { LedgerEntry } from "./ledger-types.js";

export interface InstallPolicy {
  /** Overwrite existing destination files instead of reporting a conflict */
  readonly force: boolean;
  /**
   * Overwrite an existing file when the ledger records its exact checksum for
   * the same `name@version` (resuming or repeating a recorded install).
   * Default: false, so a repeated install reports every file as a conflict.
   */
  readonly trustLedger?: boolean;
}

/**
 * Template variable values per component name.
 */
export type ComponentVariables = Readonly<Record<string, Readonly<Record<string, string>>>>;

interface ComponentResultBase {
  readonly name: string;
  readonly version: string;
  readonly requestedDirectly: boolean;
}

export interface InstalledResult extends ComponentResultBase {
  readonly status: "installed";
  readonly record: LedgerEntry;
}

export interface SkippedResult extends ComponentResultBase {
  readonly status: "skipped";
  readonly reason: SkippedDueToDependencyFailure | InstallCancelledError;
}

export interface FailedResult extends ComponentResultBase {
  readonly status: "failed";
  /** First failure; the one shown in messages */
  readonly error: ArmoryError;
  /** Every failure found, e.g. one FileConflictError per conflicting file */
  readonly errors: readonly ArmoryError[];
}

export type ComponentResult = InstalledResult | SkippedResult | FailedResult;

export type ComponentStatus = ComponentResult["status"];

/**
 * Outcome of an install run: one result per plan component, in plan order,
 * and the ledger after the run (previous entries followed by new ones).
 */
export interface InstallReport {
  readonly results: readonly ComponentResult[];
  readonly ledger: readonly LedgerEntry[];
}

/**
 * Progress events emitted while installing. `done` is always the last event
 * of a run and carries the final report.
 */
export type InstallProgressEvent =
  | { readonly type: "component-started"; readonly name: string; readonly version: string }
  | { readonly type: "component-installed"; readonly result: InstalledResult }
  | { readonly type: "component-failed"; readonly result: FailedResult }
  | { readonly type: "component-skipped"; readonly result: SkippedResult }
  | { readonly type: "done"; readonly report: InstallReport };
