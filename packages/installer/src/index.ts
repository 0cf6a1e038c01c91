/**
 * @armory/installer
 *
 * Writes resolved install plans into a target tree: conflict pre-pass,
 * template rendering, atomic per-file writes, the install ledger and
 * per-component rollback.
 */

export { BINARY_SNIFF_BYTES, decodeText } from "./binary.js";
export { conflictPredecessors } from "./conflict-groups.js";
export { causalChain, formatFailure } from "./format.js";
export {
  DEFAULT_CONCURRENCY,
  Installer,
  type InstallerOptions,
  MAX_CONCURRENCY,
  type ProgressHandler,
} from "./installer.js";
export { DEFAULT_LEDGER_PATH, Ledger } from "./ledger.js";
export { getInstallDuration, getInstallOutcomes, recordInstallOutcome } from "./metrics.js";
export { FileTransaction, hashFile } from "./transaction.js";

export const PACKAGE_NAME = "@armory/installer";
