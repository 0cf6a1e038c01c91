/**
 * One file written by an installed component.
 */
export interface LedgerFileRecord {
  /** Path relative to the target root, forward slashes */
  readonly path: string;
  /** Hex-encoded SHA-256 of the written bytes */
  readonly checksum: string;
}

/**
 * One line of the append-only install ledger.
 */
export interface LedgerEntry {
  readonly name: string;
  readonly version: string;
  readonly files: readonly LedgerFileRecord[];
  /** ISO 8601 timestamp */
  readonly installedAt: string;
  readonly requestedDirectly: boolean;
}
