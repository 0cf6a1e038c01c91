import type { RetryPolicy } from "@armory/registry";

/**
 * Installer and registry settings given in code. Every field is optional;
 * see {@link resolveInstallerConfig} for the defaults.
 */
export interface InstallerConfig {
  /** Components installed (and manifests fetched) at once, 1-64 */
  readonly concurrency?: number | undefined;
  /** Ledger location relative to the target root */
  readonly ledgerPath?: string | undefined;
  readonly cache?: {
    readonly maxManifests?: number | undefined;
    readonly maxBundles?: number | undefined;
  };
  readonly retry?: {
    readonly attempts?: number | undefined;
    readonly baseDelayMs?: number | undefined;
    readonly factor?: number | undefined;
  };
}

export interface ResolvedInstallerConfig {
  readonly concurrency: number;
  readonly ledgerPath: string;
  readonly cache: {
    readonly maxManifests: number;
    readonly maxBundles: number;
  };
  readonly retry: Required<RetryPolicy>;
}
