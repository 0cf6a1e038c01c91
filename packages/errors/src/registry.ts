import { ArmoryError } from "./base.js";

/**
 * Why a registry fetch failed. Only `"unavailable"` is worth retrying.
 */
export type RegistryFetchReason = "not-found" | "no-matching-version" | "unavailable" | "invalid";

/**
 * A manifest or bundle could not be fetched from a registry.
 */
export class RegistryFetchError extends ArmoryError {
  readonly _tag = "RegistryFetchError" as const;
  readonly code = "REGISTRY_FETCH_FAILED" as const;
  readonly componentName: string;
  readonly reason: RegistryFetchReason;
  /** Version constraint (manifest fetch) or exact version (bundle fetch) */
  readonly requested: string;

  constructor(
    componentName: string,
    requested: string,
    reason: RegistryFetchReason,
    detail?: string,
    options?: ErrorOptions,
  ) {
    super(
      `Failed to fetch '${componentName}@${requested}' (${reason})${detail ? `: ${detail}` : ""}`,
      { component: componentName, requested, reason },
      options,
    );
    this.componentName = componentName;
    this.requested = requested;
    this.reason = reason;
  }

  get retryable(): boolean {
    return this.reason === "unavailable";
  }
}
