/**
 * RetryingRegistryClient: exponential backoff around another client.
 *
 * Only failures the inner client marks as transient (`unavailable`) are
 * retried; unknown components and unsatisfiable constraints fail at once.
 */

import { setTimeout as sleep } from "node:timers/promises";

import type { Bundle, Manifest, RegistryClient } from "@armory/core";
import { RegistryFetchError } from "@armory/errors";

import { type FetchKind, recordRetry } from "./metrics.js";

export interface RetryPolicy {
  /** Total attempts including the first (default: 3) */
  readonly attempts?: number;
  /** Delay before the second attempt in ms (default: 200) */
  readonly baseDelayMs?: number;
  /** Multiplier applied to the delay after each retry (default: 2) */
  readonly factor?: number;
}

export const DEFAULT_RETRY_POLICY: Required<RetryPolicy> = {
  attempts: 3,
  baseDelayMs: 200,
  factor: 2,
};

export class RetryingRegistryClient implements RegistryClient {
  readonly name: string;
  private readonly inner: RegistryClient;
  private readonly policy: Required<RetryPolicy>;

  constructor(inner: RegistryClient, policy: RetryPolicy = {}) {
    const resolved = { ...DEFAULT_RETRY_POLICY, ...policy };
    if (!Number.isInteger(resolved.attempts) || resolved.attempts < 1) {
      throw new RangeError(`attempts must be a positive integer, got ${resolved.attempts}`);
    }
    if (resolved.baseDelayMs < 0 || resolved.factor < 1) {
      throw new RangeError("baseDelayMs must be >= 0 and factor >= 1");
    }
    this.inner = inner;
    this.policy = resolved;
    this.name = `retrying(${inner.name})`;
  }

  fetchManifest(name: string, versionConstraint: string): Promise<Manifest> {
    return this.withRetry("manifest", () => this.inner.fetchManifest(name, versionConstraint));
  }

  fetchBundle(name: string, version: string): Promise<Bundle> {
    return this.withRetry("bundle", () => this.inner.fetchBundle(name, version));
  }

  /** Delay in ms before retry number `retry` (1-based) */
  delayFor(retry: number): number {
    return this.policy.baseDelayMs * this.policy.factor ** (retry - 1);
  }

  private async withRetry<T>(kind: FetchKind, operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error: unknown) {
        const retryable = error instanceof RegistryFetchError && error.retryable;
        if (!retryable || attempt >= this.policy.attempts) throw error;
        recordRetry(kind, this.inner.name);
        await sleep(this.delayFor(attempt));
      }
    }
  }
}
