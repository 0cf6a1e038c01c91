/**
 * OTel metrics for registry access.
 *
 * Lazily initialized; no-op instruments when no meter provider is registered.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "armory.registry";

export type FetchKind = "manifest" | "bundle";

let _fetchDuration: Histogram | undefined;
let _cacheAccess: Counter | undefined;
let _retries: Counter | undefined;

export function getFetchDuration(): Histogram {
  if (_fetchDuration === undefined) {
    _fetchDuration = metrics.getMeter(METER_NAME).createHistogram("armory.registry.fetch_duration_ms", {
      description: "Registry fetch duration in milliseconds",
      unit: "ms",
    });
  }
  return _fetchDuration;
}

export function getCacheAccess(): Counter {
  if (_cacheAccess === undefined) {
    _cacheAccess = metrics.getMeter(METER_NAME).createCounter("armory.registry.cache_access", {
      description: "Registry cache access count (hits and misses)",
    });
  }
  return _cacheAccess;
}

export function getRetryCount(): Counter {
  if (_retries === undefined) {
    _retries = metrics.getMeter(METER_NAME).createCounter("armory.registry.retries", {
      description: "Registry fetches retried after a transient failure",
    });
  }
  return _retries;
}

export function recordFetchTime(kind: FetchKind, source: string, durationMs: number): void {
  getFetchDuration().record(durationMs, { kind, source });
}

export function recordCacheAccess(kind: FetchKind, hit: boolean): void {
  getCacheAccess().add(1, { kind, hit: String(hit) });
}

export function recordRetry(kind: FetchKind, source: string): void {
  getRetryCount().add(1, { kind, source });
}
