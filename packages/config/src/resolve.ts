import { isAbsolute } from "node:path";

import { ConfigError } from "@armory/errors";
import { DEFAULT_RETRY_POLICY } from "@armory/registry";

import {
  DEFAULT_CONCURRENCY,
  DEFAULT_LEDGER_PATH,
  DEFAULT_MAX_BUNDLES,
  DEFAULT_MAX_MANIFESTS,
  MAX_CONCURRENCY,
} from "./constants.js";
import type { InstallerConfig, ResolvedInstallerConfig } from "./types.js";

/**
 * Validates an {@link InstallerConfig} and applies defaults.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function resolveInstallerConfig(config: InstallerConfig = {}): ResolvedInstallerConfig {
  const issues: string[] = [];

  const { concurrency } = config;
  if (
    concurrency !== undefined &&
    (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY)
  ) {
    issues.push(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
  }

  const { ledgerPath } = config;
  if (ledgerPath !== undefined && (ledgerPath.trim() === "" || isAbsolute(ledgerPath))) {
    issues.push(`ledgerPath must be a non-empty relative path, got '${ledgerPath}'`);
  }

  for (const key of ["maxManifests", "maxBundles"] as const) {
    const value = config.cache?.[key];
    if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
      issues.push(`cache.${key} must be a positive integer, got ${value}`);
    }
  }

  const retry = config.retry ?? {};
  if (retry.attempts !== undefined && (!Number.isInteger(retry.attempts) || retry.attempts < 1)) {
    issues.push(`retry.attempts must be a positive integer, got ${retry.attempts}`);
  }
  if (retry.baseDelayMs !== undefined && (!Number.isFinite(retry.baseDelayMs) || retry.baseDelayMs < 0)) {
    issues.push(`retry.baseDelayMs must be a non-negative number, got ${retry.baseDelayMs}`);
  }
  if (retry.factor !== undefined && (!Number.isFinite(retry.factor) || retry.factor < 1)) {
    issues.push(`retry.factor must be a number >= 1, got ${retry.factor}`);
  }

  if (issues.length > 0) {
    throw new ConfigError("installer config", issues);
  }

  return {
    concurrency: concurrency ?? DEFAULT_CONCURRENCY,
    ledgerPath: ledgerPath ?? DEFAULT_LEDGER_PATH,
    cache: {
      maxManifests: config.cache?.maxManifests ?? DEFAULT_MAX_MANIFESTS,
      maxBundles: config.cache?.maxBundles ?? DEFAULT_MAX_BUNDLES,
    },
    retry: {
      attempts: retry.attempts ?? DEFAULT_RETRY_POLICY.attempts,
      baseDelayMs: retry.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      factor: retry.factor ?? DEFAULT_RETRY_POLICY.factor,
    },
  };
}
