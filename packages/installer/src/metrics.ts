/**
 * OTel metrics for installation.
 *
 * Lazily initialized; no-op instruments when no meter provider is registered.
 */

import type { ComponentStatus } from "@armory/core";
import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "armory.installer";

let _outcomes: Counter | undefined;
let _duration: Histogram | undefined;

export function getInstallOutcomes(): Counter {
  if (_outcomes === undefined) {
    _outcomes = metrics.getMeter(METER_NAME).createCounter("armory.install.components", {
      description: "Components processed per install outcome",
    });
  }
  return _outcomes;
}

export function getInstallDuration(): Histogram {
  if (_duration === undefined) {
    _duration = metrics.getMeter(METER_NAME).createHistogram("armory.install.duration_ms", {
      description: "Per-component install duration in milliseconds",
      unit: "ms",
    });
  }
  return _duration;
}

export function recordInstallOutcome(status: ComponentStatus, component: string, durationMs?: number): void {
  const attributes = { status, component };
  getInstallOutcomes().add(1, attributes);
  if (durationMs !== undefined) {
    getInstallDuration().record(durationMs, attributes);
  }
}
