/**
 * OTel metrics for dependency resolution.
 *
 * Lazily initialized; no-op instruments when no meter provider is registered.
 */

import type { Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "armory.resolver";

export type ResolutionOutcome = "resolved" | "failed";

let _duration: Histogram | undefined;
let _rounds: Histogram | undefined;

export function getResolutionDuration(): Histogram {
  if (_duration === undefined) {
    _duration = metrics.getMeter(METER_NAME).createHistogram("armory.resolver.duration_ms", {
      description: "Dependency resolution duration in milliseconds",
      unit: "ms",
    });
  }
  return _duration;
}

export function getResolutionRounds(): Histogram {
  if (_rounds === undefined) {
    _rounds = metrics.getMeter(METER_NAME).createHistogram("armory.resolver.rounds", {
      description: "Fetch rounds needed to reach a fixpoint",
    });
  }
  return _rounds;
}

export function recordResolution(outcome: ResolutionOutcome, durationMs: number, rounds: number): void {
  getResolutionDuration().record(durationMs, { outcome });
  getResolutionRounds().record(rounds, { outcome });
}
