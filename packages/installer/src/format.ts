/**
 * Human-readable failure messages with the causal chain back to a root.
 */

import type { FailedResult, InstallPlan, PlanStep, SkippedResult } from "@armory/core";
import { type ArmoryError, FileConflictError, InstallCancelledError, IOError } from "@armory/errors";

/**
 * Formats a failed or skipped result, e.g.
 * `component B failed: FileConflictError at path /x/b.txt; caused by B required by A`.
 */
export function formatFailure(result: FailedResult | SkippedResult, plan: InstallPlan): string {
  if (result.status === "skipped") {
    if (result.reason instanceof InstallCancelledError) {
      return `component ${result.name} skipped: install cancelled`;
    }
    return `component ${result.name} skipped: dependency ${result.reason.failedDependency} did not install; caused by ${causalChain(result.name, plan)}`;
  }
  return `component ${result.name} failed: ${describeError(result.error)}; caused by ${causalChain(result.name, plan)}`;
}

function describeError(error: ArmoryError): string {
  if (error instanceof FileConflictError || error instanceof IOError) {
    return `${error._tag} at path ${error.path}`;
  }
  return `${error._tag}: ${error.message}`;
}

/**
 * `C required by B required by A`, following the first requester of each
 * component up to a root. A root on its own reads `A requested directly`.
 */
export function causalChain(name: string, plan: InstallPlan): string {
  const byName = new Map<string, PlanStep>(plan.steps.map((step) => [step.manifest.name, step]));
  const chain = [name];
  const seen = new Set(chain);
  for (let requester = byName.get(name)?.requestedBy[0]; requester !== undefined; ) {
    if (seen.has(requester)) break;
    chain.push(requester);
    seen.add(requester);
    requester = byName.get(requester)?.requestedBy[0];
  }
  return chain.length === 1 ? `${name} requested directly` : chain.join(" required by ");
}
