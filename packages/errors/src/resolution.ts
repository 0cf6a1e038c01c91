/**
 * Resolution errors — raised while building the dependency graph.
 * Any of these aborts resolution before anything is installed.
 */

import { ArmoryError } from "./base.js";

export abstract class ResolutionError extends ArmoryError {}

/**
 * The dependency graph contains a cycle. `path` starts and ends with the
 * same component, listed in traversal order: `["A", "B", "A"]`.
 */
export class CycleError extends ResolutionError {
  readonly _tag = "CycleError" as const;
  readonly code = "RESOLUTION_CYCLE" as const;
  readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super(`Dependency cycle detected: ${path.join(" -> ")}`);
    this.path = path;
  }
}

/**
 * The constraints placed on one component by its requesters have an empty
 * intersection. `requesters[i]` placed `constraints[i]`.
 */
export class ConflictError extends ResolutionError {
  readonly _tag = "ConflictError" as const;
  readonly code = "RESOLUTION_CONFLICT" as const;
  readonly componentName: string;
  readonly requesters: readonly string[];
  readonly constraints: readonly string[];

  constructor(componentName: string, requesters: readonly string[], constraints: readonly string[]) {
    const detail = requesters.map((r, i) => `${r} requires '${constraints[i] ?? "*"}'`).join(", ");
    super(`No version of '${componentName}' satisfies all requesters: ${detail}`, {
      component: componentName,
    });
    this.componentName = componentName;
    this.requesters = requesters;
    this.constraints = constraints;
  }
}

export class ResolutionLimitError extends ResolutionError {
  readonly _tag = "ResolutionLimitError" as const;
  readonly code = "RESOLUTION_LIMIT_EXCEEDED" as const;
  readonly maxRounds: number;

  constructor(maxRounds: number) {
    super(`Dependency resolution did not converge within ${maxRounds} rounds`);
    this.maxRounds = maxRounds;
  }
}
