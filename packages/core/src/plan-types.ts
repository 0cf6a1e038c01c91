import type { Manifest } from "./manifest-types.js";

/**
 * A component the caller asks for, by name and version constraint.
 */
export interface ComponentRequest {
  readonly name: string;
  readonly versionConstraint: string;
}

/**
 * One resolved component in an install plan.
 */
export interface PlanStep {
  readonly manifest: Manifest;
  /** True when the component was one of the requested roots */
  readonly requestedDirectly: boolean;
  /** Names of plan components that depend on this one, in plan order */
  readonly requestedBy: readonly string[];
  /** Names of plan components this one depends on, in declaration order */
  readonly dependsOn: readonly string[];
}

/**
 * Components in topological order: every step appears after all of its
 * dependencies.
 */
export interface InstallPlan {
  readonly steps: readonly PlanStep[];
}
