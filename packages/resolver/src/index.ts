/**
 * @armory/resolver
 *
 * Dependency resolution: constraint intersection across requesters, cycle
 * detection and deterministic topological ordering.
 */

export { settleWithConcurrency } from "./concurrency.js";
export { type DependencyEdges, findCycle, topologicalOrder } from "./graph.js";
export { getResolutionDuration, getResolutionRounds, recordResolution } from "./metrics.js";
export { DependencyResolver, type DependencyResolverOptions, ROOT_REQUESTER } from "./resolver.js";

export const PACKAGE_NAME = "@armory/resolver";
