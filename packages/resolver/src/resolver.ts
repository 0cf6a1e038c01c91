/**
 * DependencyResolver: turns requested root components into a topologically
 * ordered install plan.
 *
 * Resolution runs in rounds. Each round looks at the names whose requirements
 * changed, fetches a manifest for every name whose current selection no longer
 * satisfies the intersection of its requirements, and merges the fetched
 * manifests back in worklist order. Fetches within a round run concurrently;
 * the merge is single-threaded, so the requirement map is never written
 * concurrently. Rounds repeat until no requirement changes.
 */

import type {
  ComponentRequest,
  InstallPlan,
  Manifest,
  PlanStep,
  RegistryClient,
  WarningHandler,
} from "@armory/core";
import { resolveWarningHandler } from "@armory/core";
import {
  ConfigError,
  ConflictError,
  CycleError,
  InternalError,
  RegistryFetchError,
  ResolutionLimitError,
} from "@armory/errors";
import {
  ANY_VERSION,
  intersectConstraints,
  isSatisfiable,
  parseConstraint,
  satisfies,
  type VersionConstraint,
} from "@armory/manifest";

import { settleWithConcurrency } from "./concurrency.js";
import { findCycle, topologicalOrder } from "./graph.js";
import { recordResolution } from "./metrics.js";

/** Requester label for constraints that come from the caller's roots */
export const ROOT_REQUESTER = "<root>";

const DEFAULT_CONCURRENCY = 4;
const MAX_CONCURRENCY = 64;
const DEFAULT_MAX_ROUNDS = 1000;

export interface DependencyResolverOptions {
  readonly registry: RegistryClient;
  /** Max manifest fetches in flight (1-64, default: 4) */
  readonly concurrency?: number;
  /** Rounds allowed before giving up (default: 1000) */
  readonly maxRounds?: number;
  readonly onWarning?: WarningHandler;
}

interface ResolverSettings {
  readonly registry: RegistryClient;
  readonly concurrency: number;
  readonly maxRounds: number;
  readonly onWarning: WarningHandler;
}

export class DependencyResolver {
  private readonly settings: ResolverSettings;

  constructor(options: DependencyResolverOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    const issues: string[] = [];
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      issues.push(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
    }
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      issues.push(`maxRounds must be a positive integer, got ${maxRounds}`);
    }
    if (issues.length > 0) {
      throw new ConfigError("DependencyResolver", issues);
    }
    this.settings = {
      registry: options.registry,
      concurrency,
      maxRounds,
      onWarning: resolveWarningHandler("armory:resolver", options.onWarning),
    };
  }

  /**
   * Resolves `roots` and their transitive dependencies.
   *
   * Never touches the filesystem and keeps no state between calls; manifest
   * fetches are cached only for the duration of one call.
   *
   * @throws {ConstraintParseError} when a root constraint is malformed
   * @throws {ConflictError} when a component's requirements cannot all be met
   * @throws {CycleError} when the selected components depend on each other in a loop
   * @throws {RegistryFetchError} when a manifest cannot be fetched
   * @throws {ResolutionLimitError} when resolution does not settle within `maxRounds`
   */
  async resolve(roots: readonly ComponentRequest[]): Promise<InstallPlan> {
    const start = performance.now();
    const resolution = new Resolution(this.settings);
    try {
      const plan = await resolution.run(roots);
      recordResolution("resolved", performance.now() - start, resolution.rounds);
      return plan;
    } catch (error: unknown) {
      recordResolution("failed", performance.now() - start, resolution.rounds);
      throw error;
    }
  }
}

interface PendingFetch {
  readonly name: string;
  readonly constraint: VersionConstraint;
}

/**
 * State of a single resolve() call.
 */
class Resolution {
  rounds = 0;
  private readonly settings: ResolverSettings;
  /** name → requester → constraint, in the order requesters appeared */
  private readonly requirements = new Map<string, Map<string, VersionConstraint>>();
  private readonly selected = new Map<string, Manifest>();
  private readonly firstSeen = new Map<string, number>();
  private readonly roots = new Set<string>();
  private readonly fetches = new Map<string, Promise<Manifest>>();

  constructor(settings: ResolverSettings) {
    this.settings = settings;
  }

  async run(requests: readonly ComponentRequest[]): Promise<InstallPlan> {
    for (const request of requests) {
      this.require(request.name, ROOT_REQUESTER, parseConstraint(request.versionConstraint));
      this.roots.add(request.name);
    }

    let worklist: string[] = [...this.roots];
    while (worklist.length > 0) {
      if (this.rounds >= this.settings.maxRounds) {
        throw new ResolutionLimitError(this.settings.maxRounds);
      }
      this.rounds++;
      worklist = await this.round(worklist);
    }

    return this.buildPlan();
  }

  private rank(name: string): number {
    return this.firstSeen.get(name) ?? Number.MAX_SAFE_INTEGER;
  }

  private require(name: string, requester: string, constraint: VersionConstraint): void {
    let byRequester = this.requirements.get(name);
    if (byRequester === undefined) {
      byRequester = new Map();
      this.requirements.set(name, byRequester);
    }
    const existing = byRequester.get(requester);
    byRequester.set(requester, existing ? intersectConstraints(existing, constraint) : constraint);
    if (!this.firstSeen.has(name)) {
      this.firstSeen.set(name, this.firstSeen.size);
    }
  }

  private effectiveConstraint(byRequester: ReadonlyMap<string, VersionConstraint>): VersionConstraint {
    let effective = ANY_VERSION;
    for (const constraint of byRequester.values()) {
      effective = intersectConstraints(effective, constraint);
    }
    return effective;
  }

  /**
   * One fetch-and-merge round. Returns the names whose requirements changed.
   */
  private async round(worklist: readonly string[]): Promise<string[]> {
    const names = [...new Set(worklist)].sort((a, b) => this.rank(a) - this.rank(b));
    const toFetch: PendingFetch[] = [];
    const conflicts: string[] = [];

    for (const name of names) {
      const byRequester = this.requirements.get(name);
      if (byRequester === undefined || byRequester.size === 0) continue;
      const constraint = this.effectiveConstraint(byRequester);
      if (!isSatisfiable(constraint)) {
        conflicts.push(name);
        continue;
      }
      const current = this.selected.get(name);
      if (current !== undefined && satisfies(current.version, constraint)) continue;
      toFetch.push({ name, constraint });
    }

    const next: string[] = [];
    if (conflicts.length > 0) {
      // A conflict may disappear once a requester is re-selected this round
      // and withdraws its requirement; re-check those next round.
      const unsettled = new Set([...toFetch.map((f) => f.name), ...conflicts]);
      for (const name of conflicts) {
        const requesters = [...(this.requirements.get(name)?.keys() ?? [])];
        const waiting = toFetch.length > 0 && requesters.some((r) => unsettled.has(r));
        if (!waiting) throw this.conflictFor(name);
        next.push(name);
      }
    }

    const results = await settleWithConcurrency(
      toFetch.map((f) => () => this.fetch(f.name, f.constraint)),
      this.settings.concurrency,
    );

    for (const [index, pending] of toFetch.entries()) {
      const result = results[index];
      if (result === undefined) {
        throw new InternalError(`missing fetch result for ${pending.name}`);
      }
      if (result.status === "rejected") throw result.reason;
    }
    for (const [index, pending] of toFetch.entries()) {
      const result = results[index];
      if (result?.status === "fulfilled") {
        next.push(...this.select(pending.name, result.value));
      }
    }

    next.push(...this.prune());
    return next;
  }

  private fetch(name: string, constraint: VersionConstraint): Promise<Manifest> {
    const key = `${name}\0${constraint.raw}`;
    let pending = this.fetches.get(key);
    if (pending === undefined) {
      const { registry } = this.settings;
      pending = registry.fetchManifest(name, constraint.raw).then((manifest) => {
        if (manifest.name !== name || !satisfies(manifest.version, constraint)) {
          throw new RegistryFetchError(
            name,
            constraint.raw,
            "invalid",
            `${registry.name} returned ${manifest.name}@${manifest.version}`,
          );
        }
        return manifest;
      });
      this.fetches.set(key, pending);
    }
    return pending;
  }

  /**
   * Makes `manifest` the selection for its name, withdrawing the requirements
   * of the version it replaces. Returns the names whose requirements changed.
   */
  private select(name: string, manifest: Manifest): string[] {
    const previous = this.selected.get(name);
    if (previous?.version === manifest.version) return [];

    const touched: string[] = [];
    if (previous !== undefined) {
      touched.push(...this.withdraw(name, previous));
      if (previous.dependencies.length > 0) {
        this.settings.onWarning({
          code: "REQUIREMENT_WITHDRAWN",
          message: `${name} moved from ${previous.version} to ${manifest.version}; withdrew its requirements on ${previous.dependencies.map((d) => d.name).join(", ")}`,
          component: name,
        });
      }
    }

    this.selected.set(name, manifest);
    for (const dependency of manifest.dependencies) {
      this.require(dependency.name, name, parseConstraint(dependency.versionConstraint));
      touched.push(dependency.name);
    }
    return touched;
  }

  private withdraw(requester: string, manifest: Manifest): string[] {
    const touched: string[] = [];
    for (const dependency of manifest.dependencies) {
      this.requirements.get(dependency.name)?.delete(requester);
      touched.push(dependency.name);
    }
    return touched;
  }

  /**
   * Drops selections no longer reachable from the roots, along with their
   * requirements. Returns the names whose requirements changed.
   */
  private prune(): string[] {
    const reachable = new Set<string>();
    const stack = [...this.roots];
    for (let name = stack.pop(); name !== undefined; name = stack.pop()) {
      if (reachable.has(name)) continue;
      reachable.add(name);
      for (const dependency of this.selected.get(name)?.dependencies ?? []) {
        stack.push(dependency.name);
      }
    }

    const touched: string[] = [];
    for (const [name, manifest] of this.selected) {
      if (reachable.has(name)) continue;
      this.selected.delete(name);
      touched.push(...this.withdraw(name, manifest));
    }
    for (const [name, byRequester] of this.requirements) {
      if (byRequester.size === 0 && !this.selected.has(name)) {
        this.requirements.delete(name);
      }
    }
    return touched;
  }

  private conflictFor(name: string): ConflictError {
    const entries = [...(this.requirements.get(name) ?? new Map<string, VersionConstraint>())];
    return new ConflictError(
      name,
      entries.map(([requester]) => requester),
      entries.map(([, constraint]) => constraint.raw),
    );
  }

  private buildPlan(): InstallPlan {
    const nodes = [...this.selected.keys()].sort((a, b) => this.rank(a) - this.rank(b));
    const edges = new Map<string, string[]>();
    for (const [name, manifest] of this.selected) {
      edges.set(name, manifest.dependencies.map((d) => d.name));
    }

    const cycle = findCycle(nodes, edges);
    if (cycle !== undefined) {
      throw new CycleError(cycle);
    }

    const order = topologicalOrder(nodes, edges, (name) => this.rank(name));
    const position = new Map(order.map((name, index) => [name, index]));

    const steps = order.map((name): PlanStep => {
      const manifest = this.selected.get(name);
      if (manifest === undefined) {
        throw new InternalError(`no selection for planned component ${name}`);
      }
      const requestedBy = [...(this.requirements.get(name)?.keys() ?? [])]
        .filter((requester) => position.has(requester))
        .sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
      return {
        manifest,
        requestedDirectly: this.roots.has(name),
        requestedBy,
        dependsOn: [...new Set(manifest.dependencies.map((d) => d.name))],
      };
    });

    return { steps };
  }
}
