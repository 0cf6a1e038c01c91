/**
 * Installer: writes the components of an install plan into a target tree.
 *
 * Each component is all-or-nothing. Before anything is written the whole
 * component is checked for conflicting destination files and rendered; the
 * files are then written atomically, hashed and recorded in the ledger. A
 * failure at any point rolls the component back, and every component that
 * depends on it is skipped. Independent components keep going.
 *
 * Components run concurrently up to `concurrency`, but a component only
 * starts once its dependencies and its conflict-group predecessor finished.
 */

import type { Stats } from "node:fs";
import { lstat } from "node:fs/promises";
import { join, posix, relative, resolve, sep } from "node:path";

import type {
  ComponentResult,
  ComponentVariables,
  FailedResult,
  InstallPlan,
  InstallPolicy,
  InstallProgressEvent,
  InstallReport,
  LedgerEntry,
  LedgerFileRecord,
  Manifest,
  PlanStep,
  RegistryClient,
  SkippedResult,
  WarningHandler,
} from "@armory/core";
import { componentId, resolveWarningHandler } from "@armory/core";
import {
  type ArmoryError,
  ConfigError,
  FileConflictError,
  getErrnoCode,
  getErrorMessage,
  InstallCancelledError,
  InternalError,
  IOError,
  ManifestError,
  SkippedDueToDependencyFailure,
  wrapError,
} from "@armory/errors";
import { normalizeDest } from "@armory/manifest";
import { findUnusedVariables, render } from "@armory/template";

import { decodeText } from "./binary.js";
import { conflictPredecessors } from "./conflict-groups.js";
import { DEFAULT_LEDGER_PATH, Ledger } from "./ledger.js";
import { recordInstallOutcome } from "./metrics.js";
import { FileTransaction, hashFile, tempPathFor } from "./transaction.js";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 64;

export type ProgressHandler = (event: InstallProgressEvent) => void;

export interface InstallerOptions {
  readonly registry: RegistryClient;
  /** Components installed at once (1-64, default: 4) */
  readonly concurrency?: number;
  /** Ledger location, resolved against the target root (default: .component-lock/ledger.jsonl) */
  readonly ledgerPath?: string;
  readonly onWarning?: WarningHandler;
  readonly onProgress?: ProgressHandler;
}

interface InstallerSettings {
  readonly registry: RegistryClient;
  readonly concurrency: number;
  readonly ledgerPath: string;
  readonly onWarning: WarningHandler;
  readonly onProgress: ProgressHandler | undefined;
}

export class Installer {
  private readonly settings: InstallerSettings;

  constructor(options: InstallerOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    const ledgerPath = options.ledgerPath ?? DEFAULT_LEDGER_PATH;
    const issues: string[] = [];
    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
      issues.push(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
    }
    if (ledgerPath.trim() === "") {
      issues.push("ledgerPath must not be empty");
    }
    if (issues.length > 0) {
      throw new ConfigError("Installer", issues);
    }

    this.settings = {
      registry: options.registry,
      concurrency,
      ledgerPath,
      onWarning: resolveWarningHandler("armory:installer", options.onWarning),
      onProgress: options.onProgress,
    };
  }

  /**
   * Installs every component of `plan` under `targetRoot`.
   *
   * Per-component failures are reported, never thrown. The returned report
   * has one result per plan step, in plan order.
   *
   * @throws {LedgerError} when the existing ledger cannot be read
   */
  async install(
    plan: InstallPlan,
    targetRoot: string,
    variables: ComponentVariables,
    policy: InstallPolicy,
    signal?: AbortSignal,
  ): Promise<InstallReport> {
    const root = resolve(targetRoot);
    const ledger = await Ledger.open(resolve(root, this.settings.ledgerPath), this.settings.onWarning);
    const run = new InstallRun(this.settings, { plan, root, variables, policy, ledger, signal });
    const results = await run.execute();

    const report: InstallReport = { results, ledger: ledger.entries() };
    run.emit({ type: "done", report });
    return report;
  }
}

interface RunInput {
  readonly plan: InstallPlan;
  readonly root: string;
  readonly variables: ComponentVariables;
  readonly policy: InstallPolicy;
  readonly ledger: Ledger;
  readonly signal: AbortSignal | undefined;
}

interface FileTarget {
  readonly src: string;
  /** Normalized, relative to the target root */
  readonly relPath: string;
  readonly absPath: string;
}

/** State of one install() call. */
class InstallRun {
  private readonly results = new Map<string, ComponentResult>();
  private readonly planNames: ReadonlySet<string>;
  /** Ledger location relative to the root, with forward slashes */
  private readonly ledgerRelPath: string;

  constructor(
    private readonly settings: InstallerSettings,
    private readonly input: RunInput,
  ) {
    this.planNames = new Set(input.plan.steps.map((step) => step.manifest.name));
    this.ledgerRelPath = relative(input.root, input.ledger.path).split(sep).join("/");
  }

  async execute(): Promise<ComponentResult[]> {
    const steps = this.input.plan.steps;
    const predecessors = conflictPredecessors(steps);
    const pending = [...steps];
    const running = new Map<string, Promise<void>>();

    while (pending.length > 0 || running.size > 0) {
      let progressed = false;
      let index = 0;
      while (index < pending.length && running.size < this.settings.concurrency) {
        const step = pending[index];
        if (step === undefined || !this.isReady(step, predecessors.get(step.manifest.name))) {
          index++;
          continue;
        }
        pending.splice(index, 1);
        progressed = true;

        const skipped = this.skipReason(step);
        if (skipped !== undefined) {
          this.finish(skipped);
          continue;
        }
        const name = step.manifest.name;
        running.set(
          name,
          this.installOne(step).then((result) => {
            running.delete(name);
            this.finish(result);
          }),
        );
      }

      if (running.size > 0) {
        await Promise.race(running.values());
      } else if (!progressed && pending.length > 0) {
        for (const step of pending.splice(0)) {
          const error = new InternalError(
            `${componentId(step.manifest)} waits on a component that can never finish; the plan is not in dependency order`,
          );
          this.finish(this.failed(step, [error]));
        }
      }
    }

    return steps.flatMap((step) => {
      const result = this.results.get(step.manifest.name);
      return result === undefined ? [] : [result];
    });
  }

  emit(event: InstallProgressEvent): void {
    const handler = this.settings.onProgress;
    if (handler === undefined) return;
    try {
      handler(event);
    } catch (error: unknown) {
      this.settings.onWarning({
        code: "PROGRESS_HANDLER_FAILED",
        message: `onProgress threw while handling '${event.type}': ${getErrorMessage(error)}`,
      });
    }
  }

  private isReady(step: PlanStep, predecessor: string | undefined): boolean {
    if (predecessor !== undefined && !this.results.has(predecessor)) return false;
    return step.dependsOn.every((dep) => !this.planNames.has(dep) || this.results.has(dep));
  }

  private skipReason(step: PlanStep): SkippedResult | undefined {
    const { name, version } = step.manifest;
    const base = { name, version, requestedDirectly: step.requestedDirectly };
    if (this.input.signal?.aborted === true) {
      return { ...base, status: "skipped", reason: new InstallCancelledError(name) };
    }
    const failedDependency = step.dependsOn.find(
      (dep) => this.planNames.has(dep) && this.results.get(dep)?.status !== "installed",
    );
    if (failedDependency !== undefined) {
      return {
        ...base,
        status: "skipped",
        reason: new SkippedDueToDependencyFailure(name, failedDependency),
      };
    }
    return undefined;
  }

  private finish(result: ComponentResult): void {
    this.results.set(result.name, result);
    switch (result.status) {
      case "installed":
        this.emit({ type: "component-installed", result });
        break;
      case "failed":
        this.emit({ type: "component-failed", result });
        break;
      case "skipped":
        recordInstallOutcome("skipped", result.name);
        this.emit({ type: "component-skipped", result });
        break;
    }
  }

  /** Installs one component. Never rejects. */
  private async installOne(step: PlanStep): Promise<ComponentResult> {
    const { manifest } = step;
    const startedAt = performance.now();
    this.emit({ type: "component-started", name: manifest.name, version: manifest.version });

    const transaction = new FileTransaction(() => this.throwIfCancelled(manifest.name));
    let result: ComponentResult;
    try {
      result = await this.writeComponent(step, transaction);
    } catch (error: unknown) {
      const problems = await transaction.rollback();
      if (problems.length > 0) {
        this.settings.onWarning({
          code: "ROLLBACK_INCOMPLETE",
          message: `Rollback of ${componentId(manifest)} left changes behind: ${problems.join("; ")}`,
          component: manifest.name,
        });
      }
      result = this.failed(step, [wrapError(error)]);
    }

    recordInstallOutcome(result.status, manifest.name, performance.now() - startedAt);
    return result;
  }

  private async writeComponent(step: PlanStep, transaction: FileTransaction): Promise<ComponentResult> {
    const { manifest } = step;
    const targets = this.targetsOf(manifest);
    const reserved = targets.flatMap((target, index) =>
      overlapsLedger(target.relPath, this.ledgerRelPath)
        ? [{ field: `files[${index}].dest`, message: `'${target.relPath}' would overwrite the install ledger` }]
        : [],
    );
    if (reserved.length > 0) {
      throw new ManifestError(reserved, { componentName: manifest.name });
    }

    const bundle = await this.settings.registry.fetchBundle(manifest.name, manifest.version);

    const missing = manifest.files.flatMap((file, index) =>
      bundle.has(file.src)
        ? []
        : [{ field: `files[${index}].src`, message: `'${file.src}' is not in the bundle` }],
    );
    if (missing.length > 0) {
      throw new ManifestError(missing, { componentName: manifest.name });
    }

    const conflicts = await this.findConflicts(manifest, targets);
    if (conflicts.length > 0) {
      return this.failed(step, conflicts);
    }

    const contents = this.renderFiles(manifest, targets, bundle);
    this.throwIfCancelled(manifest.name);

    for (const [index, target] of targets.entries()) {
      const bytes = contents[index];
      if (bytes === undefined) {
        throw new InternalError(`No rendered content for ${target.src}`);
      }
      await transaction.writeFile(target.absPath, bytes);
    }

    const files: LedgerFileRecord[] = [];
    for (const target of targets) {
      files.push({ path: target.relPath, checksum: await hashFile(target.absPath) });
    }
    const record: LedgerEntry = {
      name: manifest.name,
      version: manifest.version,
      files,
      installedAt: new Date().toISOString(),
      requestedDirectly: step.requestedDirectly,
    };
    await this.input.ledger.append(record);

    return {
      name: manifest.name,
      version: manifest.version,
      requestedDirectly: step.requestedDirectly,
      status: "installed",
      record,
    };
  }

  private targetsOf(manifest: Manifest): FileTarget[] {
    return manifest.files.map((file) => {
      const relPath = normalizeDest(file.dest);
      return { src: file.src, relPath, absPath: join(this.input.root, relPath) };
    });
  }

  /**
   * Every destination that already exists and may not be overwritten, and
   * every staging file (`<dest>.tmp`) already present.
   */
  private async findConflicts(manifest: Manifest, targets: readonly FileTarget[]): Promise<FileConflictError[]> {
    const { policy, ledger } = this.input;
    const conflicts: FileConflictError[] = [];
    for (const target of targets) {
      const tmpPath = tempPathFor(target.absPath);
      if ((await statIfExists(tmpPath)) !== undefined) {
        conflicts.push(new FileConflictError(tmpPath));
      }
      if (policy.force) continue;

      const stats = await statIfExists(target.absPath);
      if (stats === undefined) continue;
      if (
        policy.trustLedger === true &&
        stats.isFile() &&
        ledger.isRecorded(manifest.name, manifest.version, target.relPath, await hashFile(target.absPath))
      ) {
        continue;
      }
      conflicts.push(new FileConflictError(target.absPath, ledger.ownerOf(target.relPath)));
    }
    return conflicts;
  }

  /**
   * Rendered bytes per file, in manifest order. Binary files are copied as-is.
   *
   * @throws {TemplateError} naming the first file with missing or undeclared variables
   */
  private renderFiles(manifest: Manifest, targets: readonly FileTarget[], bundle: ReadonlyMap<string, Uint8Array>): Uint8Array[] {
    const values = { ...manifest.templateDefaults, ...this.input.variables[manifest.name] };
    const encoder = new TextEncoder();
    const texts: string[] = [];

    const contents = targets.map((target) => {
      const bytes = bundle.get(target.src) ?? new Uint8Array();
      const text = decodeText(bytes);
      if (text === undefined) return bytes;
      texts.push(text);
      return encoder.encode(render(text, values, { declared: manifest.templateVariables, file: target.src }));
    });

    for (const unused of findUnusedVariables(manifest.templateVariables, texts)) {
      this.settings.onWarning({
        code: "UNUSED_TEMPLATE_VARIABLE",
        message: `${componentId(manifest)} declares template variable '${unused}' but no file uses it`,
        component: manifest.name,
      });
    }
    return contents;
  }

  private throwIfCancelled(name: string): void {
    if (this.input.signal?.aborted === true) {
      throw new InstallCancelledError(name);
    }
  }

  private failed(step: PlanStep, errors: readonly ArmoryError[]): FailedResult {
    const [error = new InternalError("install failed without an error")] = errors;
    return {
      name: step.manifest.name,
      version: step.manifest.version,
      requestedDirectly: step.requestedDirectly,
      status: "failed",
      error,
      errors: errors.length > 0 ? errors : [error],
    };
  }
}

/**
 * True when writing `relPath` would replace the ledger, a directory above it
 * or anything beside it in its own directory.
 */
function overlapsLedger(relPath: string, ledgerRelPath: string): boolean {
  if (relPath === ledgerRelPath || ledgerRelPath.startsWith(`${relPath}/`)) return true;
  const ledgerDir = posix.dirname(ledgerRelPath);
  return ledgerDir !== "." && relPath.startsWith(`${ledgerDir}/`);
}

/**
 * Stats for `path`, or undefined when nothing is there. A path below a
 * regular file (`file.txt/x`) counts as absent; writing it fails later.
 */
async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await lstat(path);
  } catch (error: unknown) {
    const code = getErrnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") return undefined;
    throw new IOError("stat", path, error);
  }
}
