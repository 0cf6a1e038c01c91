import { resolve } from "node:path";

import { ConfigError } from "@armory/errors";
import {
  CachingRegistryClient,
  FileSystemRegistry,
  MultiSourceRegistry,
  type MultiSourceRegistryOptions,
  RetryingRegistryClient,
} from "@armory/registry";

import { resolveInstallerConfig } from "./resolve.js";
import type { ProjectConfig } from "./schema.js";

/**
 * Builds the registry stack a project config describes: one retrying
 * filesystem registry per entry, searched by priority, behind one cache.
 *
 * @throws {ConfigError} when no registry is configured
 */
export function createRegistryFromConfig(
  config: Pick<ProjectConfig, "registries" | "cache" | "retry">,
  projectRoot: string,
  options?: MultiSourceRegistryOptions,
): CachingRegistryClient {
  if (config.registries.length === 0) {
    throw new ConfigError("registries", ["at least one registry must be configured"]);
  }
  const { cache, retry } = resolveInstallerConfig({ cache: config.cache, retry: config.retry });

  const sources = config.registries.map((entry) => ({
    alias: entry.alias,
    priority: entry.priority,
    client: new RetryingRegistryClient(
      new FileSystemRegistry(resolve(projectRoot, entry.path), { name: entry.alias }),
      retry,
    ),
  }));
  return new CachingRegistryClient(new MultiSourceRegistry(sources, options), cache);
}
