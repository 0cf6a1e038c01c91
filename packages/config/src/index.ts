/**
 * @armory/config
 *
 * Project configuration (`armory.json`), environment overrides and
 * installer defaults.
 */

export {
  CONFIG_FILE_NAME,
  DEFAULT_CONCURRENCY,
  DEFAULT_LEDGER_PATH,
  DEFAULT_MAX_BUNDLES,
  DEFAULT_MAX_MANIFESTS,
  ENV_CONCURRENCY,
  ENV_LEDGER_PATH,
  MAX_CONCURRENCY,
} from "./constants.js";
export { type Environment, loadProjectConfig } from "./load.js";
export { createRegistryFromConfig } from "./registry-factory.js";
export { resolveInstallerConfig } from "./resolve.js";
export { type ProjectConfig, ProjectConfigSchema, type RegistryEntry, RegistryEntrySchema } from "./schema.js";
export type { InstallerConfig, ResolvedInstallerConfig } from "./types.js";

export const PACKAGE_NAME = "@armory/config";
