export { DEFAULT_CONCURRENCY, DEFAULT_LEDGER_PATH, MAX_CONCURRENCY } from "@armory/installer";

export const CONFIG_FILE_NAME = "armory.json";

export const DEFAULT_MAX_MANIFESTS = 500;
export const DEFAULT_MAX_BUNDLES = 100;

/** Environment variables that override armory.json */
export const ENV_CONCURRENCY = "ARMORY_CONCURRENCY";
export const ENV_LEDGER_PATH = "ARMORY_LEDGER_PATH";
