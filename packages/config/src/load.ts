/**
 * Reads `armory.json` from a project root and applies environment overrides.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigError, getErrnoCode, getErrorMessage } from "@armory/errors";
import type { z } from "zod";

import { CONFIG_FILE_NAME, ENV_CONCURRENCY, ENV_LEDGER_PATH } from "./constants.js";
import { type ProjectConfig, ProjectConfigSchema } from "./schema.js";

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Loads the project configuration. A missing `armory.json` yields the
 * defaults; `ARMORY_CONCURRENCY` and `ARMORY_LEDGER_PATH` win over the file.
 *
 * @throws {ConfigError} for unreadable or malformed JSON, bad environment
 *   values, or schema violations (every issue listed)
 */
export async function loadProjectConfig(
  projectRoot: string,
  env: Environment = process.env,
): Promise<ProjectConfig> {
  const path = join(projectRoot, CONFIG_FILE_NAME);
  const raw = await readConfigFile(path);
  const merged = isRecord(raw) ? { ...raw, ...environmentOverrides(env) } : raw;

  const result = ProjectConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(path, formatIssues(result.error), { cause: result.error });
  }
  return result.data;
}

async function readConfigFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error: unknown) {
    if (getErrnoCode(error) === "ENOENT") return {};
    throw new ConfigError(path, [`cannot be read: ${getErrorMessage(error)}`], { cause: error });
  }
  try {
    return JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigError(path, [`invalid JSON: ${getErrorMessage(error)}`], { cause: error });
  }
}

function environmentOverrides(env: Environment): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const concurrency = env[ENV_CONCURRENCY];
  if (concurrency !== undefined && concurrency !== "") {
    if (!/^\d+$/.test(concurrency.trim())) {
      throw new ConfigError("environment", [`${ENV_CONCURRENCY} must be an integer, got '${concurrency}'`]);
    }
    overrides["concurrency"] = Number(concurrency.trim());
  }

  const ledgerPath = env[ENV_LEDGER_PATH];
  if (ledgerPath !== undefined && ledgerPath !== "") {
    overrides["ledgerPath"] = ledgerPath;
  }
  return overrides;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
