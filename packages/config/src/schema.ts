import { z } from "zod";

import { DEFAULT_CONCURRENCY, DEFAULT_LEDGER_PATH, MAX_CONCURRENCY } from "./constants.js";

const RelativePathSchema = z
  .string()
  .min(1)
  .refine((path) => !path.startsWith("/") && !/^[A-Za-z]:[\\/]/.test(path), {
    message: "Must be a path relative to the project root",
  })
  .refine((path) => path.split(/[\\/]/).every((segment) => segment !== ".."), {
    message: "Must not contain '..' segments",
  });

export const RegistryEntrySchema = z.object({
  alias: z.string().min(1),
  /** Registry directory; relative paths are resolved against the project root */
  path: z.string().min(1),
  priority: z.number().int().default(0),
});

export const ProjectConfigSchema = z
  .object({
    registries: z.array(RegistryEntrySchema).default([]),
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
    ledgerPath: RelativePathSchema.default(DEFAULT_LEDGER_PATH),
    variables: z.record(z.string(), z.record(z.string(), z.string())).default({}),
    cache: z
      .object({
        maxManifests: z.number().int().positive().optional(),
        maxBundles: z.number().int().positive().optional(),
      })
      .default({}),
    retry: z
      .object({
        attempts: z.number().int().min(1).optional(),
        baseDelayMs: z.number().min(0).optional(),
        factor: z.number().min(1).optional(),
      })
      .default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.registries.forEach((registry, index) => {
      if (seen.has(registry.alias)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["registries", index, "alias"],
          message: `Duplicate registry alias '${registry.alias}'`,
        });
      }
      seen.add(registry.alias);
    });
  });

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;
