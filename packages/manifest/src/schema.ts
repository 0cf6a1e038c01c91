/**
 * Zod schema for component manifests — validates the normalized manifest
 * document before it is turned into a frozen {@link Manifest}.
 */

import { COMPONENT_TYPES } from "@armory/core";
import { z } from "zod";

import { isValidConstraint, isValidVersion } from "./constraint.js";

/** Letters, digits, `.`, `_`, `-`; must start with a letter or digit */
const COMPONENT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Template variable identifiers, as matched inside `{{ }}` */
export const TEMPLATE_VARIABLE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Relative path that cannot escape the directory it is resolved against:
 * no absolute prefix, no drive letter, no `..` segment, no empty segment.
 */
export function isSafeRelativePath(path: string): boolean {
  if (path.length === 0 || path.includes("\0")) return false;
  if (path.startsWith("/") || path.startsWith("\\")) return false;
  if (/^[A-Za-z]:/.test(path)) return false;
  const segments = path.split(/[\\/]/);
  return segments.every((segment) => segment.length > 0 && segment !== "..");
}

const safePathMessage = {
  message: "Must be a relative path without '..' segments",
};

export const ComponentNameSchema = z
  .string()
  .min(1)
  .max(214)
  .regex(COMPONENT_NAME_PATTERN, "Must contain only letters, digits, '.', '_' or '-'");

export const VersionSchema = z.string().refine(isValidVersion, {
  message: 'Must follow semver MAJOR.MINOR.PATCH[-pre] (e.g. "1.0.0")',
});

export const DependencySchema = z.object({
  name: ComponentNameSchema,
  versionConstraint: z.string().refine(isValidConstraint, {
    message: "Unsupported version constraint (use ==, >=, <=, >, <, ^, ~ or a space-separated range)",
  }),
});

export const ManifestFileSchema = z.object({
  src: z.string().refine(isSafeRelativePath, safePathMessage),
  dest: z.string().refine(isSafeRelativePath, safePathMessage),
});

export const TemplateVariableNameSchema = z
  .string()
  .regex(TEMPLATE_VARIABLE_PATTERN, "Must be an identifier ([A-Za-z_][A-Za-z0-9_]*)");

export const ManifestSchema = z
  .object({
    name: ComponentNameSchema,
    componentType: z.enum(COMPONENT_TYPES),
    version: VersionSchema,
    description: z.string().default(""),
    author: z.string().min(1).optional(),
    tags: z.array(z.string().min(1)).default([]),
    dependencies: z.array(DependencySchema).default([]),
    minLanguageVersion: z.string().min(1).optional(),
    files: z.array(ManifestFileSchema).default([]),
    templateVariables: z.array(TemplateVariableNameSchema).default([]),
    templateDefaults: z.record(z.string(), z.string()).default({}),
    environmentVariables: z.array(z.string().min(1)).default([]),
    postInstallMessage: z.string().optional(),
  })
  .superRefine((manifest, ctx) => {
    const seenDest = new Map<string, number>();
    manifest.files.forEach((file, index) => {
      const key = normalizeDest(file.dest);
      const previous = seenDest.get(key);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["files", index, "dest"],
          message: `Duplicates the destination of files[${previous}]`,
        });
      } else {
        seenDest.set(key, index);
      }
    });

    manifest.dependencies.forEach((dependency, index) => {
      if (dependency.name === manifest.name) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["dependencies", index, "name"],
          message: "A component cannot depend on itself",
        });
      }
    });

    const declared = new Set(manifest.templateVariables);
    for (const key of Object.keys(manifest.templateDefaults)) {
      if (!declared.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["templateDefaults", key],
          message: "Default given for a variable not listed in templateVariables",
        });
      }
    }
  });

export type ManifestDocument = z.infer<typeof ManifestSchema>;

/** Top-level keys the schema knows; everything else is carried in `extra`. */
export const KNOWN_MANIFEST_KEYS: ReadonlySet<string> = new Set(
  Object.keys(ManifestSchema.innerType().shape),
);

/**
 * Canonical form of a destination path for equality checks:
 * forward slashes, no `.` segments.
 */
export function normalizeDest(dest: string): string {
  return dest
    .split(/[\\/]/)
    .filter((segment) => segment !== ".")
    .join("/");
}
