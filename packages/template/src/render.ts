/**
 * Template substitution for component files.
 */

import { TemplateError } from "@armory/errors";

import { extractPlaceholders, PLACEHOLDER_PATTERN } from "./placeholders.js";

export type TemplateVariables = Readonly<Record<string, string>>;

export interface RenderOptions {
  /**
   * Names the manifest declares. When given, placeholders outside this set
   * are reported as `undeclared` even if a value was supplied.
   */
  readonly declared?: Iterable<string>;
  /** File name used in error messages */
  readonly file?: string;
}

/**
 * Replaces every `{{ name }}` in `content` with `variables[name]`.
 *
 * Values are inserted literally: a value that itself looks like a
 * placeholder is not expanded again. Content without placeholders is
 * returned unchanged.
 *
 * @throws {TemplateError} listing every distinct missing (and undeclared)
 *   name, in first-appearance order
 */
export function render(content: string, variables: TemplateVariables, options?: RenderOptions): string {
  const names = extractPlaceholders(content);
  if (names.length === 0) {
    return content;
  }

  const missing = names.filter((name) => !Object.hasOwn(variables, name));
  const declared = options?.declared ? new Set(options.declared) : undefined;
  const undeclared = declared ? names.filter((name) => !declared.has(name)) : [];

  if (missing.length > 0 || undeclared.length > 0) {
    throw new TemplateError(missing, {
      undeclared,
      ...(options?.file !== undefined ? { file: options.file } : {}),
    });
  }

  return content.replace(PLACEHOLDER_PATTERN, (match, name: string) => variables[name] ?? match);
}

/**
 * Declared variable names that no template in `contents` references.
 */
export function findUnusedVariables(declared: Iterable<string>, contents: Iterable<string>): string[] {
  const used = new Set<string>();
  for (const content of contents) {
    for (const name of extractPlaceholders(content)) used.add(name);
  }
  return [...new Set(declared)].filter((name) => !used.has(name));
}
