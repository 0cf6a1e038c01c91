/**
 * @armory/template
 *
 * `{{ variable }}` scanning and substitution for component source files.
 */

export { extractPlaceholders, hasPlaceholders, PLACEHOLDER_PATTERN } from "./placeholders.js";
export { findUnusedVariables, type RenderOptions, render, type TemplateVariables } from "./render.js";

export const PACKAGE_NAME = "@armory/template";
