/**
 * Placeholder grammar: `{{ identifier }}` with optional inner whitespace,
 * identifier = `[A-Za-z_][A-Za-z0-9_]*`. Anything else between braces is
 * left alone.
 */
export const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Distinct placeholder names in `content`, in order of first appearance.
 */
export function extractPlaceholders(content: string): string[] {
  const seen = new Set<string>();
  for (const match of content.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined) seen.add(name);
  }
  return [...seen];
}

/**
 * True when `content` contains at least one placeholder.
 */
export function hasPlaceholders(content: string): boolean {
  PLACEHOLDER_PATTERN.lastIndex = 0;
  const found = PLACEHOLDER_PATTERN.test(content);
  PLACEHOLDER_PATTERN.lastIndex = 0;
  return found;
}
