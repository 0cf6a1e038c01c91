/**
 * Deep freeze utility for making parsed manifests immutable.
 */

/**
 * Recursively freezes an object and all nested objects/arrays.
 * Uses a WeakSet to handle circular references safely.
 * Typed-array views (bundle bytes) are skipped: freezing a non-empty
 * typed array throws.
 * Returns the same reference (freezes in-place, no clone).
 */
export function deepFreeze<T>(obj: T): T {
  if (obj === null || obj === undefined || typeof obj !== "object") {
    return obj;
  }

  freezeRecursive(obj, new WeakSet<object>());
  return obj;
}

function freezeRecursive(obj: object, seen: WeakSet<object>): void {
  if (seen.has(obj) || ArrayBuffer.isView(obj)) {
    return;
  }

  seen.add(obj);
  Object.freeze(obj);

  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object") {
      freezeRecursive(value, seen);
    }
  }
}
