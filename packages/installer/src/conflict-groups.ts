/**
 * Conflict groups: components whose destination paths overlap must not be
 * installed at the same time. Two destinations overlap when they are equal
 * or one is a directory prefix of the other (`lib` and `lib/util.py`).
 */

import type { PlanStep } from "@armory/core";
import { normalizeDest } from "@armory/manifest";

/**
 * For each component, the component before it (in plan order) in the same
 * conflict group, or undefined when it is the first of its group.
 */
export function conflictPredecessors(steps: readonly PlanStep[]): Map<string, string | undefined> {
  const parent = steps.map((_, index) => index);
  const find = (index: number): number => {
    let root = index;
    for (let next = parent[root]; next !== undefined && next !== root; next = parent[root]) {
      root = next;
    }
    parent[index] = root;
    return root;
  };
  const union = (a: number, b: number): void => {
    const ra = find(a);
    const rb = find(b);
    if (ra !== rb) parent[Math.max(ra, rb)] = Math.min(ra, rb);
  };

  const fileOwner = new Map<string, number>();
  const dirUsers = new Map<string, number[]>();
  steps.forEach((step, index) => {
    for (const file of step.manifest.files) {
      const dest = normalizeDest(file.dest);
      const owner = fileOwner.get(dest);
      if (owner === undefined) {
        fileOwner.set(dest, index);
      } else {
        union(owner, index);
      }
      for (const user of dirUsers.get(dest) ?? []) union(user, index);

      for (const dir of ancestors(dest)) {
        const users = dirUsers.get(dir);
        if (users === undefined) {
          dirUsers.set(dir, [index]);
        } else {
          users.push(index);
        }
        const fileAtDir = fileOwner.get(dir);
        if (fileAtDir !== undefined) union(fileAtDir, index);
      }
    }
  });

  const lastInGroup = new Map<number, string>();
  const predecessors = new Map<string, string | undefined>();
  steps.forEach((step, index) => {
    const group = find(index);
    predecessors.set(step.manifest.name, lastInGroup.get(group));
    lastInGroup.set(group, step.manifest.name);
  });
  return predecessors;
}

/** `a/b/c.txt` → `["a", "a/b"]` */
function ancestors(dest: string): string[] {
  const segments = dest.split("/");
  const dirs: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    dirs.push(segments.slice(0, i).join("/"));
  }
  return dirs;
}
