/**
 * Graph algorithms over the resolved dependency graph.
 *
 * Edges point from a component to its dependencies. Both functions visit
 * nodes in the order given and neighbours in the order stored, so their
 * output depends only on their input.
 */

export type DependencyEdges = ReadonlyMap<string, readonly string[]>;

/**
 * First cycle found by a depth-first search with a recursion stack.
 * Returns the cycle in traversal order, closed with its first node
 * (`["A", "B", "A"]`), or undefined when the graph is acyclic.
 */
export function findCycle(nodes: readonly string[], edges: DependencyEdges): string[] | undefined {
  const done = new Set<string>();
  const stack: string[] = [];
  const onStack = new Set<string>();

  function visit(node: string): string[] | undefined {
    stack.push(node);
    onStack.add(node);
    for (const next of edges.get(node) ?? []) {
      if (onStack.has(next)) {
        return [...stack.slice(stack.indexOf(next)), next];
      }
      if (!done.has(next)) {
        const cycle = visit(next);
        if (cycle !== undefined) return cycle;
      }
    }
    stack.pop();
    onStack.delete(node);
    done.add(node);
    return undefined;
  }

  for (const node of nodes) {
    if (done.has(node)) continue;
    const cycle = visit(node);
    if (cycle !== undefined) return cycle;
  }
  return undefined;
}

/**
 * Kahn's algorithm, dependencies first. Among ready nodes the one with the
 * lowest `rank` goes next, then the lexicographically smallest name.
 *
 * @throws {Error} when the graph has a cycle; call {@link findCycle} first
 */
export function topologicalOrder(
  nodes: readonly string[],
  edges: DependencyEdges,
  rank: (node: string) => number,
): string[] {
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    remaining.set(node, 0);
    dependents.set(node, []);
  }
  for (const node of nodes) {
    for (const dependency of new Set(edges.get(node) ?? [])) {
      if (!remaining.has(dependency)) continue;
      remaining.set(node, (remaining.get(node) ?? 0) + 1);
      dependents.get(dependency)?.push(node);
    }
  }

  const byPriority = (a: string, b: string): number =>
    rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0);

  const ready = nodes.filter((node) => remaining.get(node) === 0);
  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort(byPriority);
    const node = ready.shift();
    if (node === undefined) break;
    order.push(node);
    for (const dependent of dependents.get(node) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) ready.push(dependent);
    }
  }

  if (order.length !== nodes.length) {
    throw new Error("topologicalOrder: graph contains a cycle");
  }
  return order;
}
