import type { Path } from "./types.js";

/**
 * Persistent path prefix carried in frontier entries. Extending a prefix
 * is O(1) and every entry shares the tail it was extended from.
 */
export type PathLink<N> = {
  node: N;
  previous: PathLink<N> | undefined;
};

export function extendPath<N>(previous: PathLink<N> | undefined, node: N): PathLink<N> {
  return { node, previous };
}

export function toPath<N, C>(link: PathLink<N>, totalWeight: C): Path<N, C> {
  const nodes: N[] = [];
  let current: PathLink<N> | undefined = link;
  while (current !== undefined) {
    nodes.push(current.node);
    current = current.previous;
  }
  // Built from goal back to source
  nodes.reverse();
  return { nodes, totalWeight };
}

/**
 * Walk a predecessor map back from `goal` to `source`.
 * Returns null if the chain breaks or revisits a node before reaching the source.
 */
export function pathFromPredecessors<N, C>(
  predecessors: Map<N, N>,
  source: N,
  goal: N,
  totalWeight: C
): Path<N, C> | null {
  const nodes: N[] = [goal];
  const seen = new Set<N>([goal]);
  let cursor = goal;
  while (cursor !== source) {
    const parent = predecessors.get(cursor);
    if (parent === undefined || seen.has(parent)) {
      return null;
    }
    nodes.push(parent);
    seen.add(parent);
    cursor = parent;
  }
  nodes.reverse();
  return { nodes, totalWeight };
}
