import type { BellmanFordResult, CostAlgebra, Graph } from "./types.js";
import { improves } from "./cost.js";
import { pathFromPredecessors } from "./path.js";

type Relaxation<N, C> = {
  distances: Map<N, C>;
  predecessors: Map<N, N>;
};

/**
 * One full pass over every edge leaving a reached node.
 * Returns true if any distance improved.
 */
export function relaxAll<N, C>(
  graph: Graph<N, C>,
  nodes: readonly N[],
  state: Relaxation<N, C>,
  cost: CostAlgebra<C>
): boolean {
  let changed = false;
  for (const node of nodes) {
    const from = state.distances.get(node);
    if (from === undefined) continue;

    for (const edge of graph.successors(node)) {
      const next = cost.add(from, edge.weight);
      if (improves(cost, next, state.distances.get(edge.to))) {
        state.distances.set(edge.to, next);
        state.predecessors.set(edge.to, node);
        changed = true;
      }
    }
  }
  return changed;
}

/**
 * Bellman-Ford shortest path. Handles negative edge weights.
 *
 * A negative cycle reachable from `source` makes the whole query
 * ill-defined, so it is reported even when `goal` could be reached
 * without touching the cycle.
 */
export function bellmanFord<N, C>(
  graph: Graph<N, C>,
  source: N,
  goal: N,
  cost: CostAlgebra<C>
): BellmanFordResult<N, C> {
  const nodes = [...graph.nodes()];
  if (!nodes.includes(source)) {
    nodes.push(source);
  }

  const state: Relaxation<N, C> = {
    distances: new Map<N, C>([[source, cost.zero]]),
    predecessors: new Map<N, N>(),
  };

  // |V| - 1 passes; a pass with no change means every later one is a no-op too
  for (let pass = 1; pass < nodes.length; pass++) {
    if (!relaxAll(graph, nodes, state, cost)) break;
  }

  if (relaxAll(graph, nodes, state, cost)) {
    return { type: "negative-cycle" };
  }

  const totalWeight = state.distances.get(goal);
  if (totalWeight === undefined) {
    return { type: "no-path" };
  }

  const path = pathFromPredecessors(state.predecessors, source, goal, totalWeight);
  return path ? { type: "shortest-path", path } : { type: "no-path" };
}
