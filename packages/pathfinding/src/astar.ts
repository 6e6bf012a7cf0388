import type { CostAlgebra, Graph, Path } from "./types.js";
import { bestFirstPath } from "./dijkstra.js";

/**
 * A* search from `source` to `goal`, ordering the frontier by
 * accumulated cost plus `heuristic(node, goal)`.
 *
 * The returned path is only guaranteed to be shortest when the heuristic
 * is admissible (never overestimates the remaining cost). That is the
 * caller's responsibility; it is not checked. Edge weights must be
 * non-negative, as for Dijkstra.
 */
export function aStar<N, C>(
  graph: Graph<N, C>,
  source: N,
  goal: N,
  heuristic: (node: N, goal: N) => C,
  cost: CostAlgebra<C>
): Path<N, C> | null {
  return bestFirstPath(graph, source, goal, (node) => heuristic(node, goal), cost);
}
