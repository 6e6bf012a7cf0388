import type { CostAlgebra, Graph, Path } from "./types.js";
import { Frontier } from "./frontier.js";
import { extendPath, toPath, type PathLink } from "./path.js";
import { improves } from "./cost.js";

/**
 * An entry is stale when a cheaper route to its node is already known, or
 * when the node was already expanded at this cost or better.
 */
export function isStale<C>(cost: CostAlgebra<C>, entryCost: C, best: C | undefined, expandedAt: C | undefined): boolean {
  if (best !== undefined && cost.compare(entryCost, best) > 0) return true;
  return expandedAt !== undefined && cost.compare(expandedAt, entryCost) <= 0;
}

type PathEntry<N, C> = {
  cost: C;
  priority: C;
  link: PathLink<N>;
};

/**
 * Best-first search shared by Dijkstra and A*. With a zero heuristic the
 * priority is just the accumulated cost.
 */
export function bestFirstPath<N, C>(
  graph: Graph<N, C>,
  source: N,
  goal: N,
  estimate: (node: N) => C,
  cost: CostAlgebra<C>
): Path<N, C> | null {
  const best = new Map<N, C>([[source, cost.zero]]);
  // Cost each node was expanded at. A node is expanded again only if a
  // strictly cheaper route turns up later, which an admissible but
  // inconsistent heuristic can cause.
  const expanded = new Map<N, C>();
  const frontier = new Frontier<PathEntry<N, C>>((a, b) => cost.compare(a.priority, b.priority));

  frontier.push({
    cost: cost.zero,
    priority: cost.add(cost.zero, estimate(source)),
    link: extendPath(undefined, source),
  });

  let entry = frontier.pop();
  while (entry !== undefined) {
    const node = entry.link.node;
    if (!isStale(cost, entry.cost, best.get(node), expanded.get(node))) {
      if (node === goal) {
        return toPath(entry.link, entry.cost);
      }
      expanded.set(node, entry.cost);

      for (const edge of graph.successors(node)) {
        const next = cost.add(entry.cost, edge.weight);
        if (improves(cost, next, best.get(edge.to))) {
          best.set(edge.to, next);
          frontier.push({
            cost: next,
            priority: cost.add(next, estimate(edge.to)),
            link: extendPath(entry.link, edge.to),
          });
        }
      }
    }

    entry = frontier.pop();
  }

  return null; // Frontier exhausted without reaching the goal
}

/**
 * Dijkstra's shortest path from `source` to `goal`.
 *
 * Edge weights must never make a path cheaper (no negative weights);
 * use `bellmanFord` otherwise. Among several shortest paths the one
 * returned is deterministic for a given graph but otherwise unspecified.
 */
export function shortestPath<N, C>(
  graph: Graph<N, C>,
  source: N,
  goal: N,
  cost: CostAlgebra<C>
): Path<N, C> | null {
  return bestFirstPath(graph, source, goal, () => cost.zero, cost);
}

type DistanceEntry<N, C> = {
  cost: C;
  node: N;
};

/**
 * Shortest distance from `source` to every node it can reach.
 * Unreachable nodes are absent from the result; the source maps to zero.
 */
export function singleSourceDistances<N, C>(
  graph: Graph<N, C>,
  source: N,
  cost: CostAlgebra<C>
): Map<N, C> {
  const best = new Map<N, C>([[source, cost.zero]]);
  const settled = new Map<N, C>();
  const frontier = new Frontier<DistanceEntry<N, C>>((a, b) => cost.compare(a.cost, b.cost));
  frontier.push({ cost: cost.zero, node: source });

  let entry = frontier.pop();
  while (entry !== undefined) {
    const { node } = entry;
    if (!isStale(cost, entry.cost, best.get(node), settled.get(node))) {
      settled.set(node, entry.cost);

      for (const edge of graph.successors(node)) {
        if (settled.has(edge.to)) continue;
        const next = cost.add(entry.cost, edge.weight);
        if (improves(cost, next, best.get(edge.to))) {
          best.set(edge.to, next);
          frontier.push({ cost: next, node: edge.to });
        }
      }
    }
    entry = frontier.pop();
  }

  return settled;
}
