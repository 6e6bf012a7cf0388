import type { CostAlgebra, Edge, Graph } from "./types.js";
import { minCost } from "./cost.js";

export type EdgeSpec<N, C> = {
  from: N;
  to: N;
  weight: C;
};

export type BuildGraphOptions<N> = {
  /** Undirected graphs get a reverse edge for every spec. Default true. */
  directed?: boolean;
  /** Extra nodes to register even when no edge touches them */
  nodes?: N[];
};

/**
 * Wrap an adjacency map (node -> outgoing edges). Targets that have no
 * entry of their own still count as nodes.
 */
export function fromAdjacency<N, C>(adjacency: Map<N, Edge<N, C>[]>): Graph<N, C> {
  const nodeSet = new Set<N>();
  for (const [node, edges] of adjacency) {
    nodeSet.add(node);
    for (const edge of edges) {
      nodeSet.add(edge.to);
    }
  }
  const nodeList = [...nodeSet];

  return {
    nodes: () => nodeList,
    successors: (node) => adjacency.get(node) ?? [],
  };
}

export function buildGraph<N, C>(
  edges: EdgeSpec<N, C>[],
  options: BuildGraphOptions<N> = {}
): Graph<N, C> {
  const { directed = true, nodes = [] } = options;
  const adjacency = new Map<N, Edge<N, C>[]>();

  const addEdge = (from: N, edge: Edge<N, C>): void => {
    let list = adjacency.get(from);
    if (!list) {
      list = [];
      adjacency.set(from, list);
    }
    list.push(edge);
  };

  for (const node of nodes) {
    if (!adjacency.has(node)) {
      adjacency.set(node, []);
    }
  }

  for (const { from, to, weight } of edges) {
    addEdge(from, { to, weight });
    if (!directed && from !== to) {
      addEdge(to, { to: from, weight });
    }
  }

  return fromAdjacency(adjacency);
}

/**
 * Fold edge weights along a node sequence, taking the cheapest of any
 * parallel edges. Returns null when two consecutive nodes are not adjacent.
 */
export function pathWeight<N, C>(graph: Graph<N, C>, nodes: readonly N[], cost: CostAlgebra<C>): C | null {
  let total = cost.zero;
  for (let i = 1; i < nodes.length; i++) {
    let best: C | undefined;
    for (const edge of graph.successors(nodes[i - 1])) {
      if (edge.to === nodes[i]) {
        best = best === undefined ? edge.weight : minCost(cost, best, edge.weight);
      }
    }
    if (best === undefined) {
      return null;
    }
    total = cost.add(total, best);
  }
  return total;
}
