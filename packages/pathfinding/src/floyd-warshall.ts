import type { CostAlgebra, DistanceTable, DistanceTableResult, Graph } from "./types.js";
import { improves } from "./cost.js";

function row<N, C>(table: DistanceTable<N, C>, node: N): Map<N, C> {
  let entries = table.get(node);
  if (!entries) {
    entries = new Map<N, C>();
    table.set(node, entries);
  }
  return entries;
}

/**
 * All-pairs shortest distances.
 *
 * Each node starts at zero distance from itself, unless a cheaper
 * (negative) self-loop exists; positive self-loops are ignored. Any
 * diagonal entry that ends up below zero means a negative cycle.
 * Unreachable pairs are absent from the table.
 */
export function floydWarshall<N, C>(graph: Graph<N, C>, cost: CostAlgebra<C>): DistanceTableResult<N, C> {
  const nodes = [...graph.nodes()];
  const dist: DistanceTable<N, C> = new Map();

  for (const node of nodes) {
    row(dist, node).set(node, cost.zero);
  }

  for (const from of nodes) {
    const fromRow = row(dist, from);
    for (const edge of graph.successors(from)) {
      // Parallel edges keep the cheapest; self-loops only count if below zero
      if (improves(cost, edge.weight, fromRow.get(edge.to))) {
        fromRow.set(edge.to, edge.weight);
      }
    }
  }

  for (const k of nodes) {
    const kRow = row(dist, k);
    for (const i of nodes) {
      const iRow = row(dist, i);
      const ik = iRow.get(k);
      if (ik === undefined) continue;

      for (const [j, kj] of kRow) {
        const through = cost.add(ik, kj);
        if (improves(cost, through, iRow.get(j))) {
          iRow.set(j, through);
        }
      }
    }
  }

  for (const node of nodes) {
    const diagonal = row(dist, node).get(node);
    if (diagonal !== undefined && cost.compare(diagonal, cost.zero) < 0) {
      return { ok: false, error: { type: "negative-cycle", node } };
    }
  }

  return { ok: true, distances: dist };
}
