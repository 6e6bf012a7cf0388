import { DISTANCE_MATRIX_DENSITY_FACTOR } from "@pathweave/config";
import type { CostAlgebra, DistanceTable, DistanceTableResult, Graph } from "./types.js";
import { floydWarshall } from "./floyd-warshall.js";
import { singleSourceDistances } from "./dijkstra.js";

/**
 * - dense: one Floyd-Warshall run, filtered to POI pairs
 * - sparse: one Dijkstra run per POI
 * - auto: dense when POIs make up more than 1/DISTANCE_MATRIX_DENSITY_FACTOR of the nodes
 */
export type DistanceMatrixStrategy = "auto" | "dense" | "sparse";

export type DistanceMatrixOptions = {
  strategy?: DistanceMatrixStrategy;
};

/**
 * Pick a strategy from POI density. The crossover only trades speed: both
 * strategies return the same table on graphs without negative weights.
 */
export function chooseStrategy(poiCount: number, nodeCount: number): "dense" | "sparse" {
  return poiCount * DISTANCE_MATRIX_DENSITY_FACTOR > nodeCount ? "dense" : "sparse";
}

/**
 * Shortest distances between every ordered pair of points of interest.
 * Unreachable pairs are absent.
 *
 * Only the dense strategy can detect a negative cycle; the sparse one
 * runs Dijkstra and so assumes non-negative weights.
 */
export function distanceMatrix<N, C>(
  graph: Graph<N, C>,
  pois: readonly N[],
  cost: CostAlgebra<C>,
  options: DistanceMatrixOptions = {}
): DistanceTableResult<N, C> {
  const targets = [...new Set(pois)];
  const { strategy = "auto" } = options;
  const resolved =
    strategy === "auto" ? chooseStrategy(targets.length, [...graph.nodes()].length) : strategy;

  if (resolved === "dense") {
    const all = floydWarshall(graph, cost);
    if (!all.ok) {
      return all;
    }
    return { ok: true, distances: restrict(all.distances, targets, cost) };
  }

  const distances: DistanceTable<N, C> = new Map();
  for (const source of targets) {
    const reached = singleSourceDistances(graph, source, cost);
    const entries = new Map<N, C>();
    for (const target of targets) {
      const value = reached.get(target);
      if (value !== undefined) {
        entries.set(target, value);
      }
    }
    distances.set(source, entries);
  }
  return { ok: true, distances };
}

function restrict<N, C>(
  table: DistanceTable<N, C>,
  targets: readonly N[],
  cost: CostAlgebra<C>
): DistanceTable<N, C> {
  const result: DistanceTable<N, C> = new Map();
  for (const source of targets) {
    const fromRow = table.get(source);
    // A POI the graph doesn't know is still zero from itself, as in the sparse strategy
    const entries = new Map<N, C>(fromRow ? [] : [[source, cost.zero]]);
    for (const target of targets) {
      const value = fromRow?.get(target);
      if (value !== undefined) {
        entries.set(target, value);
      }
    }
    result.set(source, entries);
  }
  return result;
}
