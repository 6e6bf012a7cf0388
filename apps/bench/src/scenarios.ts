import { performance } from "node:perf_hooks";
import { SCENARIOS, scaledSize, type ScenarioName } from "@pathweave/config";
import {
  aStar,
  bellmanFord,
  distanceMatrix,
  floydWarshall,
  implicitAStar,
  implicitBellmanFord,
  implicitDijkstra,
  numberCost,
  pathWeight,
  shortestPath,
  singleSourceDistances,
  type DistanceTable,
  type Graph
} from "@pathweave/pathfinding";
import type { Config } from "./config.js";
import type { BenchLogger } from "./logger.js";
import { generateGrid, generateRandomGraph, gridManhattan } from "./graphs.js";

export type ScenarioResult = {
  scenario: ScenarioName;
  label: string;
  nodes: number;
  iterations: number;
  meanMs: number;
  minMs: number;
  maxMs: number;
  /** Whether the cross-check against another algorithm agreed */
  consistent: boolean;
};

type Workload = {
  nodes: number;
  /** One timed run; returns whether its result passed the cross-check */
  run: () => boolean;
};

export function sameRow(a: Map<number, number>, b: Map<number, number>): boolean {
  if (a.size !== b.size) return false;
  for (const [to, value] of a) {
    if (b.get(to) !== value) return false;
  }
  return true;
}

export function sameTable(a: DistanceTable<number, number>, b: DistanceTable<number, number>): boolean {
  if (a.size !== b.size) return false;
  for (const [from, row] of a) {
    const other = b.get(from);
    if (!other || !sameRow(row, other)) return false;
  }
  return true;
}

function implicitSuccessors(graph: Graph<number, number>) {
  return (node: number) => graph.successors(node).map((edge) => [edge.to, edge.weight] as const);
}

function buildWorkload(name: ScenarioName, config: Config): Workload {
  const scenario = SCENARIOS[name];

  if (scenario.shape === "grid") {
    const side = scaledSize(config.BENCH_GRID_SIZE, name);
    const graph = generateGrid(side, config.BENCH_SEED);
    const goal = side * side - 1;
    const heuristic = gridManhattan(side);

    switch (name) {
      case "a-star":
        return {
          nodes: side * side,
          run: () =>
            aStar(graph, 0, goal, heuristic, numberCost)?.totalWeight ===
            shortestPath(graph, 0, goal, numberCost)?.totalWeight
        };
      case "implicit":
        return {
          nodes: side * side,
          run: () => {
            const successors = implicitSuccessors(graph);
            const isGoal = (node: number) => node === goal;
            const dijkstra = implicitDijkstra(0, successors, isGoal, numberCost);
            const astar = implicitAStar(0, successors, isGoal, (node) => heuristic(node, goal), numberCost);
            const spfa = implicitBellmanFord(0, successors, isGoal, numberCost);
            return dijkstra === astar && spfa.type === "found-goal" && spfa.cost === dijkstra;
          }
        };
      default:
        return {
          nodes: side * side,
          run: () => {
            const path = shortestPath(graph, 0, goal, numberCost);
            return path !== null && pathWeight(graph, path.nodes, numberCost) === path.totalWeight;
          }
        };
    }
  }

  const nodes = scaledSize(config.BENCH_RANDOM_NODES, name);
  const graph = generateRandomGraph({
    nodes,
    edgeFactor: config.BENCH_EDGE_FACTOR,
    seed: config.BENCH_SEED,
    negativeWeights: scenario.negativeWeights
  });

  switch (name) {
    case "floyd-warshall":
      return {
        nodes,
        run: () => {
          const all = floydWarshall(graph, numberCost);
          if (!all.ok) return false;
          return sameRow(singleSourceDistances(graph, 0, numberCost), all.distances.get(0) ?? new Map());
        }
      };
    case "distance-matrix":
      return {
        nodes,
        run: () => {
          // Every fourth node stays under the density crossover, so auto picks sparse
          const pois = Array.from({ length: nodes }, (_, i) => i).filter((i) => i % 4 === 0);
          const sparse = distanceMatrix(graph, pois, numberCost);
          const dense = distanceMatrix(graph, pois, numberCost, { strategy: "dense" });
          return sparse.ok && dense.ok && sameTable(sparse.distances, dense.distances);
        }
      };
    default:
      return {
        nodes,
        run: () => {
          const result = bellmanFord(graph, 0, nodes - 1, numberCost);
          if (result.type === "negative-cycle") return false;
          return result.type === "no-path" || pathWeight(graph, result.path.nodes, numberCost) === result.path.totalWeight;
        }
      };
  }
}

export function runScenario(name: ScenarioName, config: Config, logger: BenchLogger): ScenarioResult {
  const workload = buildWorkload(name, config);
  const timings: number[] = [];
  let consistent = true;

  for (let i = 0; i < config.BENCH_ITERATIONS; i++) {
    const start = performance.now();
    const passed = workload.run();
    timings.push(performance.now() - start);
    consistent = consistent && passed;
  }

  const result: ScenarioResult = {
    scenario: name,
    label: SCENARIOS[name].label,
    nodes: workload.nodes,
    iterations: timings.length,
    meanMs: timings.reduce((sum, ms) => sum + ms, 0) / timings.length,
    minMs: Math.min(...timings),
    maxMs: Math.max(...timings),
    consistent
  };

  if (!consistent) {
    logger.warn({ scenario: name }, "[bench] cross-check failed");
  }
  logger.info({ ...result }, `[bench] ${result.label}`);
  return result;
}

export function runBenchmarks(config: Config, logger: BenchLogger): ScenarioResult[] {
  logger.debug({ seed: config.BENCH_SEED, scenarios: config.BENCH_SCENARIOS }, "[bench] starting");
  return config.BENCH_SCENARIOS.map((name) => runScenario(name, config, logger));
}
