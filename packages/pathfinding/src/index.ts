export type {
  CostAlgebra,
  Edge,
  Graph,
  Path,
  BellmanFordResult,
  DistanceTable,
  DistanceTableResult,
  NegativeCycleError,
  Successors,
  ImplicitBellmanFordResult,
} from "./types.js";

export type { EdgeSpec, BuildGraphOptions } from "./graph.js";
export type { DistanceMatrixStrategy, DistanceMatrixOptions } from "./distance-matrix.js";

export { numberCost, bigintCost, lexicographicCost, minCost, isLess } from "./cost.js";
export { buildGraph, fromAdjacency, pathWeight } from "./graph.js";
export { Frontier } from "./frontier.js";
export { shortestPath, singleSourceDistances } from "./dijkstra.js";
export { aStar } from "./astar.js";
export { bellmanFord } from "./bellman-ford.js";
export { floydWarshall } from "./floyd-warshall.js";
export { distanceMatrix, chooseStrategy } from "./distance-matrix.js";
export {
  implicitDijkstra,
  implicitDijkstraBy,
  implicitAStar,
  implicitAStarBy,
} from "./implicit.js";
export { implicitBellmanFord, implicitBellmanFordBy } from "./implicit-bellman-ford.js";
