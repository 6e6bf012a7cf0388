// =============================================================================
// Search Tuning
// =============================================================================

/**
 * Crossover for distanceMatrix: with P points of interest on a graph of V
 * nodes, Floyd-Warshall is used when P * factor > V, one Dijkstra run per
 * point otherwise. Purely a speed trade-off; both give the same table.
 */
export const DISTANCE_MATRIX_DENSITY_FACTOR = 3;

// =============================================================================
// Benchmark Scenarios
// =============================================================================

export type ScenarioName =
  | "shortest-path"
  | "a-star"
  | "bellman-ford"
  | "floyd-warshall"
  | "distance-matrix"
  | "implicit";

export type GraphShape = "grid" | "random";

export type ScenarioConfig = {
  label: string;
  shape: GraphShape;
  /** Scale applied to the configured graph size. Cubic algorithms get smaller graphs. */
  sizeFactor: number;
  /** Whether generated edge weights may go negative */
  negativeWeights: boolean;
};

export const SCENARIOS: Record<ScenarioName, ScenarioConfig> = {
  "shortest-path": {
    label: "Dijkstra shortest path",
    shape: "grid",
    sizeFactor: 1,
    negativeWeights: false
  },
  "a-star": {
    label: "A* with Manhattan heuristic",
    shape: "grid",
    sizeFactor: 1,
    negativeWeights: false
  },
  "bellman-ford": {
    label: "Bellman-Ford",
    shape: "random",
    sizeFactor: 0.5,
    negativeWeights: true
  },
  "floyd-warshall": {
    label: "Floyd-Warshall all pairs",
    shape: "random",
    sizeFactor: 0.25,
    negativeWeights: false
  },
  "distance-matrix": {
    label: "Distance matrix (dense vs sparse)",
    shape: "random",
    sizeFactor: 0.5,
    negativeWeights: false
  },
  implicit: {
    label: "Implicit Dijkstra / A* / SPFA",
    shape: "grid",
    sizeFactor: 1,
    negativeWeights: false
  }
};

// Ordered list for reporting
export const SCENARIO_ORDER: ScenarioName[] = [
  "shortest-path",
  "a-star",
  "bellman-ford",
  "floyd-warshall",
  "distance-matrix",
  "implicit"
];

export function isScenarioName(value: string): value is ScenarioName {
  return SCENARIO_ORDER.some((name) => name === value);
}

/**
 * Scale a base node count for a scenario, never below 2 nodes.
 */
export function scaledSize(base: number, scenario: ScenarioName): number {
  return Math.max(2, Math.round(base * SCENARIOS[scenario].sizeFactor));
}
