/**
 * Stand-in for a numeric type. Every algorithm in this package is generic
 * over it, so costs can be numbers, bigints, or tuples compared
 * lexicographically.
 *
 * `add` must be associative and monotone (adding a weight never makes a
 * cost smaller) for Dijkstra, A* and Floyd-Warshall. Only Bellman-Ford,
 * SPFA and Floyd-Warshall tolerate negative weights.
 */
export type CostAlgebra<C> = {
  zero: C;
  add: (a: C, b: C) => C;
  /** Negative when a < b, zero when equal, positive when a > b */
  compare: (a: C, b: C) => number;
};

export type Edge<N, C> = {
  to: N;
  weight: C;
};

/**
 * The only view of graph storage the engine needs. `successors` must be
 * side-effect free and return edges in a stable order.
 */
export type Graph<N, C> = {
  nodes: () => Iterable<N>;
  successors: (node: N) => readonly Edge<N, C>[];
};

export type Path<N, C> = {
  nodes: N[]; // source..goal inclusive, never empty
  totalWeight: C;
};

export type BellmanFordResult<N, C> =
  | { type: "shortest-path"; path: Path<N, C> }
  | { type: "negative-cycle" }
  | { type: "no-path" };

export type DistanceTable<N, C> = Map<N, Map<N, C>>; // from -> to -> cost

export type NegativeCycleError<N> = {
  type: "negative-cycle";
  node: N; // a node whose distance to itself went below zero
};

export type DistanceTableResult<N, C> =
  | { ok: true; distances: DistanceTable<N, C> }
  | { ok: false; error: NegativeCycleError<N> };

export type Successors<S, C> = (state: S) => readonly (readonly [S, C])[];

export type ImplicitBellmanFordResult<C> =
  | { type: "found-goal"; cost: C }
  | { type: "negative-cycle" }
  | { type: "no-goal" };
