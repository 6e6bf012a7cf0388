import type { CostAlgebra, ImplicitBellmanFordResult, Successors } from "./types.js";
import { improves } from "./cost.js";

/**
 * SPFA over an implicit graph: a FIFO work-queue of keys, re-queued each
 * time their cost improves.
 *
 * Every re-queue of a key bumps its relaxation counter. Without a negative
 * cycle a key is queued at most once per round and a round can only extend
 * simple paths, so a counter above the number of keys discovered so far
 * means a negative cycle. That keeps the search finite on a finite space
 * with negative cycles.
 *
 * The whole reachable space is explored before answering, since a later
 * negative edge can still make a goal cheaper.
 */
export function implicitBellmanFordBy<S, K, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  visitedBy: (state: S) => K,
  cost: CostAlgebra<C>
): ImplicitBellmanFordResult<C> {
  const startKey = visitedBy(start);
  const distances = new Map<K, C>([[startKey, cost.zero]]);
  const states = new Map<K, S>([[startKey, start]]);
  const relaxations = new Map<K, number>([[startKey, 1]]);
  const queued = new Set<K>([startKey]);
  const queue: K[] = [startKey];

  for (let head = 0; head < queue.length; head++) {
    const key = queue[head];
    queued.delete(key);
    const state = states.get(key);
    const from = distances.get(key);
    if (state === undefined || from === undefined) continue;

    for (const [next, weight] of successors(state)) {
      const nextKey = visitedBy(next);
      const nextCost = cost.add(from, weight);
      if (!improves(cost, nextCost, distances.get(nextKey))) continue;

      distances.set(nextKey, nextCost);
      states.set(nextKey, next);
      if (queued.has(nextKey)) continue;

      const count = (relaxations.get(nextKey) ?? 0) + 1;
      if (count > distances.size) {
        return { type: "negative-cycle" };
      }
      relaxations.set(nextKey, count);
      queued.add(nextKey);
      queue.push(nextKey);
    }
  }

  let found: C | undefined;
  for (const [key, state] of states) {
    const distance = distances.get(key);
    if (distance !== undefined && isGoal(state) && improves(cost, distance, found)) {
      found = distance;
    }
  }

  return found === undefined ? { type: "no-goal" } : { type: "found-goal", cost: found };
}

/**
 * `implicitBellmanFordBy` keyed by the state itself. Negative edge weights
 * are allowed; a negative cycle reachable from `start` is reported instead
 * of looping forever.
 */
export function implicitBellmanFord<S, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  cost: CostAlgebra<C>
): ImplicitBellmanFordResult<C> {
  return implicitBellmanFordBy(start, successors, isGoal, (state) => state, cost);
}
