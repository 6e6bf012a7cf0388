import type { CostAlgebra, Successors } from "./types.js";
import { Frontier } from "./frontier.js";
import { improves } from "./cost.js";
import { isStale } from "./dijkstra.js";

type StateEntry<S, C> = {
  cost: C;
  priority: C;
  state: S;
};

/**
 * Best-first search over a state space generated on demand.
 *
 * Deduplication and cost tracking go through `visitedBy(state)`, but the
 * full state is what `successors`, `isGoal` and `estimate` see. Two states
 * with the same key are treated as the same search node; the cheaper one
 * wins.
 */
function bestFirstCost<S, K, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  estimate: (state: S) => C,
  visitedBy: (state: S) => K,
  cost: CostAlgebra<C>
): C | null {
  const best = new Map<K, C>([[visitedBy(start), cost.zero]]);
  const expanded = new Map<K, C>();
  const frontier = new Frontier<StateEntry<S, C>>((a, b) => cost.compare(a.priority, b.priority));
  frontier.push({ cost: cost.zero, priority: cost.add(cost.zero, estimate(start)), state: start });

  let entry = frontier.pop();
  while (entry !== undefined) {
    const key = visitedBy(entry.state);
    if (!isStale(cost, entry.cost, best.get(key), expanded.get(key))) {
      if (isGoal(entry.state)) {
        return entry.cost;
      }
      expanded.set(key, entry.cost);

      for (const [next, weight] of successors(entry.state)) {
        const nextCost = cost.add(entry.cost, weight);
        const nextKey = visitedBy(next);
        if (improves(cost, nextCost, best.get(nextKey))) {
          best.set(nextKey, nextCost);
          frontier.push({ cost: nextCost, priority: cost.add(nextCost, estimate(next)), state: next });
        }
      }
    }
    entry = frontier.pop();
  }

  return null;
}

const identity = <S>(state: S): S => state;

/**
 * Dijkstra over an implicit graph. Returns the cost of the cheapest path
 * from `start` to any state satisfying `isGoal`, or null if the reachable
 * space runs out first.
 *
 * States are compared with `Map` key semantics, so use primitives or
 * `implicitDijkstraBy` with a key function for structured states. An
 * infinite state space with no reachable goal never terminates; bound it
 * in `successors`.
 */
export function implicitDijkstra<S, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  cost: CostAlgebra<C>
): C | null {
  return bestFirstCost(start, successors, isGoal, () => cost.zero, identity, cost);
}

/**
 * `implicitDijkstra` deduplicating by `visitedBy(state)` instead of the
 * state itself. Use when states carry payload (fuel left, items held)
 * that must not split the visited set.
 */
export function implicitDijkstraBy<S, K, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  visitedBy: (state: S) => K,
  cost: CostAlgebra<C>
): C | null {
  return bestFirstCost(start, successors, isGoal, () => cost.zero, visitedBy, cost);
}

/**
 * A* over an implicit graph. `heuristic(state)` estimates the remaining
 * cost to the nearest goal and must never overestimate it for the result
 * to be optimal (not checked).
 */
export function implicitAStar<S, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  heuristic: (state: S) => C,
  cost: CostAlgebra<C>
): C | null {
  return bestFirstCost(start, successors, isGoal, heuristic, identity, cost);
}

export function implicitAStarBy<S, K, C>(
  start: S,
  successors: Successors<S, C>,
  isGoal: (state: S) => boolean,
  heuristic: (state: S) => C,
  visitedBy: (state: S) => K,
  cost: CostAlgebra<C>
): C | null {
  return bestFirstCost(start, successors, isGoal, heuristic, visitedBy, cost);
}
