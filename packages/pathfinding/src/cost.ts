import type { CostAlgebra } from "./types.js";

export const numberCost: CostAlgebra<number> = {
  zero: 0,
  add: (a, b) => a + b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};

export const bigintCost: CostAlgebra<bigint> = {
  zero: 0n,
  add: (a, b) => a + b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
};

/**
 * Pair two algebras into one over `[A, B]`. Costs add component-wise and
 * compare on the first component, falling back to the second on ties.
 * Useful for "fewest transfers, then shortest time" style searches.
 */
export function lexicographicCost<A, B>(
  first: CostAlgebra<A>,
  second: CostAlgebra<B>
): CostAlgebra<[A, B]> {
  return {
    zero: [first.zero, second.zero],
    add: (a, b) => [first.add(a[0], b[0]), second.add(a[1], b[1])],
    compare: (a, b) => {
      const primary = first.compare(a[0], b[0]);
      return primary !== 0 ? primary : second.compare(a[1], b[1]);
    },
  };
}

export function isLess<C>(cost: CostAlgebra<C>, a: C, b: C): boolean {
  return cost.compare(a, b) < 0;
}

export function minCost<C>(cost: CostAlgebra<C>, a: C, b: C): C {
  return cost.compare(b, a) < 0 ? b : a;
}

/**
 * True when `candidate` should replace `known`: there is no known cost yet,
 * or the candidate is strictly cheaper.
 */
export function improves<C>(cost: CostAlgebra<C>, candidate: C, known: C | undefined): boolean {
  return known === undefined || cost.compare(candidate, known) < 0;
}
