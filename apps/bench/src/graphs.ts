import { buildGraph, type EdgeSpec, type Graph } from "@pathweave/pathfinding";

/**
 * mulberry32. Benchmarks must see the same graphs on every run for a given seed.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export type GridCell = { x: number; y: number };

export function cellId(side: number, x: number, y: number): number {
  return y * side + x;
}

export function cellOf(side: number, id: number): GridCell {
  return { x: id % side, y: Math.floor(id / side) };
}

/**
 * 4-connected side x side grid, both directions, weights 1-9.
 * Node ids are row-major so the Manhattan distance can be recovered from them.
 */
export function generateGrid(side: number, seed: number): Graph<number, number> {
  const random = createRandom(seed);
  const edges: EdgeSpec<number, number>[] = [];

  for (let y = 0; y < side; y++) {
    for (let x = 0; x < side; x++) {
      const from = cellId(side, x, y);
      if (x + 1 < side) {
        const to = cellId(side, x + 1, y);
        edges.push({ from, to, weight: randomInt(random, 1, 9) });
        edges.push({ from: to, to: from, weight: randomInt(random, 1, 9) });
      }
      if (y + 1 < side) {
        const to = cellId(side, x, y + 1);
        edges.push({ from, to, weight: randomInt(random, 1, 9) });
        edges.push({ from: to, to: from, weight: randomInt(random, 1, 9) });
      }
    }
  }

  return buildGraph(edges, { nodes: side === 1 ? [0] : [] });
}

/** Lower bound on grid travel cost: every step costs at least 1 */
export function gridManhattan(side: number) {
  return (node: number, goal: number): number => {
    const a = cellOf(side, node);
    const b = cellOf(side, goal);
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  };
}

export type RandomGraphOptions = {
  nodes: number;
  edgeFactor: number;
  seed: number;
  /**
   * Allow negative weights. Weights are shifted by a random potential per
   * node (w + p(u) - p(v)), which keeps every cycle at its original,
   * positive total, so no negative cycle can appear.
   */
  negativeWeights?: boolean;
};

export function generateRandomGraph(options: RandomGraphOptions): Graph<number, number> {
  const { nodes, edgeFactor, seed, negativeWeights = false } = options;
  const random = createRandom(seed);
  const potential = Array.from({ length: nodes }, () => (negativeWeights ? randomInt(random, 0, 6) : 0));
  const edges: EdgeSpec<number, number>[] = [];

  // A spine keeps most of the graph reachable from node 0
  for (let node = 1; node < nodes; node++) {
    const from = randomInt(random, 0, node - 1);
    edges.push({ from, to: node, weight: randomInt(random, 1, 9) + potential[from] - potential[node] });
  }

  const extra = nodes * edgeFactor - (nodes - 1);
  for (let i = 0; i < extra; i++) {
    const from = randomInt(random, 0, nodes - 1);
    const to = randomInt(random, 0, nodes - 1);
    edges.push({ from, to, weight: randomInt(random, 1, 9) + potential[from] - potential[to] });
  }

  return buildGraph(edges, { nodes: Array.from({ length: nodes }, (_, i) => i) });
}
