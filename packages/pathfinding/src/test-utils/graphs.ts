import type { Graph } from "../types.js";
import { buildGraph, type EdgeSpec } from "../graph.js";

/** mulberry32: small seeded PRNG so generated graphs are reproducible */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Directed graph on nodes 0..nodeCount-1 with integer weights in [minWeight, maxWeight] */
export function randomGraph(
  nodeCount: number,
  edgeCount: number,
  seed: number,
  minWeight = 0,
  maxWeight = 9
): Graph<number, number> {
  const random = seededRandom(seed);
  const edges: EdgeSpec<number, number>[] = [];
  for (let i = 0; i < edgeCount; i++) {
    edges.push({
      from: randomInt(random, 0, nodeCount - 1),
      to: randomInt(random, 0, nodeCount - 1),
      weight: randomInt(random, minWeight, maxWeight),
    });
  }
  return buildGraph(edges, { nodes: Array.from({ length: nodeCount }, (_, i) => i) });
}

export const cellKey = (x: number, y: number): string => `${x},${y}`;

export function parseCell(key: string): [number, number] {
  const [x, y] = key.split(",").map(Number);
  return [x, y];
}

/** 4-connected grid with random weights in [1, 4]; some cells are walls */
export function gridGraph(width: number, height: number, seed: number, wallRatio = 0.2): Graph<string, number> {
  const random = seededRandom(seed);
  const open = new Set<string>();
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (random() >= wallRatio) {
        open.add(cellKey(x, y));
      }
    }
  }

  const edges: EdgeSpec<string, number>[] = [];
  for (const key of open) {
    const [x, y] = parseCell(key);
    for (const [dx, dy] of [[1, 0], [-1, 0], [0, 1], [0, -1]]) {
      const neighbor = cellKey(x + dx, y + dy);
      if (open.has(neighbor)) {
        edges.push({ from: key, to: neighbor, weight: randomInt(random, 1, 4) });
      }
    }
  }
  return buildGraph(edges, { nodes: [...open] });
}

export function manhattan(a: string, b: string): number {
  const [ax, ay] = parseCell(a);
  const [bx, by] = parseCell(b);
  return Math.abs(ax - bx) + Math.abs(ay - by);
}
