import { describe, expect, it } from "vitest";
import { shortestPath, singleSourceDistances } from "./dijkstra.js";
import { buildGraph, pathWeight } from "./graph.js";
import { bigintCost, lexicographicCost, numberCost } from "./cost.js";
import { randomGraph } from "./test-utils/graphs.js";

const triangle = buildGraph([
  { from: 1, to: 2, weight: 5 },
  { from: 2, to: 3, weight: 3 },
  { from: 1, to: 3, weight: 10 },
]);

describe("shortestPath", () => {
  it("prefers the cheaper two-hop route over the direct edge", () => {
    expect(shortestPath(triangle, 1, 3, numberCost)).toEqual({ nodes: [1, 2, 3], totalWeight: 8 });
  });

  it("returns a single-node path when source is the goal", () => {
    expect(shortestPath(triangle, 2, 2, numberCost)).toEqual({ nodes: [2], totalWeight: 0 });
  });

  it("returns null when the goal is unreachable", () => {
    expect(shortestPath(triangle, 3, 1, numberCost)).toBeNull();
  });

  it("returns null for a goal outside the graph", () => {
    expect(shortestPath(triangle, 1, 99, numberCost)).toBeNull();
  });

  it("skips the stale entry left behind by a cheaper route", () => {
    const graph = buildGraph([
      { from: "a", to: "c", weight: 10 },
      { from: "a", to: "b", weight: 1 },
      { from: "b", to: "c", weight: 1 },
      { from: "c", to: "d", weight: 1 },
    ]);
    expect(shortestPath(graph, "a", "d", numberCost)).toEqual({
      nodes: ["a", "b", "c", "d"],
      totalWeight: 3,
    });
  });

  it("is deterministic when several shortest paths exist", () => {
    const graph = buildGraph([
      { from: "s", to: "x", weight: 1 },
      { from: "s", to: "y", weight: 1 },
      { from: "x", to: "t", weight: 1 },
      { from: "y", to: "t", weight: 1 },
    ]);
    const first = shortestPath(graph, "s", "t", numberCost);
    const second = shortestPath(graph, "s", "t", numberCost);
    expect(first?.totalWeight).toBe(2);
    expect(second).toEqual(first);
  });

  it("works with bigint costs", () => {
    const graph = buildGraph([
      { from: "a", to: "b", weight: 2n ** 60n },
      { from: "b", to: "c", weight: 2n ** 60n },
    ]);
    expect(shortestPath(graph, "a", "c", bigintCost)?.totalWeight).toBe(2n ** 61n);
  });

  it("orders tuple costs lexicographically", () => {
    // [transfers, minutes]
    const graph = buildGraph<string, [number, number]>([
      { from: "home", to: "bus", weight: [1, 5] },
      { from: "bus", to: "work", weight: [0, 5] },
      { from: "home", to: "walk", weight: [0, 20] },
      { from: "walk", to: "work", weight: [0, 20] },
    ]);
    const path = shortestPath(graph, "home", "work", lexicographicCost(numberCost, numberCost));
    expect(path).toEqual({ nodes: ["home", "walk", "work"], totalWeight: [0, 40] });
  });

  it("reports a total weight equal to the fold of its edges", () => {
    for (let seed = 1; seed <= 20; seed++) {
      const graph = randomGraph(15, 40, seed);
      for (let goal = 0; goal < 15; goal++) {
        const path = shortestPath(graph, 0, goal, numberCost);
        if (!path) continue;
        expect(path.nodes[0]).toBe(0);
        expect(path.nodes[path.nodes.length - 1]).toBe(goal);
        expect(pathWeight(graph, path.nodes, numberCost)).toBe(path.totalWeight);
      }
    }
  });
});

describe("singleSourceDistances", () => {
  it("returns the distance to every reachable node", () => {
    expect(singleSourceDistances(triangle, 1, numberCost)).toEqual(
      new Map([
        [1, 0],
        [2, 5],
        [3, 8],
      ])
    );
  });

  it("omits unreachable nodes", () => {
    const graph = buildGraph([
      { from: 1, to: 2, weight: 1 },
      { from: 3, to: 1, weight: 1 },
    ]);
    const distances = singleSourceDistances(graph, 1, numberCost);
    expect(distances.has(3)).toBe(false);
    expect(distances.size).toBe(2);
  });

  it("matches shortestPath for every target", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const graph = randomGraph(12, 30, seed);
      const distances = singleSourceDistances(graph, 0, numberCost);
      for (let goal = 0; goal < 12; goal++) {
        expect(shortestPath(graph, 0, goal, numberCost)?.totalWeight).toBe(distances.get(goal));
      }
    }
  });
});
