import { describe, expect, it } from "vitest";
import { implicitBellmanFord, implicitBellmanFordBy } from "./implicit-bellman-ford.js";
import { singleSourceDistances } from "./dijkstra.js";
import { numberCost } from "./cost.js";
import { randomGraph } from "./test-utils/graphs.js";

const fromTable =
  (edges: Record<string, [string, number][]>) =>
  (node: string): [string, number][] =>
    edges[node] ?? [];

describe("implicitBellmanFord", () => {
  it("counts up to the goal on a bounded line", () => {
    const successors = (n: number): [number, number][] => (n < 5 ? [[n + 1, 1]] : []);
    expect(implicitBellmanFord(0, successors, (n) => n === 5, numberCost)).toEqual({
      type: "found-goal",
      cost: 5,
    });
  });

  it("routes through negative edges", () => {
    const successors = fromTable({
      S: [["A", 4], ["B", 2]],
      B: [["A", -3]],
      A: [["G", 1]],
    });
    expect(implicitBellmanFord("S", successors, (s) => s === "G", numberCost)).toEqual({
      type: "found-goal",
      cost: 0,
    });
  });

  it("detects a negative cycle instead of looping", () => {
    const successors = fromTable({
      A: [["B", 1]],
      B: [["A", -2]],
    });
    expect(implicitBellmanFord("A", successors, (s) => s === "B", numberCost)).toEqual({
      type: "negative-cycle",
    });
  });

  it("detects a negative self-loop on the start state", () => {
    const successors = fromTable({ A: [["A", -1], ["G", 1]] });
    expect(implicitBellmanFord("A", successors, (s) => s === "G", numberCost)).toEqual({
      type: "negative-cycle",
    });
  });

  it("ignores zero-weight cycles", () => {
    const successors = fromTable({
      A: [["B", 0]],
      B: [["A", 0], ["G", 2]],
    });
    expect(implicitBellmanFord("A", successors, (s) => s === "G", numberCost)).toEqual({
      type: "found-goal",
      cost: 2,
    });
  });

  it("picks the cheapest of several goals", () => {
    const successors = fromTable({
      S: [["G1", 5], ["X", 1]],
      X: [["G2", 2]],
    });
    expect(implicitBellmanFord("S", successors, (s) => s.startsWith("G"), numberCost)).toEqual({
      type: "found-goal",
      cost: 3,
    });
  });

  it("reports no-goal when the space runs out", () => {
    const successors = fromTable({ S: [["A", 1]] });
    expect(implicitBellmanFord("S", successors, (s) => s === "Z", numberCost)).toEqual({ type: "no-goal" });
  });

  it("agrees with Dijkstra on non-negative graphs", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const graph = randomGraph(12, 30, seed);
      const distances = singleSourceDistances(graph, 0, numberCost);
      const successors = (n: number) => graph.successors(n).map((edge) => [edge.to, edge.weight] as const);
      for (let goal = 0; goal < 12; goal++) {
        const expected = distances.get(goal);
        expect(implicitBellmanFord(0, successors, (n) => n === goal, numberCost)).toEqual(
          expected === undefined ? { type: "no-goal" } : { type: "found-goal", cost: expected }
        );
      }
    }
  });

  it("never reports a cycle on negative-weight graphs that have none", () => {
    // Edges only go from lower to higher ids, so no cycle exists at all
    for (let seed = 1; seed <= 10; seed++) {
      const graph = randomGraph(15, 60, seed, -5, 9);
      const successors = (n: number) =>
        graph
          .successors(n)
          .filter((edge) => edge.to > n)
          .map((edge) => [edge.to, edge.weight] as const);
      const result = implicitBellmanFord(0, successors, (n) => n === 14, numberCost);
      expect(result.type).not.toBe("negative-cycle");
    }
  });
});

describe("implicitBellmanFordBy", () => {
  type Visit = { node: string; hops: number };

  const edges: Record<string, [string, number][]> = {
    S: [["A", 4], ["B", 2]],
    B: [["A", -3]],
    A: [["G", 1]],
  };
  const successors = (state: Visit): [Visit, number][] =>
    (edges[state.node] ?? []).map(([node, weight]): [Visit, number] => [{ node, hops: state.hops + 1 }, weight]);

  it("tracks cost per key and keeps the latest state for the goal check", () => {
    const result = implicitBellmanFordBy(
      { node: "S", hops: 0 },
      successors,
      (state) => state.node === "G" && state.hops === 3,
      (state) => state.node,
      numberCost
    );
    expect(result).toEqual({ type: "found-goal", cost: 0 });
  });

  it("detects a negative cycle through keyed states", () => {
    const cyclic = (state: Visit): [Visit, number][] => [
      [{ node: state.node === "A" ? "B" : "A", hops: state.hops + 1 }, state.node === "A" ? 1 : -2],
    ];
    const result = implicitBellmanFordBy({ node: "A", hops: 0 }, cyclic, () => false, (s) => s.node, numberCost);
    expect(result).toEqual({ type: "negative-cycle" });
  });
});
