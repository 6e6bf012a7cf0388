import { describe, expect, it } from "vitest";
import { chooseStrategy, distanceMatrix } from "./distance-matrix.js";
import { buildGraph } from "./graph.js";
import { numberCost } from "./cost.js";
import { randomGraph } from "./test-utils/graphs.js";

describe("chooseStrategy", () => {
  it("stays sparse at exactly one third of the nodes", () => {
    expect(chooseStrategy(4, 12)).toBe("sparse");
  });

  it("switches to dense above one third", () => {
    expect(chooseStrategy(5, 12)).toBe("dense");
  });
});

describe("distanceMatrix", () => {
  const triangle = buildGraph([
    { from: 1, to: 2, weight: 5 },
    { from: 2, to: 3, weight: 3 },
    { from: 1, to: 3, weight: 10 },
  ]);

  it("keeps only point-of-interest pairs", () => {
    expect(distanceMatrix(triangle, [1, 3], numberCost)).toEqual({
      ok: true,
      distances: new Map([
        [1, new Map([[1, 0], [3, 8]])],
        [3, new Map([[3, 0]])],
      ]),
    });
  });

  it("gives the same table from both strategies for 4 of 12 nodes", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const graph = randomGraph(12, 30, seed);
      const pois = [0, 3, 7, 11];

      const sparse = distanceMatrix(graph, pois, numberCost, { strategy: "sparse" });
      const dense = distanceMatrix(graph, pois, numberCost, { strategy: "dense" });
      const auto = distanceMatrix(graph, pois, numberCost);

      expect(dense).toEqual(sparse);
      expect(auto).toEqual(sparse);
    }
  });

  it("gives the same table from both strategies above the crossover", () => {
    const graph = randomGraph(9, 25, 42);
    const pois = [0, 1, 2, 4, 8];
    expect(distanceMatrix(graph, pois, numberCost, { strategy: "dense" })).toEqual(
      distanceMatrix(graph, pois, numberCost, { strategy: "sparse" })
    );
  });

  it("collapses duplicate points of interest", () => {
    const result = distanceMatrix(triangle, [2, 2, 3], numberCost);
    expect(result.ok && [...result.distances.keys()]).toEqual([2, 3]);
  });

  it("puts a point of interest missing from the graph at zero from itself", () => {
    const expected = new Map([
      [1, new Map([[1, 0]])],
      [99, new Map([[99, 0]])],
    ]);
    expect(distanceMatrix(triangle, [1, 99], numberCost, { strategy: "dense" })).toEqual({ ok: true, distances: expected });
    expect(distanceMatrix(triangle, [1, 99], numberCost, { strategy: "sparse" })).toEqual({ ok: true, distances: expected });
  });

  it("reports a negative cycle from the dense strategy", () => {
    const graph = buildGraph([
      { from: "A", to: "B", weight: 1 },
      { from: "B", to: "A", weight: -2 },
    ]);
    expect(distanceMatrix(graph, ["A", "B"], numberCost)).toEqual({
      ok: false,
      error: { type: "negative-cycle", node: "A" },
    });
  });
});
