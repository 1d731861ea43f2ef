import { describe, expect, it, vi } from "vitest";
import { Graph } from "./graph.js";
import { reweightEdges, type Predictor, type VolumeHistory } from "./reweight.js";
import type { StaticEdge } from "./types.js";

const silentLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const staticEdges: StaticEdge[] = [
  { from: "A", to: "B", cost: 2 },
  { from: "B", to: "C", cost: 3 },
  { from: "C", to: "A" },
];

function buildGraph() {
  return new Graph(
    {
      nodes: new Map([
        ["A", [0, 0]],
        ["B", [1, 0]],
        ["C", [1, 1]],
      ]),
      edges: staticEdges,
      origin: "A",
      destinations: ["C"],
    },
    silentLogger()
  );
}

const average: Predictor = (window) => window.reduce((sum, v) => sum + v, 0) / window.length;

describe("reweightEdges", () => {
  it("updates, falls back and skips per edge", () => {
    const graph = buildGraph();
    const history: VolumeHistory = new Map([
      ["A", [10, 20, 30, 40, 50]],
      ["B", [1, 2]],
    ]);
    const predictor = vi.fn(average);
    const logger = silentLogger();

    const summary = reweightEdges(graph, staticEdges, history, predictor, { logger });

    expect(summary).toMatchObject({ total: 3, updated: 1, fallback: 1, skipped: 1 });
    expect(summary.outcomes).toEqual([
      { from: "A", to: "B", status: "updated", cost: 35 },
      { from: "B", to: "C", status: "fallback", cost: 3, reason: "short-history" },
      { from: "C", to: "A", status: "skipped", reason: "no-history" },
    ]);
    expect(predictor).toHaveBeenCalledTimes(1);
    expect(predictor).toHaveBeenCalledWith([20, 30, 40, 50], staticEdges[0]);
    expect(graph.edgeCost("A", "B")).toBe(35);
    expect(graph.edgeCost("B", "C")).toBe(3);
    expect(graph.edgeCost("C", "A")).toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith(
      { total: 3, updated: 1, fallback: 1, skipped: 1 },
      "edge reweight complete"
    );
  });

  it("falls back to the static cost when the predictor throws", () => {
    const graph = buildGraph();
    const logger = silentLogger();
    const error = new Error("model unavailable");
    const history: VolumeHistory = new Map([["A", [1, 2, 3, 4]]]);

    const summary = reweightEdges(
      graph,
      [staticEdges[0]],
      history,
      () => {
        throw error;
      },
      { logger }
    );

    expect(summary.outcomes).toEqual([
      { from: "A", to: "B", status: "fallback", cost: 2, reason: "predictor-error" },
    ]);
    expect(graph.edgeCost("A", "B")).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      { err: error, from: "A", to: "B" },
      "prediction failed, using static cost"
    );
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])(
    "never writes a prediction of %s",
    (prediction) => {
      const graph = buildGraph();
      graph.setEdgeCost("A", "B", 9);
      const history: VolumeHistory = new Map([["A", [1, 2, 3, 4]]]);

      const summary = reweightEdges(graph, [staticEdges[0]], history, () => prediction, {
        logger: silentLogger(),
      });

      expect(summary.outcomes[0]).toEqual({
        from: "A",
        to: "B",
        status: "fallback",
        cost: 2,
        reason: "invalid-prediction",
      });
      expect(graph.edgeCost("A", "B")).toBe(2);
    }
  );

  it("skips an edge whose prediction fails and has no static cost", () => {
    const graph = buildGraph();
    const history: VolumeHistory = new Map([["C", [5, 5, 5, 5]]]);

    const summary = reweightEdges(graph, [staticEdges[2]], history, () => Number.NaN, {
      logger: silentLogger(),
    });

    expect(summary.outcomes).toEqual([
      { from: "C", to: "A", status: "skipped", reason: "invalid-prediction" },
    ]);
    expect(graph.edgeCost("C", "A")).toBeUndefined();
  });

  it("is idempotent when there is not enough history", () => {
    const graph = buildGraph();
    const history: VolumeHistory = new Map([["A", [7]]]);
    const predictor = vi.fn(average);

    graph.setEdgeCost("A", "B", 100);
    reweightEdges(graph, staticEdges, history, predictor, { logger: silentLogger() });
    const first = graph.edges();
    reweightEdges(graph, staticEdges, history, predictor, { logger: silentLogger() });

    expect(graph.edges()).toEqual(first);
    expect(first).toEqual([
      { from: "A", to: "B", cost: 2 },
      { from: "B", to: "C", cost: 3 },
    ]);
    expect(predictor).not.toHaveBeenCalled();
  });

  it("honors a custom lookback window", () => {
    const graph = buildGraph();
    const history: VolumeHistory = new Map([["B", [4, 8]]]);
    const predictor = vi.fn(average);

    const summary = reweightEdges(graph, [staticEdges[1]], history, predictor, {
      window: 2,
      logger: silentLogger(),
    });

    expect(summary.updated).toBe(1);
    expect(predictor).toHaveBeenCalledWith([4, 8], staticEdges[1]);
    expect(graph.edgeCost("B", "C")).toBe(6);
  });

  it.each([0, -1, 2.5])("rejects a lookback window of %s", (window) => {
    const graph = buildGraph();
    const predictor = vi.fn(average);
    const history: VolumeHistory = new Map([["A", [1, 2, 3, 4, 5, 6]]]);

    expect(() => reweightEdges(graph, staticEdges, history, predictor, { window, logger: silentLogger() })).toThrow(
      RangeError
    );
    expect(predictor).not.toHaveBeenCalled();
    expect(graph.edgeCost("A", "B")).toBe(2);
  });

  it("leaves the node and destination sets untouched", () => {
    const graph = buildGraph();
    const history: VolumeHistory = new Map([["A", [1, 1, 1, 1]]]);

    reweightEdges(graph, staticEdges, history, () => 4, { logger: silentLogger() });

    expect(graph.nodeIds()).toEqual(["A", "B", "C"]);
    expect(Array.from(graph.destinations)).toEqual(["C"]);
    expect(graph.origin).toBe("A");
  });
});
