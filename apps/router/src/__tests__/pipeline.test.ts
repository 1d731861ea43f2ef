import { describe, it, expect, vi } from "vitest";
import { runRoutePipeline, type RouteRequest } from "../pipeline.js";
import { fixture, mockLogger } from "./helpers.js";

const PATH = ["NORTH RD", "EAST RD", "SOUTH RD", "WEST RD"];

function request(overrides: Partial<RouteRequest> = {}): RouteRequest {
  return {
    edgesPath: fixture("edges.csv"),
    coordsPath: fixture("coords.csv"),
    origin: "North Rd",
    destinations: ["West Rd"],
    strategy: "AS",
    logger: mockLogger(),
    ...overrides
  };
}

describe("runRoutePipeline", () => {
  it("searches on distances when no volumes are given", async () => {
    const outcome = await runRoutePipeline(request());
    expect(outcome).toEqual({
      result: { goal: "WEST RD", created: 5, path: PATH },
      cost: 4,
      reweight: null
    });
  });

  it("reweights edges from volume history before searching", async () => {
    const outcome = await runRoutePipeline(request({ volumePath: fixture("volumes.csv") }));

    expect(outcome?.result).toEqual({ goal: "WEST RD", created: 5, path: PATH });
    // 1.5 + 1.5 predicted minutes, then the 2 km static fallback
    expect(outcome?.cost).toBe(5);
    expect(outcome?.reweight).toMatchObject({ total: 5, updated: 3, fallback: 1, skipped: 1 });
    expect(outcome?.reweight?.outcomes).toContainEqual({
      from: "SOUTH RD",
      to: "WEST RD",
      status: "fallback",
      cost: 2,
      reason: "short-history"
    });
    expect(outcome?.reweight?.outcomes).toContainEqual({
      from: "WEST RD",
      to: "NORTH RD",
      status: "skipped",
      reason: "no-history"
    });
  });

  it("uses a supplied predictor and window", async () => {
    const predictor = vi.fn(() => 10);
    const outcome = await runRoutePipeline(
      request({ volumePath: fixture("volumes.csv"), predictor, window: 2, strategy: "CUS1" })
    );

    // SOUTH RD now has enough history too; only the costless edge is left out
    expect(outcome?.reweight).toMatchObject({ total: 5, updated: 4, fallback: 0, skipped: 1 });
    expect(predictor).toHaveBeenCalledWith([30, 40], { from: "NORTH RD", to: "EAST RD", cost: 1 });
    expect(outcome?.result.path).toEqual(["NORTH RD", "SOUTH RD", "WEST RD"]);
    expect(outcome?.cost).toBe(20);
  });

  it("returns null when the origin is not in the network", async () => {
    const logger = mockLogger();
    const outcome = await runRoutePipeline(request({ origin: "Nowhere", logger }));
    expect(outcome).toBeNull();
    expect(logger.error).toHaveBeenCalledWith({ origin: "Nowhere" }, "start node not found in graph");
  });

  it("returns null when no destination is in the network", async () => {
    const logger = mockLogger();
    const outcome = await runRoutePipeline(request({ destinations: ["Elsewhere"], logger }));
    expect(outcome).toBeNull();
    expect(logger.error).toHaveBeenCalledWith({ destinations: ["Elsewhere"] }, "end node not found in graph");
  });
});
