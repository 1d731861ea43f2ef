import { describe, it, expect } from "vitest";
import {
  parseStrategyName,
  freeFlowSeconds,
  STRATEGIES,
  STRATEGY_NAMES,
  TRAVEL_TIME_MODEL
} from "./index.js";

describe("parseStrategyName", () => {
  it("accepts every canonical name", () => {
    for (const name of STRATEGY_NAMES) {
      expect(parseStrategyName(name)).toBe(name);
    }
  });

  it("is case-insensitive and trims whitespace", () => {
    expect(parseStrategyName(" bfs ")).toBe("BFS");
    expect(parseStrategyName("cus2")).toBe("CUS2");
  });

  it("resolves aliases", () => {
    expect(parseStrategyName("astar")).toBe("AS");
    expect(parseStrategyName("A*")).toBe("AS");
    expect(parseStrategyName("ucs")).toBe("CUS1");
  });

  it("returns null for unknown names", () => {
    expect(parseStrategyName("dijkstra")).toBeNull();
    expect(parseStrategyName("")).toBeNull();
  });
});

describe("STRATEGIES", () => {
  it("marks only GBFS, AS and CUS2 as informed", () => {
    const informed = STRATEGY_NAMES.filter((name) => STRATEGIES[name].informed);
    expect(informed).toEqual(["GBFS", "AS", "CUS2"]);
  });
});

describe("freeFlowSeconds", () => {
  it("adds the fixed delay to distance at the speed limit", () => {
    // 1 km at 60 km/h = 60 s, plus 30 s delay
    expect(freeFlowSeconds(1)).toBe(90);
  });

  it("treats negative distances as zero", () => {
    expect(freeFlowSeconds(-5)).toBe(TRAVEL_TIME_MODEL.delayS);
  });
});
