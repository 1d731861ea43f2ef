import { describe, it, expect } from "vitest";
import { NO_SOLUTION, formatPath, formatResult, formatRoute } from "../format.js";

describe("formatResult", () => {
  it("prints goal, created count and path", () => {
    expect(formatResult("maps/a.txt", "AS", { goal: 4, created: 5, path: [1, 2, 3, 4] })).toBe(
      "maps/a.txt AS\n4 5\n1 -> 2 -> 3 -> 4"
    );
  });

  it("reports a failed search", () => {
    expect(formatResult("a.txt", "BFS", { goal: null, created: 3, path: [] })).toBe("a.txt BFS\nNo solution found.");
  });
});

describe("formatPath", () => {
  it("joins string ids", () => {
    expect(formatPath(["NORTH RD", "EAST RD"])).toBe("NORTH RD -> EAST RD");
  });
});

describe("formatRoute", () => {
  it("prints path, cost and created count", () => {
    const text = formatRoute({ result: { goal: "B", created: 2, path: ["A", "B"] }, cost: 1.5, reweight: null });
    expect(text).toBe("Path: A -> B\nCost: 1.50\nNodes created: 2");
  });

  it("adds the reweight summary when edges were reweighted", () => {
    const text = formatRoute({
      result: { goal: null, created: 1, path: [] },
      cost: null,
      reweight: { total: 3, updated: 1, fallback: 1, skipped: 1, outcomes: [] }
    });
    expect(text).toBe(`Edges reweighted: 1/3 predicted, 1 static, 1 skipped\n${NO_SOLUTION}`);
  });

  it("marks a found path without a computable cost", () => {
    const text = formatRoute({ result: { goal: "A", created: 1, path: ["A"] }, cost: null, reweight: null });
    expect(text).toBe("Path: A\nCost: unknown\nNodes created: 1");
  });
});
