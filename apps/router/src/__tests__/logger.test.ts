import { describe, it, expect } from "vitest";
import { createLogger } from "../logger.js";

describe("createLogger", () => {
  it("builds a stderr logger that stays quiet under test", () => {
    const logger = createLogger("info");
    expect(() => logger.info({ nodes: 4 }, "graph loaded")).not.toThrow();
    expect(() => logger.error({ err: new Error("boom") }, "command failed")).not.toThrow();
  });
});
