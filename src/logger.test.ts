import { describe, it, expect } from "vitest";
import { createLogger } from "./logger.js";
import { LOG_LEVELS } from "./config.js";

describe("createLogger", () => {
  it.each(LOG_LEVELS)("creates a logger at level %s", (logLevel) => {
    expect(createLogger({ logLevel }).level).toBe(logLevel);
  });

  it("suppresses debug output at info", () => {
    const logger = createLogger({ logLevel: "info" });
    expect(logger.isLevelEnabled("debug")).toBe(false);
    expect(logger.isLevelEnabled("warn")).toBe(true);
  });
});
