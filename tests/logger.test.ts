import { describe, expect, it } from "vitest";
import { createComponentLogger, createLogger, silentLogger } from "../src/utils/logger.js";

describe("createLogger", () => {
  it("writes at the configured level", () => {
    const logger = createLogger({ level: "warn" });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("tags component loggers", () => {
    const logger = createComponentLogger(createLogger({ level: "silent" }), "router");

    expect(logger.bindings()).toMatchObject({ component: "router" });
    expect(logger.level).toBe("silent");
  });

  it("keeps the shared silent logger quiet", () => {
    expect(silentLogger.isLevelEnabled("fatal")).toBe(false);
  });
});
