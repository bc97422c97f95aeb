import { describe, expect, it } from "vitest";
import { createLogger, resolveLogLevel } from "../logger.js";

describe("resolveLogLevel", () => {
  it("uses the validated LOG_LEVEL", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "debug" })).toBe("debug");
    expect(resolveLogLevel({ VITEST: "true", LOG_LEVEL: "error" })).toBe("error");
  });

  it("stays silent under the test runner unless asked", () => {
    expect(resolveLogLevel({ VITEST: "true" })).toBe("silent");
  });

  it("rejects unknown levels before pino sees them", () => {
    expect(() => resolveLogLevel({ LOG_LEVEL: "verbose" })).toThrow("invalid environment: LOG_LEVEL");
  });

  it("tags child loggers with their module", () => {
    expect(createLogger("http").bindings()).toMatchObject({ module: "http" });
  });
});
