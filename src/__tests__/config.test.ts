import { describe, expect, it } from "vitest";
import { loadConfig, loadLogLevel } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      LOG_LEVEL: "info",
      MAX_EDIT_DISTANCE: 2,
      LOWERCASE: true,
    });
  });

  it("coerces environment strings", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "debug",
      SNAPSHOT_PATH: "/var/lib/words.json",
      MAX_EDIT_DISTANCE: "3",
      LOWERCASE: "0",
    });
    expect(config).toEqual({
      PORT: 8080,
      LOG_LEVEL: "debug",
      SNAPSHOT_PATH: "/var/lib/words.json",
      MAX_EDIT_DISTANCE: 3,
      LOWERCASE: false,
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(/PORT/);
    expect(() => loadConfig({ MAX_EDIT_DISTANCE: "9" })).toThrow(/MAX_EDIT_DISTANCE/);
    expect(() => loadConfig({ LOWERCASE: "yes" })).toThrow(/LOWERCASE/);
  });
});

describe("loadLogLevel", () => {
  it("reads only the log level", () => {
    expect(loadLogLevel({ LOG_LEVEL: "warn", PORT: "http" })).toBe("warn");
    expect(loadLogLevel({})).toBe("info");
  });

  it("rejects unknown levels with the environment error", () => {
    expect(() => loadLogLevel({ LOG_LEVEL: "verbose" })).toThrow(/^invalid environment: LOG_LEVEL: /);
  });
});
