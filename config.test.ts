import { describe, expect, it } from "vitest";
import { logLevelFromEnv, parseModelConfig } from "./config.ts";
import { ConfigurationError } from "./errors.ts";

describe("parseModelConfig", () => {
  it("fills in defaults", () => {
    expect(parseModelConfig({})).toEqual({ verbose: false });
  });

  it("trims names", () => {
    expect(parseModelConfig({ name: "  paint " }).name).toBe("paint");
  });

  it("rejects blank names and unknown levels", () => {
    expect(() => parseModelConfig({ name: "   " })).toThrow(ConfigurationError);
    expect(() => parseModelConfig({ logLevel: "loud" })).toThrow(
      /^invalid model options: logLevel: /,
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseModelConfig({ precision: 3 })).toThrow(
      ConfigurationError,
    );
  });
});

describe("logLevelFromEnv", () => {
  it("reads LOG_LEVEL case-insensitively", () => {
    expect(logLevelFromEnv({ LOG_LEVEL: "DEBUG" })).toBe("debug");
  });

  it("treats unset and empty as no preference", () => {
    expect(logLevelFromEnv({})).toBeUndefined();
    expect(logLevelFromEnv({ LOG_LEVEL: " " })).toBeUndefined();
  });

  it("rejects unknown levels", () => {
    expect(() => logLevelFromEnv({ LOG_LEVEL: "loud" })).toThrow(
      "invalid LOG_LEVEL 'loud': expected one of " +
        "fatal, error, warn, info, debug, trace, silent",
    );
  });
});
