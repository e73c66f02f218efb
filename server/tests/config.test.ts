import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_AAVE_API_URL, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      apiUrl: DEFAULT_AAVE_API_URL,
      timeoutMs: 12_000,
      retry: { maxAttempts: 2, delayMs: 500 },
      logLevel: "info",
    });
  });

  it("reads overrides from string variables", () => {
    const config = loadConfig({
      AAVE_API_URL: "https://aave.test/graphql",
      AAVE_API_TIMEOUT_MS: "15000",
      AAVE_API_RETRY_ATTEMPTS: "1",
      AAVE_API_RETRY_DELAY_MS: "0",
      LOG_LEVEL: "debug",
    });

    expect(config).toEqual({
      apiUrl: "https://aave.test/graphql",
      timeoutMs: 15_000,
      retry: { maxAttempts: 1, delayMs: 0 },
      logLevel: "debug",
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ AAVE_API_TIMEOUT_MS: "  ", LOG_LEVEL: "" }).timeoutMs).toBe(12_000);
  });

  it("refuses more than one retry", () => {
    expect(() => loadConfig({ AAVE_API_RETRY_ATTEMPTS: "3" })).toThrow(ConfigError);
  });

  it("names every invalid variable", () => {
    try {
      loadConfig({ AAVE_API_URL: "not a url", LOG_LEVEL: "verbose" });
      expect.unreachable("loadConfig should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues.map((issue) => issue.split(":")[0])).toEqual([
        "AAVE_API_URL",
        "LOG_LEVEL",
      ]);
    }
  });
});
