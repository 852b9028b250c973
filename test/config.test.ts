import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import { InvalidArgumentError } from "../src/errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", logPretty: false, expressionCacheSize: 256 });
  });

  it("reads and normalizes variables", () => {
    expect(
      loadConfig({
        TABLEQUERY_LOG_LEVEL: " DEBUG ",
        TABLEQUERY_LOG_PRETTY: "True",
        TABLEQUERY_EXPRESSION_CACHE_SIZE: "0",
      }),
    ).toEqual({ logLevel: "debug", logPretty: true, expressionCacheSize: 0 });
  });

  it("falls back to LOG_LEVEL", () => {
    expect(loadConfig({ LOG_LEVEL: "warn" }).logLevel).toBe("warn");
    expect(loadConfig({ LOG_LEVEL: "warn", TABLEQUERY_LOG_LEVEL: "error" }).logLevel).toBe("error");
    expect(loadConfig({ LOG_LEVEL: "warn", TABLEQUERY_LOG_LEVEL: "  " }).logLevel).toBe("warn");
  });

  it.each([
    [{ TABLEQUERY_LOG_LEVEL: "verbose" }, "logLevel"],
    [{ TABLEQUERY_LOG_PRETTY: "yes" }, "logPretty"],
    [{ TABLEQUERY_EXPRESSION_CACHE_SIZE: "-1" }, "expressionCacheSize"],
    [{ TABLEQUERY_EXPRESSION_CACHE_SIZE: "lots" }, "expressionCacheSize"],
  ])("rejects %o", (env, key) => {
    expect(() => loadConfig(env)).toThrow(InvalidArgumentError);
    expect(() => loadConfig(env)).toThrow(`Invalid configuration: ${key}`);
  });
});
