import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/config.ts";

describe("loadConfig", () => {
  test("defaults", () => {
    expect(loadConfig({})).toEqual({
      max_expression_length: 256,
      session: { ttl_ms: 1_800_000, cleanup_interval_ms: 300_000, max_sessions: 100 },
    });
  });

  test("reads overrides and falls back on invalid values", () => {
    const config = loadConfig({
      CALC_MAX_SESSIONS: "5",
      CALC_SESSION_TTL_MS: "abc",
      CALC_SESSION_CLEANUP_MS: "0",
      CALC_MAX_EXPRESSION_LENGTH: "-1",
    });
    expect(config).toEqual({
      max_expression_length: 256,
      session: { ttl_ms: 1_800_000, cleanup_interval_ms: 0, max_sessions: 5 },
    });
  });
});
