/**
 * Server configuration from environment variables
 * Unset or invalid values fall back to the defaults below.
 */

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().catch(fallback);

const ConfigSchema = z.object({
  CALC_MAX_EXPRESSION_LENGTH: positiveInt(256),
  CALC_SESSION_TTL_MS: positiveInt(30 * 60 * 1000), // 30 minutes
  CALC_SESSION_CLEANUP_MS: nonNegativeInt(5 * 60 * 1000), // 5 minutes, 0 = off
  CALC_MAX_SESSIONS: positiveInt(100),
});

export interface CalcConfig {
  max_expression_length: number;
  session: {
    ttl_ms: number;
    cleanup_interval_ms: number;
    max_sessions: number;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): CalcConfig {
  const parsed = ConfigSchema.parse(env);
  return {
    max_expression_length: parsed.CALC_MAX_EXPRESSION_LENGTH,
    session: {
      ttl_ms: parsed.CALC_SESSION_TTL_MS,
      cleanup_interval_ms: parsed.CALC_SESSION_CLEANUP_MS,
      max_sessions: parsed.CALC_MAX_SESSIONS,
    },
  };
}

export const config: CalcConfig = loadConfig();
