import { z } from "zod";
import type { RawUsageResponse } from "./types.js";

const rawWindowSchema = z.object({
  utilization: z.number().finite(),
  resets_at: z.string().nullish(),
});

const rawUsageResponseSchema = z.object({
  five_hour: rawWindowSchema.nullish(),
  seven_day: rawWindowSchema.nullish(),
  seven_day_oauth_apps: rawWindowSchema.nullish(),
  seven_day_opus: rawWindowSchema.nullish(),
  seven_day_sonnet: rawWindowSchema.nullish(),
});

const isoDateTimeSchema = z.string().datetime({ offset: true });

// Date.parse only promises millisecond precision.
const FRACTION_PATTERN = /\.(\d{3})\d+/;

/**
 * Parses an ISO-8601 instant with or without fractional seconds. Anything
 * else, including a missing value, yields null.
 */
export function parseResetDate(value: string | null | undefined): number | null {
  if (value == null) return null;
  if (!isoDateTimeSchema.safeParse(value).success) return null;

  const parsed = Date.parse(value.replace(FRACTION_PATTERN, ".$1"));
  return Number.isNaN(parsed) ? null : parsed;
}

/** Parses a usage response body. Throws on malformed JSON or an unexpected shape. */
export function decodeUsageResponse(body: string): RawUsageResponse {
  const json: unknown = JSON.parse(body);
  return rawUsageResponseSchema.parse(json);
}
