import { parseConfig } from "../../src/config/schema.js";
import type { MonitorConfig } from "../../src/config/types.js";
import type { TransportResponse } from "../../src/usage/transport.js";

export const PRIMARY_TOKEN = "sk-ant-oat01-test-primary";
export const MANUAL_TOKEN = "sk-ant-api03-test-manual";

/** Credentials blob in the shape the Claude CLI stores. */
export function primaryBlob(token: string = PRIMARY_TOKEN): string {
  return JSON.stringify({
    claudeAiOauth: {
      accessToken: token,
      refreshToken: "test-refresh",
      expiresAt: 1_900_000_000_000,
      scopes: ["user:inference"],
    },
  });
}

export function makeConfig(raw: unknown = {}): MonitorConfig {
  return parseConfig(raw);
}

export function usageBody(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    five_hour: { utilization: 42, resets_at: "2025-01-01T05:00:00Z" },
    seven_day: { utilization: 10, resets_at: "2025-01-07T00:00:00.000000+00:00" },
    seven_day_oauth_apps: null,
    seven_day_opus: { utilization: 0, resets_at: null },
    seven_day_sonnet: null,
    ...overrides,
  });
}

export function ok(body: string = usageBody()): TransportResponse {
  return { status: 200, body };
}

export function status(code: number, body = `{"error":"status ${code}"}`): TransportResponse {
  return { status: code, body };
}
