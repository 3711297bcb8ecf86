import type { ServiceState } from "../monitor/state.js";
import { formatPercent, formatTimeUntil } from "../utils/format.js";

export function formatStateLines(state: ServiceState, now: number): string[] {
  const lines = [
    `Source:      ${state.preferredProvenance}`,
    `Credential:  ${state.hasCredential ? `available (${state.activeProvenance ?? state.preferredProvenance})` : "none"}`,
  ];

  if (state.lastUpdated !== null) {
    lines.push(`Updated:     ${new Date(state.lastUpdated).toISOString()}`);
  }
  if (state.lastError) {
    const status = state.lastError.status === undefined ? "" : ` (${state.lastError.status})`;
    lines.push(`Error:       ${state.lastError.code}${status}: ${state.lastError.message}`);
  }

  if (state.snapshot.buckets.length === 0) {
    lines.push("Usage:       (no data)");
    return lines;
  }

  lines.push("Usage:");
  const width = Math.max(...state.snapshot.buckets.map((b) => b.title.length));
  for (const bucket of state.snapshot.buckets) {
    const reset = bucket.resetAt === null ? "" : `  ${describeReset(bucket.resetAt, now)}`;
    lines.push(`  ${bucket.title.padEnd(width)}  ${formatPercent(bucket.utilizationRatio).padStart(4)}${reset}`);
  }
  return lines;
}

function describeReset(resetAt: number, now: number): string {
  const until = formatTimeUntil(resetAt, now);
  return until === "now" ? "resetting now" : `resets in ${until}`;
}
