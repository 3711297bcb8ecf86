import type { ServiceState } from "../monitor/state.js";
import type { BucketId } from "../usage/types.js";

/** How long a widget host should wait before asking for a new entry. */
export const WIDGET_REFRESH_MS = 15 * 60 * 1000;

export interface WidgetLimit {
  readonly id: BucketId;
  readonly title: string;
  readonly utilization: number;
  readonly resetAt: number | null;
}

export interface WidgetEntry {
  readonly date: number;
  readonly limits: readonly WidgetLimit[];
  /** Gauge value for the five-hour window, when known. */
  readonly sessionUtilization: number | null;
  readonly error: string | null;
  readonly isPlaceholder: boolean;
  readonly nextRefreshAt: number;
}

const WIDGET_TITLES: ReadonlyArray<readonly [BucketId, string]> = [
  ["five_hour", "Session"],
  ["seven_day", "All"],
  ["seven_day_opus", "Opus"],
  ["seven_day_sonnet", "Sonnet"],
];

export function toWidgetEntry(state: ServiceState, now: number): WidgetEntry {
  const base = { date: now, nextRefreshAt: now + WIDGET_REFRESH_MS };

  if (state.initializing) {
    return { ...base, limits: [], sessionUtilization: null, error: null, isPlaceholder: true };
  }
  if (!state.hasCredential) {
    return {
      ...base,
      limits: [],
      sessionUtilization: null,
      error: "No API token configured",
      isPlaceholder: false,
    };
  }

  const limits: WidgetLimit[] = [];
  for (const [id, title] of WIDGET_TITLES) {
    const bucket = state.snapshot.buckets.find((b) => b.id === id);
    if (!bucket) continue;
    limits.push({ id, title, utilization: bucket.utilizationRatio, resetAt: bucket.resetAt });
  }

  const session = limits.find((l) => l.id === "five_hour");
  return {
    ...base,
    limits,
    sessionUtilization: session ? session.utilization : null,
    error: state.lastError ? "Failed to fetch usage" : null,
    isPlaceholder: false,
  };
}
