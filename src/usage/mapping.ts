import type { BucketId, RawUsageResponse, UsageBucket, UsageSnapshot } from "./types.js";
import { parseResetDate } from "./decode.js";

export interface BucketDefinition {
  readonly id: BucketId;
  readonly title: string;
  /** Shown even when idle; the other buckets only appear once they carry data. */
  readonly alwaysShow: boolean;
}

/** Display order of the buckets. */
export const BUCKET_DEFINITIONS = [
  { id: "five_hour", title: "Current session", alwaysShow: true },
  { id: "seven_day", title: "All models", alwaysShow: true },
  { id: "seven_day_sonnet", title: "Sonnet only", alwaysShow: false },
  { id: "seven_day_opus", title: "Opus only", alwaysShow: false },
  { id: "seven_day_oauth_apps", title: "OAuth apps", alwaysShow: false },
] as const satisfies readonly BucketDefinition[];

function toRatio(utilizationPercent: number): number {
  return Math.min(1, Math.max(0, utilizationPercent / 100));
}

export function mapUsageResponse(response: RawUsageResponse, fetchedAt: number): UsageSnapshot {
  const buckets: UsageBucket[] = [];

  for (const definition of BUCKET_DEFINITIONS) {
    const raw = response[definition.id];
    if (!raw) continue;

    const resetAt = parseResetDate(raw.resets_at);
    if (!definition.alwaysShow && raw.utilization <= 0 && resetAt === null) continue;

    buckets.push(
      Object.freeze({
        id: definition.id,
        title: definition.title,
        utilizationRatio: toRatio(raw.utilization),
        resetAt,
      }),
    );
  }

  return Object.freeze({ buckets: Object.freeze(buckets), fetchedAt });
}
