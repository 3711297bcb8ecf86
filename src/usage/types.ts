/** Which of the two credential sources a token came from. */
export type Provenance = "primary" | "manual";

export const PROVENANCES: readonly Provenance[] = ["primary", "manual"];

export function isProvenance(value: unknown): value is Provenance {
  return value === "primary" || value === "manual";
}

export interface Credential {
  readonly secret: string;
  readonly provenance: Provenance;
}

export type BucketId =
  | "five_hour"
  | "seven_day"
  | "seven_day_sonnet"
  | "seven_day_opus"
  | "seven_day_oauth_apps";

export interface UsageBucket {
  readonly id: BucketId;
  readonly title: string;
  /** Share of the limit consumed, 0 to 1. */
  readonly utilizationRatio: number;
  /** Epoch ms, or null when the API did not say (or said something unparseable). */
  readonly resetAt: number | null;
}

export interface UsageSnapshot {
  readonly buckets: readonly UsageBucket[];
  /** Epoch ms of the fetch that produced the buckets; null for the empty snapshot. */
  readonly fetchedAt: number | null;
}

export const EMPTY_SNAPSHOT: UsageSnapshot = Object.freeze({
  buckets: Object.freeze([]),
  fetchedAt: null,
});

/** One window as sent by the usage endpoint. */
export interface RawUsageWindow {
  readonly utilization: number;
  readonly resets_at?: string | null;
}

export type RawUsageResponse = {
  readonly [K in BucketId]?: RawUsageWindow | null;
};
