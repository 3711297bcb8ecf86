import { CredentialStoreError } from "../credentials/errors.js";
import { UsageFetchError } from "../usage/errors.js";
import { EMPTY_SNAPSHOT } from "../usage/types.js";
import type { Provenance, UsageSnapshot } from "../usage/types.js";

/** Serializable form of the last failure, as shown to subscribers. */
export interface StateError {
  readonly code: string;
  readonly message: string;
  readonly status?: number;
}

export interface ServiceState {
  /** True until the start-up credential check has run. */
  readonly initializing: boolean;
  readonly snapshot: UsageSnapshot;
  /** Epoch ms of the last successful fetch. */
  readonly lastUpdated: number | null;
  readonly lastError: StateError | null;
  readonly activeProvenance: Provenance | null;
  readonly hasCredential: boolean;
  readonly preferredProvenance: Provenance;
}

export function initialState(preferredProvenance: Provenance = "primary"): ServiceState {
  return freezeState({
    initializing: true,
    snapshot: EMPTY_SNAPSHOT,
    lastUpdated: null,
    lastError: null,
    activeProvenance: null,
    hasCredential: false,
    preferredProvenance,
  });
}

export function toStateError(err: unknown): StateError {
  if (err instanceof UsageFetchError || err instanceof CredentialStoreError) {
    return err.status === null
      ? { code: err.code, message: err.message }
      : { code: err.code, message: err.message, status: err.status };
  }
  if (err instanceof Error) {
    return { code: "UNKNOWN", message: err.message };
  }
  return { code: "UNKNOWN", message: String(err) };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function freezeState(state: ServiceState): ServiceState {
  return deepFreeze(state);
}
