import type { Provenance } from "./types.js";

export const USAGE_FETCH_ERROR_CODES = ["NO_CREDENTIAL", "NETWORK", "HTTP", "DECODING"] as const;

export type UsageFetchErrorCode = (typeof USAGE_FETCH_ERROR_CODES)[number];

export interface UsageFetchErrorOptions {
  readonly status?: number;
  readonly body?: string;
  readonly cause?: unknown;
  readonly provenance?: Provenance | null;
}

export class UsageFetchError extends Error {
  readonly code: UsageFetchErrorCode;
  readonly status: number | null;
  readonly body: string | null;
  /** Source of the credential the failed request used; null when none was resolved. */
  readonly provenance: Provenance | null;

  constructor(code: UsageFetchErrorCode, message: string, options: UsageFetchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "UsageFetchError";
    this.code = code;
    this.status = options.status ?? null;
    this.body = options.body ?? null;
    this.provenance = options.provenance ?? null;
  }

  static noCredential(preferred: Provenance): UsageFetchError {
    return new UsageFetchError("NO_CREDENTIAL", `No ${preferred} credential is available`);
  }

  static network(cause: unknown, provenance: Provenance): UsageFetchError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new UsageFetchError("NETWORK", `Usage request failed: ${detail}`, { cause, provenance });
  }

  static http(status: number, body: string, provenance: Provenance): UsageFetchError {
    return new UsageFetchError("HTTP", `Usage API responded with status ${status}`, {
      status,
      body,
      provenance,
    });
  }

  static decoding(cause: unknown, provenance: Provenance): UsageFetchError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new UsageFetchError("DECODING", `Usage response could not be decoded: ${detail}`, {
      cause,
      provenance,
    });
  }
}

export function isUnauthorized(err: unknown): err is UsageFetchError {
  return err instanceof UsageFetchError && err.code === "HTTP" && err.status === 401;
}
