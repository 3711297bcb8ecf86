import type { Logger } from "../logging/logger.js";
import type { TokenResolver } from "../credentials/resolver.js";
import { retry } from "../utils/retry.js";
import type { Credential, Provenance, UsageSnapshot } from "./types.js";
import type { UsageTransport, TransportResponse } from "./transport.js";
import { UsageFetchError, isUnauthorized } from "./errors.js";
import { decodeUsageResponse } from "./decode.js";
import { mapUsageResponse } from "./mapping.js";

export interface FetchOptions {
  /**
   * When set (the default), a 401 invalidates the credential cache and the
   * whole fetch runs once more. The second outcome is final.
   */
  readonly retryOnAuthFailure?: boolean;
}

export interface FetchResult {
  readonly snapshot: UsageSnapshot;
  readonly credential: Credential;
}

export interface UsageFetchPipelineDeps {
  readonly resolver: TokenResolver;
  readonly transport: UsageTransport;
  readonly logger: Logger;
  readonly now?: () => number;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class UsageFetchPipeline {
  private readonly resolver: TokenResolver;
  private readonly transport: UsageTransport;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: UsageFetchPipelineDeps) {
    this.resolver = deps.resolver;
    this.transport = deps.transport;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  async fetch(preferred: Provenance, options: FetchOptions = {}): Promise<FetchResult> {
    const retryOnAuthFailure = options.retryOnAuthFailure ?? true;

    return retry(() => this.fetchOnce(preferred), {
      maxAttempts: retryOnAuthFailure ? 2 : 1,
      shouldRetry: (err) => isUnauthorized(err),
      onRetry: () => {
        this.logger.info({ provenance: preferred }, "Got 401, invalidating credential cache and retrying");
        this.resolver.invalidate();
      },
    });
  }

  /** Checks a token against the usage endpoint without touching the cache. */
  async validate(secret: string): Promise<boolean> {
    try {
      const response = await this.transport.request({ secret, provenance: "manual" });
      return isSuccess(response.status);
    } catch (err) {
      this.logger.debug({ err }, "Token validation request failed");
      return false;
    }
  }

  private async fetchOnce(preferred: Provenance): Promise<FetchResult> {
    const credential = await this.resolver.resolve(preferred);
    if (!credential) {
      throw UsageFetchError.noCredential(preferred);
    }

    let response: TransportResponse;
    try {
      response = await this.transport.request(credential);
    } catch (err) {
      throw UsageFetchError.network(err, credential.provenance);
    }

    if (!isSuccess(response.status)) {
      throw UsageFetchError.http(response.status, response.body, credential.provenance);
    }

    let snapshot: UsageSnapshot;
    try {
      snapshot = mapUsageResponse(decodeUsageResponse(response.body), this.now());
    } catch (err) {
      throw UsageFetchError.decoding(err, credential.provenance);
    }

    this.resolver.markSucceeded(credential.provenance);
    this.logger.debug(
      { provenance: credential.provenance, buckets: snapshot.buckets.length },
      "Fetched usage",
    );
    return { snapshot, credential };
  }
}
