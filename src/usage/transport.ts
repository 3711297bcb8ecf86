import type { ApiConfig } from "../config/types.js";
import type { Credential } from "./types.js";

export interface TransportResponse {
  readonly status: number;
  readonly body: string;
}

/**
 * Performs one usage request. Resolves with whatever status the server
 * answered; rejects with a {@link TransportError} when no answer arrived.
 */
export interface UsageTransport {
  request(credential: Credential): Promise<TransportResponse>;
}

export class TransportError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "TransportError";
    this.timedOut = options.timedOut ?? false;
  }
}

export class HttpUsageTransport implements UsageTransport {
  constructor(
    private readonly config: ApiConfig,
    private readonly fetchFn: typeof fetch = (input, init) => fetch(input, init),
  ) {}

  async request(credential: Credential): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => {
      controller.abort();
    }, this.config.timeoutMs);

    try {
      const response = await this.fetchFn(this.config.endpoint, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${credential.secret}`,
          "anthropic-beta": this.config.betaHeader,
          "User-Agent": this.config.userAgent,
          Accept: "application/json",
        },
        signal: controller.signal,
      });
      const body = await response.text();
      return { status: response.status, body };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new TransportError(`Usage request timed out after ${this.config.timeoutMs}ms`, {
          cause: err,
          timedOut: true,
        });
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Usage request failed: ${detail}`, { cause: err });
    } finally {
      clearTimeout(timeoutHandle);
    }
  }
}
