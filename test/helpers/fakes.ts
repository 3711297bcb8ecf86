import pino from "pino";
import type { Logger } from "../../src/logging/logger.js";
import type { CredentialStore, SecretName, WritableSecretName } from "../../src/credentials/store.js";
import type { PreferenceStore } from "../../src/monitor/preferences.js";
import type { TransportResponse, UsageTransport } from "../../src/usage/transport.js";
import type { Credential } from "../../src/usage/types.js";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** In-memory secrets with per-name failure injection and read counters. */
export class MemoryCredentialStore implements CredentialStore {
  readonly kind = "memory";
  readonly secrets = new Map<SecretName, string>();
  readonly reads: Record<SecretName, number> = { primary: 0, manual: 0 };
  readonly readErrors = new Map<SecretName, Error>();
  writeError: Error | null = null;
  deleteError: Error | null = null;

  constructor(initial: Partial<Record<SecretName, string>> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      if ((name === "primary" || name === "manual") && value !== undefined) {
        this.secrets.set(name, value);
      }
    }
  }

  async read(name: SecretName): Promise<string | null> {
    this.reads[name]++;
    const error = this.readErrors.get(name);
    if (error) throw error;
    return this.secrets.get(name) ?? null;
  }

  async write(name: WritableSecretName, secret: string): Promise<void> {
    if (this.writeError) throw this.writeError;
    this.secrets.set(name, secret);
  }

  async delete(name: WritableSecretName): Promise<void> {
    if (this.deleteError) throw this.deleteError;
    this.secrets.delete(name);
  }
}

export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type Reply = TransportResponse | Error | Deferred<TransportResponse>;

/**
 * Answers requests from a queue of replies; once the queue is empty the
 * fallback reply is used. Every request is recorded.
 */
export class FakeTransport implements UsageTransport {
  readonly requests: Credential[] = [];
  private readonly replies: Reply[] = [];

  constructor(private fallback: Reply = { status: 200, body: "{}" }) {}

  enqueue(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  setFallback(reply: Reply): void {
    this.fallback = reply;
  }

  async request(credential: Credential): Promise<TransportResponse> {
    this.requests.push(credential);
    const reply = this.replies.shift() ?? this.fallback;
    if (reply instanceof Error) throw reply;
    if ("promise" in reply) return reply.promise;
    return reply;
  }
}

export class MemoryPreferenceStore implements PreferenceStore {
  readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) this.values.set(key, value);
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}
