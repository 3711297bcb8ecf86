import type { Logger } from "../logging/logger.js";
import type { Credential, Provenance } from "../usage/types.js";
import type { CredentialStore } from "./store.js";
import { CredentialStoreError } from "./errors.js";
import { extractPrimaryToken, normalizeManualToken } from "./extract.js";

type CacheSlot =
  | { readonly loaded: false; readonly version: number }
  | { readonly loaded: true; readonly version: number; readonly secret: string | null };

interface PendingLoad {
  readonly version: number;
  readonly promise: Promise<string | null>;
}

type SecretLoader = (store: CredentialStore) => Promise<string | null>;

const LOADERS: Record<Provenance, SecretLoader> = {
  primary: async (store) => {
    const raw = await store.read("primary");
    return raw === null ? null : extractPrimaryToken(raw);
  },
  manual: async (store) => {
    const raw = await store.read("manual");
    return raw === null ? null : normalizeManualToken(raw);
  },
};

/**
 * Resolves the credential for a provenance, caching what the store returned,
 * including "nothing there", until {@link invalidate} is called.
 *
 * Every slot carries a version that invalidate, save and clear bump; a store
 * read that started under an older version still answers its callers but
 * does not populate the cache.
 */
export class TokenResolver {
  private readonly slots: Record<Provenance, CacheSlot> = {
    primary: { loaded: false, version: 0 },
    manual: { loaded: false, version: 0 },
  };
  private readonly pending = new Map<Provenance, PendingLoad>();
  private lastSucceeded: Provenance | null = null;

  constructor(
    private readonly store: CredentialStore,
    private readonly logger: Logger,
  ) {}

  /** Tries the preferred provenance only; there is no fallback to the other one. */
  async resolve(preferred: Provenance): Promise<Credential | null> {
    const secret = await this.load(preferred);
    return secret === null ? null : { secret, provenance: preferred };
  }

  async isAvailable(provenance: Provenance): Promise<boolean> {
    return (await this.load(provenance)) !== null;
  }

  invalidate(): void {
    for (const provenance of ["primary", "manual"] as const) {
      this.slots[provenance] = { loaded: false, version: this.slots[provenance].version + 1 };
    }
    this.pending.clear();
    this.logger.debug("Credential cache invalidated");
  }

  async saveManual(secret: string): Promise<void> {
    const token = normalizeManualToken(secret);
    if (token === null) {
      throw new CredentialStoreError("INVALID_DATA", "The manual token is empty");
    }
    await this.store.write("manual", token);
    this.settle("manual", token);
    this.logger.info("Saved manual token");
  }

  async clearManual(): Promise<void> {
    await this.store.delete("manual");
    this.settle("manual", null);
    if (this.lastSucceeded === "manual") this.lastSucceeded = null;
    this.logger.info("Cleared manual token");
  }

  /** Records the provenance whose credential last produced a successful fetch. */
  markSucceeded(provenance: Provenance): void {
    this.lastSucceeded = provenance;
  }

  get lastResolvedProvenance(): Provenance | null {
    return this.lastSucceeded;
  }

  private settle(provenance: Provenance, secret: string | null): void {
    const version = this.slots[provenance].version + 1;
    this.slots[provenance] = { loaded: true, version, secret };
    this.pending.delete(provenance);
  }

  private load(provenance: Provenance): Promise<string | null> {
    const slot = this.slots[provenance];
    if (slot.loaded) return Promise.resolve(slot.secret);

    const inFlight = this.pending.get(provenance);
    if (inFlight && inFlight.version === slot.version) return inFlight.promise;

    const version = slot.version;
    const promise = this.readFromStore(provenance).then((secret) => {
      if (this.slots[provenance].version === version) {
        this.slots[provenance] = { loaded: true, version, secret };
      }
      if (this.pending.get(provenance)?.version === version) {
        this.pending.delete(provenance);
      }
      return secret;
    });
    this.pending.set(provenance, { version, promise });
    return promise;
  }

  private async readFromStore(provenance: Provenance): Promise<string | null> {
    try {
      const secret = await LOADERS[provenance](this.store);
      if (secret === null) {
        this.logger.debug({ provenance }, "No credential in store");
      }
      return secret;
    } catch (err) {
      if (err instanceof CredentialStoreError) {
        this.logger.warn({ provenance, code: err.code, err }, "Credential could not be read");
      } else {
        this.logger.error({ provenance, err }, "Credential store failed");
      }
      return null;
    }
  }
}
