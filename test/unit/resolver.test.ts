import { describe, it, expect, beforeEach } from "vitest";
import { TokenResolver } from "../../src/credentials/resolver.js";
import { CredentialStoreError } from "../../src/credentials/errors.js";
import { MemoryCredentialStore, deferred, silentLogger } from "../helpers/fakes.js";
import { MANUAL_TOKEN, PRIMARY_TOKEN, primaryBlob } from "../helpers/fixtures.js";

describe("TokenResolver", () => {
  let store: MemoryCredentialStore;
  let resolver: TokenResolver;

  beforeEach(() => {
    store = new MemoryCredentialStore({ primary: primaryBlob(), manual: MANUAL_TOKEN });
    resolver = new TokenResolver(store, silentLogger());
  });

  it("resolves the preferred provenance", async () => {
    expect(await resolver.resolve("primary")).toEqual({ secret: PRIMARY_TOKEN, provenance: "primary" });
    expect(await resolver.resolve("manual")).toEqual({ secret: MANUAL_TOKEN, provenance: "manual" });
  });

  it("does not fall back to the other provenance", async () => {
    store.secrets.delete("manual");
    expect(await resolver.resolve("manual")).toBeNull();
    expect(store.reads.primary).toBe(0);
  });

  it("caches values, including absence", async () => {
    store.secrets.delete("manual");
    await resolver.resolve("primary");
    await resolver.resolve("primary");
    await resolver.resolve("manual");
    await resolver.resolve("manual");
    expect(store.reads).toEqual({ primary: 1, manual: 1 });
  });

  it("re-reads the store after invalidate", async () => {
    await resolver.resolve("primary");
    store.secrets.set("primary", primaryBlob("sk-ant-oat01-test-rotated"));
    resolver.invalidate();

    expect(await resolver.resolve("primary")).toEqual({
      secret: "sk-ant-oat01-test-rotated",
      provenance: "primary",
    });
    expect(store.reads.primary).toBe(2);
  });

  it("shares one store read between concurrent resolves", async () => {
    const results = await Promise.all([
      resolver.resolve("primary"),
      resolver.resolve("primary"),
      resolver.resolve("primary"),
    ]);
    expect(results.map((r) => r?.secret)).toEqual([PRIMARY_TOKEN, PRIMARY_TOKEN, PRIMARY_TOKEN]);
    expect(store.reads.primary).toBe(1);
  });

  it("does not cache a read that started before invalidate", async () => {
    const gate = deferred<void>();
    const originalRead = store.read.bind(store);
    let calls = 0;
    store.read = async (name) => {
      calls++;
      if (calls === 1) await gate.promise;
      return originalRead(name);
    };

    const stale = resolver.resolve("primary");
    resolver.invalidate();
    store.secrets.set("primary", primaryBlob("sk-ant-oat01-test-fresh"));
    gate.resolve();

    // The first caller gets whatever its read saw; the cache is not populated from it.
    expect((await stale)?.secret).toBe("sk-ant-oat01-test-fresh");
    expect((await resolver.resolve("primary"))?.secret).toBe("sk-ant-oat01-test-fresh");
    expect(calls).toBe(2);
  });

  it("logs store failures and reports no credential", async () => {
    store.readErrors.set("primary", new CredentialStoreError("UNEXPECTED_STATUS", "test failure"));
    expect(await resolver.resolve("primary")).toBeNull();
    expect(await resolver.isAvailable("primary")).toBe(false);
    expect(store.reads.primary).toBe(1);
  });

  it("treats an unparseable primary blob as absent", async () => {
    store.secrets.set("primary", '{"accessToken":"test-secret"}');
    expect(await resolver.resolve("primary")).toBeNull();
  });

  it("saveManual writes a trimmed token and primes the cache", async () => {
    await resolver.saveManual("  sk-ant-api03-test-saved \n");
    expect(store.secrets.get("manual")).toBe("sk-ant-api03-test-saved");
    expect((await resolver.resolve("manual"))?.secret).toBe("sk-ant-api03-test-saved");
    expect(store.reads.manual).toBe(0);
  });

  it("saveManual rejects an empty token without writing", async () => {
    await expect(resolver.saveManual("   ")).rejects.toMatchObject({
      code: "INVALID_DATA",
      message: "The manual token is empty",
    });
    expect(store.secrets.get("manual")).toBe(MANUAL_TOKEN);
  });

  it("clearManual deletes the token and caches its absence", async () => {
    resolver.markSucceeded("manual");
    await resolver.clearManual();

    expect(store.secrets.has("manual")).toBe(false);
    expect(await resolver.resolve("manual")).toBeNull();
    expect(store.reads.manual).toBe(0);
    expect(resolver.lastResolvedProvenance).toBeNull();
  });

  it("clearManual succeeds when nothing is stored", async () => {
    store.secrets.delete("manual");
    await expect(resolver.clearManual()).resolves.toBeUndefined();
  });

  it("remembers which provenance last succeeded", () => {
    expect(resolver.lastResolvedProvenance).toBeNull();
    resolver.markSucceeded("primary");
    expect(resolver.lastResolvedProvenance).toBe("primary");
  });
});
