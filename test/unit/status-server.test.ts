import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createMonitor, type MonitorContext } from "../../src/daemon/lifecycle.js";
import { StatusServer } from "../../src/daemon/status-server.js";
import { FakeTransport, MemoryCredentialStore, MemoryPreferenceStore, silentLogger } from "../helpers/fakes.js";
import { MANUAL_TOKEN, makeConfig, ok, primaryBlob } from "../helpers/fixtures.js";

const NOW = Date.UTC(2025, 0, 1, 3);

describe("StatusServer", () => {
  let monitor: MonitorContext;
  let store: MemoryCredentialStore;
  let transport: FakeTransport;
  let server: StatusServer;

  beforeEach(async () => {
    store = new MemoryCredentialStore({ primary: primaryBlob() });
    transport = new FakeTransport(ok());
    monitor = createMonitor(makeConfig(), silentLogger(), {
      stateDir: "/nonexistent",
      store,
      transport,
      preferences: new MemoryPreferenceStore(),
      now: () => NOW,
    });
    server = new StatusServer(monitor.service, {
      port: 0,
      hostname: "127.0.0.1",
      logger: silentLogger(),
      version: "0.1.0",
      now: () => NOW,
    });
    await monitor.service.start();
  });

  afterEach(async () => {
    await monitor.service.shutdown();
  });

  describe("GET /health", () => {
    it("summarizes the service", async () => {
      const res = await server.app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        version: "0.1.0",
        uptime: 0,
        uptimeHuman: "0s",
        phase: "idle",
        initializing: false,
        hasCredential: true,
        lastUpdated: NOW,
      });
    });

    it("reports degraded while the last refresh failed", async () => {
      transport.enqueue(new Error("offline"));
      await monitor.service.refresh();

      const body: unknown = await (await server.app.request("/health")).json();
      expect(body).toMatchObject({ status: "degraded" });
    });
  });

  it("GET /state returns the published state", async () => {
    const res = await server.app.request("/state");
    expect(await res.json()).toEqual(JSON.parse(JSON.stringify(monitor.service.state)));
  });

  it("GET /widget returns the widget entry", async () => {
    const res = await server.app.request("/widget");
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      date: NOW,
      sessionUtilization: 0.42,
      error: null,
      isPlaceholder: false,
      nextRefreshAt: NOW + 15 * 60 * 1000,
    });
  });

  it("POST /refresh runs a refresh", async () => {
    const before = transport.requests.length;
    const res = await server.app.request("/refresh", { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ refreshed: true });
    expect(transport.requests.length).toBe(before + 1);
  });

  describe("settings", () => {
    it("PUT /preference switches the provenance", async () => {
      store.secrets.set("manual", MANUAL_TOKEN);
      const res = await server.app.request("/preference", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ provenance: "manual" }),
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ preferredProvenance: "manual", activeProvenance: "manual" });
    });

    it("PUT /preference rejects an unknown provenance", async () => {
      const res = await server.app.request("/preference", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ provenance: "other" }),
      });
      expect(res.status).toBe(400);
    });

    it("PUT and DELETE /credentials/manual store and remove the token", async () => {
      const saved = await server.app.request("/credentials/manual", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ token: MANUAL_TOKEN }),
      });
      expect(saved.status).toBe(200);
      expect(store.secrets.get("manual")).toBe(MANUAL_TOKEN);

      const cleared = await server.app.request("/credentials/manual", { method: "DELETE" });
      expect(cleared.status).toBe(200);
      expect(store.secrets.has("manual")).toBe(false);
    });

    it("PUT /credentials/manual rejects a missing token", async () => {
      const res = await server.app.request("/credentials/manual", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: "not json",
      });
      expect(res.status).toBe(400);
    });

    it("POST /credentials/validate checks a token", async () => {
      const res = await server.app.request("/credentials/validate", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ token: "test-secret" }),
      });
      expect(await res.json()).toEqual({ valid: true });
      expect(transport.requests.at(-1)).toEqual({ secret: "test-secret", provenance: "manual" });
    });
  });

  it("GET /state/stream sends the current state as the first event", async () => {
    const res = await server.app.request("/state/stream");
    expect(res.headers.get("Content-Type")).toContain("text/event-stream");

    const reader = res.body?.getReader();
    expect(reader).toBeDefined();
    if (!reader) return;
    const chunk = await reader.read();
    await reader.cancel();

    const text = new TextDecoder().decode(chunk.value);
    expect(text).toContain("event: state\n");
    const dataLine = text.split("\n").find((line) => line.startsWith("data: "));
    expect(JSON.parse(dataLine?.slice("data: ".length) ?? "null")).toEqual(
      JSON.parse(JSON.stringify(monitor.service.state)),
    );
  });
});
