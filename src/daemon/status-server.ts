import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { UsageStateService } from "../monitor/service.js";
import { toWidgetEntry } from "../widget/entry.js";
import { formatUptime } from "../utils/format.js";

export interface StatusServerOptions {
  readonly port: number;
  readonly hostname: string;
  readonly logger: Logger;
  readonly version: string;
  readonly now?: () => number;
}

const preferenceBodySchema = z.object({ provenance: z.enum(["primary", "manual"]) });
const tokenBodySchema = z.object({ token: z.string().min(1) });

/**
 * Local read surface for the popover and widget processes. Every route reads
 * the service's published state. The settings routes call the service
 * operations and answer with the state they left behind.
 */
export class StatusServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(
    private readonly service: UsageStateService,
    private readonly options: StatusServerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => {
      const state = this.service.state;
      const uptime = this.now() - this.startedAt;
      return c.json({
        status: state.lastError ? "degraded" : "ok",
        version: this.options.version,
        uptime,
        uptimeHuman: formatUptime(uptime),
        phase: this.service.phase,
        initializing: state.initializing,
        hasCredential: state.hasCredential,
        lastUpdated: state.lastUpdated,
      });
    });

    this.app.get("/state", (c) => c.json(this.service.state));

    this.app.get("/widget", (c) => c.json(toWidgetEntry(this.service.state, this.now())));

    this.app.post("/refresh", async (c) => {
      const refreshed = await this.service.refresh("manual");
      return c.json({ refreshed, state: this.service.state }, refreshed ? 200 : 202);
    });

    this.app.put("/preference", async (c) => {
      const parsed = preferenceBodySchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Expected { provenance: \"primary\" | \"manual\" }" }, 400);
      }
      await this.service.setPreferredProvenance(parsed.data.provenance);
      return c.json(this.service.state);
    });

    this.app.put("/credentials/manual", async (c) => {
      const parsed = tokenBodySchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Expected { token: string }" }, 400);
      }
      try {
        await this.service.saveManualCredential(parsed.data.token);
      } catch (err) {
        this.options.logger.warn({ err }, "Saving manual token failed");
        return c.json({ error: errorMessage(err), state: this.service.state }, 500);
      }
      return c.json(this.service.state);
    });

    this.app.delete("/credentials/manual", async (c) => {
      try {
        await this.service.clearManualCredential();
      } catch (err) {
        this.options.logger.warn({ err }, "Clearing manual token failed");
        return c.json({ error: errorMessage(err), state: this.service.state }, 500);
      }
      return c.json(this.service.state);
    });

    this.app.post("/credentials/validate", async (c) => {
      const parsed = tokenBodySchema.safeParse(await readJson(c.req.raw));
      if (!parsed.success) {
        return c.json({ error: "Expected { token: string }" }, 400);
      }
      return c.json({ valid: await this.service.validateCredential(parsed.data.token) });
    });

    this.app.get("/state/stream", (c) =>
      streamSSE(c, async (stream) => {
        const subscription = this.service.subscribe();
        stream.onAbort(() => {
          subscription.unsubscribe();
        });

        let id = 0;
        for await (const state of subscription) {
          await stream.writeSSE({ event: "state", id: String(id++), data: JSON.stringify(state) });
        }
      }),
    );
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.options.port,
      hostname: this.options.hostname,
    });
    this.options.logger.info(
      { port: this.options.port, hostname: this.options.hostname },
      "Status server started",
    );
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
