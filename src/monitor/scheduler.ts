import type { Logger } from "../logging/logger.js";
import { sleep } from "../utils/sleep.js";

export type RefreshReason = "startup" | "timer" | "manual" | "preference" | "credential";

export type SchedulerPhase = "idle" | "refreshing" | "stopped";

export interface RefreshSchedulerDeps {
  readonly intervalMs: number;
  readonly logger: Logger;
  /** Runs once, before the first refresh. */
  readonly runStartup: () => Promise<void>;
  readonly runRefresh: (reason: RefreshReason) => Promise<void>;
}

/**
 * Drives refreshes: one at start-up, one per interval, and any requested on
 * demand. At most one refresh runs at a time; a request arriving while one
 * is running is dropped.
 */
export class RefreshScheduler {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly runStartup: () => Promise<void>;
  private readonly runRefresh: (reason: RefreshReason) => Promise<void>;

  private readonly controller = new AbortController();
  private refreshing = false;
  private inFlight: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: RefreshSchedulerDeps) {
    this.intervalMs = deps.intervalMs;
    this.logger = deps.logger;
    this.runStartup = deps.runStartup;
    this.runRefresh = deps.runRefresh;
  }

  get phase(): SchedulerPhase {
    if (this.refreshing) return "refreshing";
    return this.controller.signal.aborted ? "stopped" : "idle";
  }

  /**
   * Runs the start-up step and the first refresh, then leaves the periodic
   * loop running in the background. Later calls return the first call's promise.
   */
  start(): Promise<void> {
    this.starting ??= this.startOnce();
    return this.starting;
  }

  /**
   * Returns false without doing anything when a refresh is already running
   * or the scheduler has been stopped. Failures are logged, never thrown.
   */
  refresh(reason: RefreshReason): Promise<boolean> {
    if (this.controller.signal.aborted) return Promise.resolve(false);
    if (this.refreshing) {
      this.logger.debug({ reason }, "Refresh already in flight, skipping");
      return Promise.resolve(false);
    }

    this.refreshing = true;
    const run = this.execute(reason).finally(() => {
      this.refreshing = false;
      this.inFlight = null;
    });
    this.inFlight = run;
    return run.then(() => true);
  }

  /** Resolves once no refresh is running. */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  /** Cancels the loop; a refresh already running is allowed to finish. */
  async stop(): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
      this.logger.info("Refresh scheduler stopped");
    }
    await this.loop;
    await this.inFlight;
  }

  private async execute(reason: RefreshReason): Promise<void> {
    try {
      await this.runRefresh(reason);
    } catch (err) {
      this.logger.error({ err, reason }, "Refresh failed");
    }
  }

  private async startOnce(): Promise<void> {
    const signal = this.controller.signal;
    if (signal.aborted) return;

    try {
      await this.runStartup();
    } catch (err) {
      this.logger.error({ err }, "Start-up step failed");
    }

    await this.refresh("startup");
    if (signal.aborted) return;

    this.loop = this.runLoop(signal);
    this.logger.info({ intervalMs: this.intervalMs }, "Refresh scheduler started");
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const elapsed = await sleep(this.intervalMs, signal);
      if (!elapsed || signal.aborted) break;
      await this.refresh("timer");
    }
  }
}
