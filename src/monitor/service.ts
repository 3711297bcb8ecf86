import type { Logger } from "../logging/logger.js";
import type { TokenResolver } from "../credentials/resolver.js";
import type { UsageFetchPipeline } from "../usage/pipeline.js";
import { UsageFetchError } from "../usage/errors.js";
import { EMPTY_SNAPSHOT, type Provenance } from "../usage/types.js";
import { SerialExecutor } from "../utils/serial.js";
import type { StateBroadcaster, StateListener, Subscription } from "./broadcaster.js";
import {
  PREFERRED_PROVENANCE_KEY,
  loadPreferredProvenance,
  type PreferenceStore,
} from "./preferences.js";
import { RefreshScheduler, type RefreshReason, type SchedulerPhase } from "./scheduler.js";
import { freezeState, toStateError, type ServiceState } from "./state.js";

export interface UsageStateServiceDeps {
  readonly resolver: TokenResolver;
  readonly pipeline: UsageFetchPipeline;
  readonly broadcaster: StateBroadcaster<ServiceState>;
  readonly preferences: PreferenceStore;
  readonly logger: Logger;
  readonly intervalMs: number;
  readonly now?: () => number;
}

/**
 * Owns the {@link ServiceState}. Every change, including every credential
 * cache change, runs as one task on a serial executor and ends with at most
 * one publication, so subscribers see states in the order they were made.
 */
export class UsageStateService {
  private readonly resolver: TokenResolver;
  private readonly pipeline: UsageFetchPipeline;
  private readonly broadcaster: StateBroadcaster<ServiceState>;
  private readonly preferences: PreferenceStore;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly writer = new SerialExecutor();
  private readonly scheduler: RefreshScheduler;
  private initialized: Promise<void> | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(deps: UsageStateServiceDeps) {
    this.resolver = deps.resolver;
    this.pipeline = deps.pipeline;
    this.broadcaster = deps.broadcaster;
    this.preferences = deps.preferences;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
    this.scheduler = new RefreshScheduler({
      intervalMs: deps.intervalMs,
      logger: deps.logger,
      runStartup: () => this.initialize(),
      runRefresh: (reason) => this.writer.run(() => this.refreshStep(reason)),
    });
  }

  get state(): ServiceState {
    return this.broadcaster.current;
  }

  get phase(): SchedulerPhase {
    return this.scheduler.phase;
  }

  /** Checks for a credential, fetches once, then keeps refreshing on the interval. */
  start(): Promise<void> {
    return this.scheduler.start();
  }

  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.stopAll();
    return this.shutdownPromise;
  }

  /**
   * Returns false when a refresh was already running or the service has shut
   * down. Runs the start-up credential check first when it has not run yet,
   * so the fetch uses the stored preference.
   */
  async refresh(reason: RefreshReason = "manual"): Promise<boolean> {
    if (this.scheduler.phase === "stopped") return false;
    await this.initialize();
    return this.scheduler.refresh(reason);
  }

  subscribe(): Subscription<ServiceState> {
    return this.broadcaster.subscribe();
  }

  listen(listener: StateListener<ServiceState>): () => void {
    return this.broadcaster.listen(listener);
  }

  async setPreferredProvenance(provenance: Provenance): Promise<void> {
    await this.initialize();
    const changed = await this.writer.run(async () => {
      if (this.state.preferredProvenance === provenance) return false;
      try {
        await this.preferences.set(PREFERRED_PROVENANCE_KEY, provenance);
      } catch (err) {
        this.logger.warn({ err }, "Could not persist preferred provenance");
      }
      this.commit({ preferredProvenance: provenance });
      this.logger.info({ provenance }, "Preferred provenance changed");
      return true;
    });

    if (changed) {
      await this.scheduler.idle();
      await this.scheduler.refresh("preference");
    }
  }

  async saveManualCredential(secret: string): Promise<void> {
    await this.initialize();
    await this.writer.run(async () => {
      try {
        await this.resolver.saveManual(secret);
      } catch (err) {
        this.commit({ lastError: toStateError(err) });
        throw err;
      }
      const preferred = this.state.preferredProvenance;
      const hasCredential = await this.resolver.isAvailable(preferred);
      this.commit({ hasCredential, activeProvenance: hasCredential ? preferred : null, lastError: null });
    });

    if (this.state.preferredProvenance === "manual") {
      await this.scheduler.idle();
      await this.scheduler.refresh("credential");
    }
  }

  async clearManualCredential(): Promise<void> {
    await this.initialize();
    await this.writer.run(async () => {
      try {
        await this.resolver.clearManual();
      } catch (err) {
        this.commit({ lastError: toStateError(err) });
        throw err;
      }

      const current = this.state;
      const affected =
        current.activeProvenance === "manual" || current.preferredProvenance === "manual";
      if (!affected) return;

      const hasCredential = await this.resolver.isAvailable(current.preferredProvenance);
      this.commit({
        snapshot: EMPTY_SNAPSHOT,
        lastUpdated: null,
        activeProvenance: hasCredential ? current.preferredProvenance : null,
        hasCredential,
        lastError: null,
      });
    });
  }

  /** Tries a token against the usage endpoint without storing or caching it. */
  validateCredential(secret: string): Promise<boolean> {
    return this.pipeline.validate(secret);
  }

  /** Runs the start-up credential check once, whichever operation comes first. */
  private initialize(): Promise<void> {
    this.initialized ??= this.writer.run(() => this.startupStep()).catch((err: unknown) => {
      this.logger.error({ err }, "Start-up credential check failed");
    });
    return this.initialized;
  }

  private async startupStep(): Promise<void> {
    const preferredProvenance = await loadPreferredProvenance(this.preferences, this.logger);
    const hasCredential = await this.resolver.isAvailable(preferredProvenance);
    this.commit({
      initializing: false,
      preferredProvenance,
      hasCredential,
      activeProvenance: hasCredential ? preferredProvenance : null,
    });
    this.logger.info({ preferredProvenance, hasCredential }, "Credential check complete");
  }

  private async refreshStep(reason: RefreshReason): Promise<void> {
    const preferred = this.state.preferredProvenance;
    this.logger.debug({ reason, preferred }, "Refreshing usage");

    try {
      const { snapshot, credential } = await this.pipeline.fetch(preferred);
      this.commit({
        snapshot,
        lastUpdated: this.now(),
        lastError: null,
        activeProvenance: credential.provenance,
        hasCredential: true,
      });
    } catch (err) {
      this.commit(this.failurePatch(err, preferred));
      this.logger.warn({ err, reason }, "Usage refresh failed");
    }
  }

  private failurePatch(err: unknown, preferred: Provenance): Partial<ServiceState> {
    const lastError = toStateError(err);
    if (err instanceof UsageFetchError && err.code === "NO_CREDENTIAL") {
      return { lastError, hasCredential: false, activeProvenance: null };
    }
    const provenance = err instanceof UsageFetchError ? err.provenance : null;
    return { lastError, hasCredential: true, activeProvenance: provenance ?? preferred };
  }

  /** Replaces the current state and publishes it. Only writer tasks call this. */
  private commit(patch: Partial<ServiceState>): void {
    this.broadcaster.publish(freezeState({ ...this.state, ...patch }));
  }

  private async stopAll(): Promise<void> {
    await this.scheduler.stop();
    await this.writer.idle();
    this.broadcaster.close();
    this.logger.info("Usage state service stopped");
  }
}
