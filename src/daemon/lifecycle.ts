import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { MonitorConfig } from "../config/types.js";
import { createLogger, componentLogger, type Logger } from "../logging/logger.js";
import { createCredentialStore } from "../credentials/factory.js";
import type { CredentialStore } from "../credentials/store.js";
import { TokenResolver } from "../credentials/resolver.js";
import { HttpUsageTransport, type UsageTransport } from "../usage/transport.js";
import { UsageFetchPipeline } from "../usage/pipeline.js";
import { StateBroadcaster } from "../monitor/broadcaster.js";
import { JsonPreferenceStore, type PreferenceStore } from "../monitor/preferences.js";
import { UsageStateService } from "../monitor/service.js";
import { initialState, type ServiceState } from "../monitor/state.js";
import { StatusServer } from "./status-server.js";

export interface MonitorContext {
  readonly config: MonitorConfig;
  readonly logger: Logger;
  readonly stateDir: string;
  readonly store: CredentialStore;
  readonly preferences: PreferenceStore;
  readonly resolver: TokenResolver;
  readonly pipeline: UsageFetchPipeline;
  readonly broadcaster: StateBroadcaster<ServiceState>;
  readonly service: UsageStateService;
}

/** Replacements for the pieces that touch the outside world. */
export interface MonitorOverrides {
  readonly stateDir?: string;
  readonly store?: CredentialStore;
  readonly transport?: UsageTransport;
  readonly preferences?: PreferenceStore;
  readonly now?: () => number;
}

export function createMonitor(
  config: MonitorConfig,
  logger: Logger,
  overrides: MonitorOverrides = {},
): MonitorContext {
  const stateDir = overrides.stateDir ?? getStateDir();
  const store = overrides.store ?? createCredentialStore(config.credentials, stateDir);
  const preferences = overrides.preferences ?? new JsonPreferenceStore(stateDir);
  const transport = overrides.transport ?? new HttpUsageTransport(config.api);

  const resolver = new TokenResolver(store, componentLogger(logger, "resolver"));
  const pipeline = new UsageFetchPipeline({
    resolver,
    transport,
    logger: componentLogger(logger, "pipeline"),
    now: overrides.now,
  });
  const broadcaster = new StateBroadcaster<ServiceState>(initialState(), {
    bufferSize: config.state.subscriberBufferSize,
    logger: componentLogger(logger, "broadcaster"),
  });
  const service = new UsageStateService({
    resolver,
    pipeline,
    broadcaster,
    preferences,
    logger: componentLogger(logger, "service"),
    intervalMs: config.refresh.intervalMs,
    now: overrides.now,
  });

  return { config, logger, stateDir, store, preferences, resolver, pipeline, broadcaster, service };
}

export interface DaemonContext extends MonitorContext {
  readonly statusServer: StatusServer | null;
  /** Settles once shutdown has finished. */
  readonly stopped: Promise<void>;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export async function startDaemon(configPath: string | undefined, version: string): Promise<DaemonContext> {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  logger.info({ version }, "Starting quota monitor...");

  const stateDir = ensureDir(getStateDir());
  const monitor = createMonitor(config, logger, { stateDir });
  const { service } = monitor;

  service.listen((state) => {
    if (state.lastError) {
      logger.debug({ code: state.lastError.code }, "State published with error");
    }
  });

  let statusServer: StatusServer | null = null;
  if (config.server.enabled) {
    statusServer = new StatusServer(service, {
      port: config.server.port,
      hostname: config.server.hostname,
      logger: componentLogger(logger, "server"),
      version,
    });
    await statusServer.start();
  }

  await service.start();

  let markStopped: () => void = () => {};
  const stopped = new Promise<void>((resolve) => {
    markStopped = resolve;
  });

  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return stopped;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await statusServer?.stop();
      await service.shutdown();
      logger.info("Shutdown complete");
    } finally {
      clearTimeout(forceExit);
      markStopped();
    }
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("Quota monitor started");
  return { ...monitor, statusServer, stopped, shutdown };
}
