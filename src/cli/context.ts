import { createRequire } from "node:module";
import { loadConfig } from "../config/loader.js";
import { createLogger } from "../logging/logger.js";
import { createMonitor, type MonitorContext } from "../daemon/lifecycle.js";

const require = createRequire(import.meta.url);

export function packageVersion(): string {
  const pkg: unknown = require("../../package.json");
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

/**
 * Builds the monitor for a one-shot command. Logging stays at warn unless the
 * config asks for debug output, so command output is not interleaved with it.
 */
export function openMonitor(configPath?: string): MonitorContext {
  const config = loadConfig(configPath);
  const level = config.logging?.level === "debug" ? "debug" : "warn";
  const logger = createLogger({ ...config.logging, level });
  return createMonitor(config, logger);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
