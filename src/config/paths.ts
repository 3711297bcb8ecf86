import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["QUOTA_MONITOR_STATE_DIR"] ?? join(homedir(), ".quota-monitor");
}

export function getConfigPath(): string {
  return process.env["QUOTA_MONITOR_CONFIG_PATH"] ?? "quota-monitor.config.json";
}

/** Where the Claude CLI keeps its OAuth credentials when no keychain is available. */
export function getClaudeCredentialsPath(): string {
  return join(homedir(), ".claude", ".credentials.json");
}

/** Expands a leading `~` to the home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  return path.startsWith("~/") ? join(homedir(), path.slice(2)) : path;
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
