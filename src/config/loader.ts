import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { MonitorConfig } from "./types.js";
import { expandHome, getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function withExpandedPaths(config: MonitorConfig): MonitorConfig {
  const { credentials, logging } = config;
  return {
    ...config,
    credentials:
      credentials.primaryFile === undefined
        ? credentials
        : { ...credentials, primaryFile: expandHome(credentials.primaryFile) },
    logging: logging?.file === undefined ? logging : { ...logging, file: expandHome(logging.file) },
  };
}

export function loadConfig(path?: string): MonitorConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return parseConfig({});
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw: unknown = JSON.parse(substituted);
  return withExpandedPaths(parseConfig(raw));
}
