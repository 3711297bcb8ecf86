import { z } from "zod";
import type { MonitorConfig } from "./types.js";

const refreshSchema = z.object({
  intervalMs: z.number().int().min(1_000).default(60_000),
});

const apiSchema = z.object({
  endpoint: z.string().url().default("https://api.anthropic.com/api/oauth/usage"),
  betaHeader: z.string().min(1).default("oauth-2025-04-20"),
  userAgent: z.string().min(1).default("claude-code/2.0.32"),
  timeoutMs: z.number().int().positive().default(10_000),
});

const credentialsSchema = z.object({
  backend: z.enum(["auto", "keychain", "file"]).default("auto"),
  primaryService: z.string().min(1).default("Claude Code-credentials"),
  manualService: z.string().min(1).default("quota-monitor"),
  manualAccount: z.string().min(1).default("api-token"),
  primaryFile: z.string().min(1).optional(),
});

const stateSchema = z.object({
  subscriberBufferSize: z.number().int().positive().default(64),
});

const serverSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().positive().default(19877),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const monitorConfigSchema = z.object({
  refresh: refreshSchema.default({}),
  api: apiSchema.default({}),
  credentials: credentialsSchema.default({}),
  state: stateSchema.default({}),
  server: serverSchema.default({}),
  logging: loggingSchema.optional(),
});

export function parseConfig(raw: unknown): MonitorConfig {
  return monitorConfigSchema.parse(raw);
}
