import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const options: pino.LoggerOptions = {
    level,
    base: { app: "quota-monitor" },
    redact: {
      paths: ["secret", "token", "*.secret", "*.token", "headers.Authorization"],
      censor: "[redacted]",
    },
  };

  if (config?.file) {
    return pino(options, pino.destination({ dest: config.file, mkdir: true }));
  }

  if (!isJson) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,app" },
      },
    });
  }

  return pino(options);
}

/** Child logger tagged with the component that owns it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
