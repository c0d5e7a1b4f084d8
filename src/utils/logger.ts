/**
 * Logger Module
 * Structured logging using pino with file and console output
 */

import pino, { type Logger as PinoLogger } from "pino";
import * as fs from "node:fs";
import * as path from "node:path";
import { getLogsDir } from "./index.js";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  enableFileLogging?: boolean;
  logDir?: string;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Ensures the log directory exists
 */
function ensureLogDir(logDir: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

/**
 * `GRAINCTL_LOG_FILE=1` writes each component to `.grainctl/logs/<component>.log`
 */
function fileLoggingFromEnv(): boolean {
  return process.env.GRAINCTL_LOG_FILE === "1" && !isTest();
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (isTest()) return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "transport", "readiness", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("transport");
 * logger.debug({ host, command }, "Running remote command");
 * logger.error({ err }, "Remote command failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel(), enableFileLogging = fileLoggingFromEnv(), logDir } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
    redact: ["privateKey", "password", "*.privateKey", "*.password"],
  };

  if (enableFileLogging) {
    const dir = logDir ?? getLogsDir();
    ensureLogDir(dir);

    const destination = pino.destination({
      dest: path.join(dir, `${component}.log`),
      sync: false,
    });
    return pino(baseOptions, destination);
  }

  // pino-pretty runs in a worker thread; keep tests on the plain stream
  if (isDevelopment() && !isTest()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
