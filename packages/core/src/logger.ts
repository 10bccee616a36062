import pino, { type Logger, type LoggerOptions } from "pino";
import type { LogLevel } from "@agenda/types";

export type { Logger } from "pino";

export interface LogConfig {
  level: LogLevel | "silent";
  service: string;
  redact: string[];
}

const DEFAULT_REDACT = ["apiKey", "*.apiKey", "authorization", "*.authorization"];

const LEVELS: ReadonlySet<string> = new Set(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

let rootLogger: Logger | null = null;
const children = new Set<Logger>();

/**
 * Creates the process-wide root logger. Later calls return the same
 * instance; use `resetLogging()` first to rebuild it with new settings.
 */
export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
  if (rootLogger) {
    return rootLogger;
  }

  const config = resolveLogConfig(overrides);
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { service: config.service },
    redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
    serializers: { err: pino.stdSerializers.err },
  };

  rootLogger = pino(options);
  return rootLogger;
}

/** Child logger tagged with `module`. */
export function getLogger(moduleName: string): Logger {
  const logger = rootLogger ?? initLogging();
  const child = logger.child({ module: moduleName });
  children.add(child);
  return child;
}

/**
 * Changes the level of the root logger and of every module logger handed
 * out so far. Module loggers are created at import time, before the
 * configuration is read.
 */
export function setLogLevel(level: LogConfig["level"]): void {
  const logger = rootLogger ?? initLogging({ level });
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export function resetLogging(): void {
  rootLogger = null;
  children.clear();
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
  const isUnitTest = process.env.VITEST === "true" || process.env.VITEST === "1";
  const level =
    overrides.level ??
    parseLevel(process.env.AGENDA_LOG_LEVEL) ??
    parseLevel(process.env.LOG_LEVEL) ??
    (isUnitTest ? "silent" : "info");

  return {
    level,
    service: overrides.service ?? process.env.AGENDA_LOG_SERVICE ?? "agenda",
    redact: overrides.redact ?? DEFAULT_REDACT,
  };
}

function parseLevel(value: string | undefined): LogConfig["level"] | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLevel(normalized) ? normalized : undefined;
}

function isLevel(value: string): value is LogConfig["level"] {
  return LEVELS.has(value);
}
