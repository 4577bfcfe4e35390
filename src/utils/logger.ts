/**
 * Logging system for release-steward
 * Based on tslog with structured output
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

/**
 * Log levels
 */
export type LogLevel = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  logToFile: boolean;
  logDir?: string;
}

export type StewardLogger = Logger<ILogObj>;

const DEFAULT_CONFIG: LoggerConfig = {
  name: "steward",
  level: "info",
  prettyPrint: true,
  logToFile: false,
};

/**
 * Map log level string to tslog minLevel number
 */
export function levelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger instance. One per invocation; pass it down explicitly.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): StewardLogger {
  const finalConfig = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name: finalConfig.name,
    minLevel: levelToNumber(finalConfig.level),
    prettyLogTemplate: finalConfig.prettyPrint
      ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
      : undefined,
    prettyLogTimeZone: "local",
    stylePrettyLogs: finalConfig.prettyPrint,
  });

  if (finalConfig.logToFile && finalConfig.logDir) {
    setupFileLogging(logger, finalConfig.logDir, finalConfig.name);
  }

  return logger;
}

/**
 * Append every log object as a JSON line to <logDir>/<name>.log
 */
function setupFileLogging(logger: StewardLogger, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, JSON.stringify(logObj) + "\n");
  });
}

/**
 * Create a child logger with a specific name
 */
export function createChildLogger(parent: StewardLogger, name: string): StewardLogger {
  return parent.getSubLogger({ name });
}

/**
 * A logger that drops everything (library use and tests)
 */
export function createSilentLogger(): StewardLogger {
  return new Logger<ILogObj>({ name: "steward", type: "hidden" });
}

/**
 * Log a structured event
 */
export function logEvent(
  logger: StewardLogger,
  event: string,
  data: Record<string, unknown> = {},
): void {
  logger.info({ event, ...data });
}

/**
 * Log execution timing
 */
export async function logTiming<T>(
  logger: StewardLogger,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  try {
    const result = await fn();
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: "success" });
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logger.debug({ operation, durationMs: duration.toFixed(2), status: "error", error });
    throw error;
  }
}
