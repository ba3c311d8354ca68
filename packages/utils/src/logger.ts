import winston from "winston";
import path from "path";
import { isDevelopment, PATHS } from "@isocam/config/node";

export type LogLevel =
  | "error"
  | "warn"
  | "info"
  | "http"
  | "verbose"
  | "debug"
  | "silly";

/** npm severity order; the index is the numeric level passed to the worker */
export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return isDevelopment() ? "debug" : "info";
}

let currentLevel: LogLevel = defaultLevel();
const loggers = new Set<winston.Logger>();

/**
 * Create a logger instance with consistent formatting
 */
export function createLogger(service: string): winston.Logger {
  const format = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
      let msg = `${timestamp} [${service}] ${level}: ${message}`;
      if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
      }
      return msg;
    }),
  );

  const logger = winston.createLogger({
    level: currentLevel,
    format,
    defaultMeta: { service },
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // Add file transports in production
  if (!isDevelopment() && process.env.NODE_ENV !== "test") {
    logger.add(
      new winston.transports.File({
        filename: path.join(PATHS.LOGS, "error.log"),
        level: "error",
      }),
    );
    logger.add(
      new winston.transports.File({
        filename: path.join(PATHS.LOGS, "combined.log"),
      }),
    );
  }

  loggers.add(logger);
  return logger;
}

/**
 * Change the level of every logger created so far and of those created later
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function logLevelToNumber(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** Out-of-range numbers saturate to the nearest level */
export function logLevelFromNumber(value: number): LogLevel {
  const index = Math.min(Math.max(Math.trunc(value), 0), LOG_LEVELS.length - 1);
  return LOG_LEVELS[index] ?? "info";
}

/**
 * Default logger instance
 */
export const logger = createLogger("isocam");
