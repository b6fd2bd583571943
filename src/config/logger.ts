import { mkdirSync } from "node:fs";
import { join } from "node:path";
import winston from "winston";

const LOG_FILE_NAME = "cluster-backup.log";
const LOG_FILE_MAX_BYTES = 10 * 1024 * 1024;
const LOG_FILE_MAX_FILES = 5;

/**
 * Process-wide logger. Starts console-only at LOG_LEVEL (or info);
 * `configureLogger` attaches the rotating file transport once the
 * configuration has been validated.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "cluster-backup" },
  // stdout is reserved for command output.
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
});

export interface LoggerSettings {
  logLevel: "error" | "warn" | "info" | "debug";
  logsDirectory?: string;
}

let fileTransport: winston.transport | null = null;

/** Apply the configured level and (at most once) the file transport. */
export function configureLogger(settings: LoggerSettings): void {
  logger.level = settings.logLevel;

  if (settings.logsDirectory && !fileTransport) {
    mkdirSync(settings.logsDirectory, { recursive: true });
    fileTransport = new winston.transports.File({
      filename: join(settings.logsDirectory, LOG_FILE_NAME),
      maxsize: LOG_FILE_MAX_BYTES,
      maxFiles: LOG_FILE_MAX_FILES,
      tailable: true,
    });
    logger.add(fileTransport);
  }
}
