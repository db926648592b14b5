import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS: readonly pino.LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function toLevel(value: string | undefined): pino.LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? "info";
}

const level = toLevel(process.env.LOG_LEVEL);
const logFile =
  process.env.LOG_FILE === undefined || process.env.LOG_FILE === ""
    ? undefined
    : process.env.LOG_FILE;

/**
 * stdout, or stdout and `LOG_FILE` at the same level
 */
function createDestination(
  file: string | undefined
): DestinationStream | undefined {
  if (file === undefined) return undefined;

  const logDir = dirname(file);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  return pino.multistream([
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: file, sync: false }) },
  ]);
}

const destination = createDestination(logFile);

export const loggerOptions: LoggerOptions = {
  level,
  base: { service: "ddi-sync" },
  // DDI credentials travel in config objects and request headers
  redact: {
    paths: [
      "password",
      "*.password",
      "headers.authorization",
      "req.headers.authorization",
    ],
    censor: "[redacted]",
  },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Fastify builds its own pino instance from these
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level, redact: ["req.headers.authorization"], stream: destination }
    : { level, redact: ["req.headers.authorization"] };

export const ddiLogger = logger.child({ module: "ddi-api" });
export const syncLogger = logger.child({ module: "sync" });
export const inventoryLogger = logger.child({ module: "inventory" });
export const dbLogger = logger.child({ module: "database" });
export const serverLogger = logger.child({ module: "server" });

if (logFile !== undefined) {
  logger.info({ logFile, logLevel: level }, "Logging to file enabled");
}
