import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LEVELS: readonly pino.Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

function resolveLevel(raw: string | undefined): pino.Level {
  const candidate = LEVELS.find((level) => level === raw?.toLowerCase());
  return candidate ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Tee to stdout and LOG_FILE when a file is configured
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL, stream: process.stdout },
    {
      level: LOG_LEVEL,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Fastify accepts this shape directly
export const fastifyLoggerConfig =
  destination !== undefined
    ? { level: LOG_LEVEL, stream: destination }
    : { level: LOG_LEVEL };

export const etlLogger = logger.child({ module: "etl" });
export const dbLogger = logger.child({ module: "database" });
export const serverLogger = logger.child({ module: "server" });
export const sourcesLogger = logger.child({ module: "sources" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
