/**
 * Logger configuration
 * Pino-based structured logging
 *
 * Outputs:
 * - Console: JSON lines by default, colored single lines when LOG_PRETTY=true
 * - File (LOG_TO_FILE=true): LOG_DIR/YYYY-MM-DD/scraper.log, rotated daily,
 *   errors duplicated into error.log
 *
 * Usage: logger.info({ brand, count }, "message"), fields first, message last.
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateStringWithDash, getTimestampWithTimezone } from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL || (NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";

const LEVEL_VALUES = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * Dated rotating file: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      path: LOG_DIR,
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * Parses one serialized pino line; null when it is not an object
 */
function parseLine(chunk: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(chunk);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return null;
  } catch {
    return null;
  }
}

function levelOf(log: Record<string, unknown>): number {
  const level = log.level;
  if (typeof level === "number") return level;
  switch (level) {
    case "error":
    case "fatal":
      return LEVEL_VALUES.ERROR;
    case "warn":
      return LEVEL_VALUES.WARN;
    case "info":
      return LEVEL_VALUES.INFO;
    default:
      return LEVEL_VALUES.DEBUG;
  }
}

/**
 * Console stream for local runs (colored level + message, fields indented)
 */
class PrettyConsoleStream implements DestinationStream {
  private static readonly HIDDEN_FIELDS = new Set([
    "level",
    "time",
    "service",
    "env",
    "pid",
    "hostname",
    "msg",
  ]);

  write(chunk: string): void {
    const log = parseLine(chunk);
    if (!log) {
      process.stderr.write(chunk);
      return;
    }

    const level = levelOf(log);
    const time = new Date().toLocaleTimeString("en-US", { hour12: false });
    const color =
      level >= LEVEL_VALUES.ERROR
        ? "\x1b[31m"
        : level >= LEVEL_VALUES.WARN
          ? "\x1b[33m"
          : level >= LEVEL_VALUES.INFO
            ? "\x1b[32m"
            : "\x1b[90m";
    const label =
      level >= LEVEL_VALUES.ERROR
        ? "ERROR"
        : level >= LEVEL_VALUES.WARN
          ? "WARN"
          : level >= LEVEL_VALUES.INFO
            ? "INFO"
            : "DEBUG";
    const msg = typeof log.msg === "string" ? log.msg : "";

    const lines = [`[${time}] ${color}${label}\x1b[0m \x1b[36m${msg}\x1b[0m`];
    for (const [field, value] of Object.entries(log)) {
      if (PrettyConsoleStream.HIDDEN_FIELDS.has(field)) continue;
      const rendered =
        typeof value === "object" && value !== null
          ? JSON.stringify(value)
          : String(value);
      lines.push(`  ${field}: ${rendered}`);
    }
    process.stderr.write(lines.join("\n") + "\n");
  }
}

/**
 * File stream that also copies error lines into error.log
 */
class FileRoutingStream implements DestinationStream {
  private readonly main = createRotatingStream("scraper");
  private readonly errors = createRotatingStream("error");

  write(chunk: string): void {
    this.main.write(chunk);
    const log = parseLine(chunk);
    if (log && levelOf(log) >= LEVEL_VALUES.ERROR) {
      this.errors.write(chunk);
    }
  }
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "material-catalog-scraper",
    env: NODE_ENV,
  },
};

const streams: pino.StreamEntry[] = [
  {
    level: "trace",
    stream: LOG_PRETTY ? new PrettyConsoleStream() : process.stdout,
  },
];

if (LOG_TO_FILE) {
  fs.mkdirSync(LOG_DIR, { recursive: true });
  streams.push({ level: "debug", stream: new FileRoutingStream() });
}

const logger: pino.Logger = pino(baseConfig, pino.multistream(streams));

export { logger };

export type Logger = pino.Logger;
