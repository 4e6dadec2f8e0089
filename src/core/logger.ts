/*
Purpose: structured event logging for maintenance runs (JSONL file + console lines).
Assumptions: one JSON object per line; callers pass dotted event types such as "step.complete".
Usage: createTeeLogger(new JsonlLogger(dailyLogPath(dir)), createStdoutLogger()).log({ type, payload }).
*/

import fs from "node:fs";
import path from "node:path";

import { formatClock, formatDay } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  type: string;
  level?: LogLevel;
  payload?: JsonObject;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

export type Clock = () => Date;

// =============================================================================
// LEVELS
// =============================================================================

export const LOG_LEVEL_ENV_VAR = "BREW_MAINTAINER_LOG";
export const LOG_FILE_PREFIX = "brew-maintainer.log";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV_VAR]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return "info";
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// JSONL FILE LOGGER
// =============================================================================

export function dailyLogPath(logDir: string, date: Date = new Date()): string {
  return path.join(logDir, `${LOG_FILE_PREFIX}.${formatDay(date)}`);
}

export class JsonlLogger implements EventLogger {
  private readonly minLevel: LogLevel;
  private readonly clock: Clock;

  constructor(
    readonly filePath: string,
    opts: { minLevel?: LogLevel; clock?: Clock } = {},
  ) {
    this.minLevel = opts.minLevel ?? "debug";
    this.clock = opts.clock ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const level = event.level ?? "info";
    if (!shouldLog(level, this.minLevel)) return;

    const record: JsonObject = {
      ts: this.clock().toISOString(),
      type: event.type,
      level,
    };
    if (event.payload) {
      record.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf8");
  }
}

/**
 * JSONL logger that starts a new file when the local date changes,
 * so a long-lived service process rolls its log daily.
 */
export function createDailyJsonlLogger(
  logDir: string,
  opts: { minLevel?: LogLevel; clock?: Clock } = {},
): EventLogger {
  const clock = opts.clock ?? (() => new Date());
  let current: JsonlLogger | null = null;

  return {
    log(event: LogEvent): void {
      const filePath = dailyLogPath(logDir, clock());
      if (!current || current.filePath !== filePath) {
        current = new JsonlLogger(filePath, { minLevel: opts.minLevel, clock });
      }
      current.log(event);
    },
  };
}

// =============================================================================
// CONSOLE LOGGER
// =============================================================================

export function createStdoutLogger(
  opts: { minLevel?: LogLevel; clock?: Clock; write?: (line: string) => void } = {},
): EventLogger {
  const minLevel = opts.minLevel ?? resolveLogLevel();
  const clock = opts.clock ?? (() => new Date());
  const write = opts.write ?? ((line: string) => process.stdout.write(line + "\n"));

  return {
    log(event: LogEvent): void {
      const level = event.level ?? "info";
      if (!shouldLog(level, minLevel)) return;
      write(formatConsoleLine(clock(), level, event));
    },
  };
}

export function formatConsoleLine(date: Date, level: LogLevel, event: LogEvent): string {
  let line = `[${formatClock(date)}] ${level.toUpperCase().padEnd(5)} ${event.type}`;

  const payload = event.payload;
  if (payload && Object.keys(payload).length > 0) {
    const parts = Object.entries(payload).map(
      ([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`,
    );
    line += ` (${parts.join(" ")})`;
  }

  return line;
}

// =============================================================================
// COMPOSITION
// =============================================================================

export function createTeeLogger(...loggers: EventLogger[]): EventLogger {
  return {
    log(event: LogEvent): void {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

export const silentLogger: EventLogger = {
  log(): void {},
};
