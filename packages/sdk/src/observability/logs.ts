/**
 * Structured logging for validation events
 */

import type { QueryErrorKind } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  kind?: QueryErrorKind;
  /** Dot-joined query path; "" is the root */
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Render an entry as one console line:
 * `[ts] [LEVEL] [event] <kind> at <path> <message> <details>`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.kind !== undefined || entry.path !== undefined) {
    const where = entry.path === undefined || entry.path === "" ? "<root>" : entry.path;
    parts.push(`${entry.kind ?? "?"} at ${where}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger {
  /**
   * Log an event; debug output only appears when QSHAPE_DEBUG is set
   */
  log(level: LogLevel, event: string, data?: Omit<Partial<LogEntry>, "timestamp" | "level" | "event">): void {
    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    });

    switch (level) {
      case "debug":
        if (process.env.QSHAPE_DEBUG) {
          console.debug(line);
        }
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Omit<Partial<LogEntry>, "timestamp" | "level" | "event">): void {
    this.log("debug", event, data);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
