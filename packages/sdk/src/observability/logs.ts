/**
 * Structured logging for map operations
 *
 * One line per event: `[timestamp] [LEVEL] [event] operation message {details}`.
 * Debug lines are written only while BIDIMAP_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  operation?: string;
  message?: string;
  details?: Record<string, unknown>;
}

type EventData = Omit<Partial<LogEntry>, "timestamp" | "level" | "event">;

// Looked up per call so console spies and patches take effect
const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.operation) parts.push(entry.operation);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  /**
   * Whether an event at this level would be written
   *
   * Callers check this before building details for hot-path events.
   */
  enabled(level: LogLevel): boolean {
    if (!this.#enabled) return false;
    return level !== "debug" || Boolean(process.env.BIDIMAP_DEBUG);
  }

  log(level: LogLevel, event: string, data?: EventData): void {
    if (!this.enabled(level)) return;
    sinks[level](formatEntry({ ...data, timestamp: new Date().toISOString(), level, event }));
  }

  debug(event: string, data?: EventData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: EventData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: EventData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: EventData): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
