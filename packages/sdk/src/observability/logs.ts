/**
 * Structured logging for task store operations
 *
 * Lines read `[ts] [LEVEL] [event] task=<id> v=<version> message {details}`;
 * debug lines are printed only while NAMEGROUPS_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  taskId?: string;
  /** Task version the event produced or observed */
  version?: number;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogData = Omit<LogEntry, "timestamp" | "level" | "event">;

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Render a log entry as a single line
 */
export function formatLogLine(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.taskId !== undefined) {
    parts.push(`task=${entry.taskId}`);
  }

  if (entry.version !== undefined) {
    parts.push(`v=${entry.version}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details && Object.keys(entry.details).length > 0) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, data: LogData = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.NAMEGROUPS_DEBUG) return;

    CONSOLE_METHODS[level](formatLogLine({ timestamp: new Date().toISOString(), level, event, ...data }));
  }

  debug(event: string, data?: LogData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.log("error", event, data);
  }

  /**
   * Silence all output (tests)
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
