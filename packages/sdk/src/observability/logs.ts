/**
 * Structured logging for model config store operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  modelId?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Render an error and its cause chain on one line
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  while (current !== undefined && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(" <- ");
}

class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.modelId) {
      parts.push(`[${entry.modelId}]`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    switch (level) {
      case "debug":
        if (process.env.MODELSTORE_DEBUG) {
          console.debug(parts.join(" "));
        }
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
