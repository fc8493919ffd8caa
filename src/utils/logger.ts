/**
 * Snapshot Monitor Logger
 *
 * Structured logging with levels and component context.
 * Coloured lines on a TTY, JSON lines otherwise.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  timestamp: string;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_COLORS = {
  debug: "\x1b[90m",  // Gray
  info: "\x1b[36m",   // Cyan
  warn: "\x1b[33m",   // Yellow
  error: "\x1b[31m",  // Red
  reset: "\x1b[0m",
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL ?? "";
let globalMinLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setGlobalLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getGlobalLogLevel(): LogLevel {
  return globalMinLevel;
}

class Logger {
  private component: string;
  // Follows the global level until set explicitly
  private minLevel: LogLevel | null;
  private useColors: boolean;

  constructor(component: string, options?: { minLevel?: LogLevel; useColors?: boolean }) {
    this.component = component;
    this.minLevel = options?.minLevel ?? null;
    this.useColors = options?.useColors ?? process.stdout.isTTY ?? false;
  }

  private shouldLog(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel ?? globalMinLevel];
  }

  private formatTimestamp(): string {
    return new Date().toISOString().replace("T", " ").replace("Z", "");
  }

  private formatMessage(entry: LogEntry): string {
    const { level, timestamp, component, message, data } = entry;

    if (this.useColors) {
      const color = LOG_COLORS[level];
      const reset = LOG_COLORS.reset;
      const levelPad = level.toUpperCase().padEnd(5);
      let line = `${color}[${timestamp}] ${levelPad}${reset} [${component}] ${message}`;
      if (data && Object.keys(data).length > 0) {
        line += ` ${JSON.stringify(data, bigintReplacer)}`;
      }
      return line;
    }
    return JSON.stringify(entry, bigintReplacer);
  }

  private log(level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.formatMessage({
      level,
      timestamp: this.formatTimestamp(),
      component: this.component,
      message,
      data,
    });

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  /**
   * Start a timer; calling the returned function logs the elapsed time at debug level
   */
  time(label: string): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(label, { durationMs: Math.round(duration) });
    };
  }
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}

/**
 * Hide API keys in endpoint URLs before they reach a log line
 */
export function maskEndpoint(endpoint: string): string {
  return endpoint.replace(/api-key=[\w-]+/gi, "api-key=***");
}

export { Logger };
