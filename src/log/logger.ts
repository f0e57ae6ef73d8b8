export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export type LogEntry = {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  data?: Record<string, unknown>;
};

export interface Logger {
  error(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

function enabled(threshold: LogLevel, level: LogEntry["level"]): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

function leveled(
  scope: string,
  threshold: LogLevel,
  write: (entry: LogEntry) => void
): Logger {
  const emit = (level: LogEntry["level"]) => (message: string, data?: Record<string, unknown>) => {
    if (enabled(threshold, level)) {
      write({ level, scope, message, data });
    }
  };
  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}

/**
 * Console logger. Lines are prefixed with `[scope]`.
 */
export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
  return leveled(scope, level, entry => {
    const line = `[${entry.scope}] ${entry.message}`;
    const args: unknown[] = entry.data === undefined ? [line] : [line, entry.data];
    switch (entry.level) {
      case "error":
        console.error(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "debug":
        console.debug(...args);
        break;
    }
  });
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
  clear(): void;
}

/**
 * Logger that keeps entries in memory (for testing).
 */
export function createMemoryLogger(scope: string, level: LogLevel = "debug"): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    ...leveled(scope, level, entry => {
      entries.push(entry);
    }),
    entries,
    clear() {
      entries.length = 0;
    },
  };
}
