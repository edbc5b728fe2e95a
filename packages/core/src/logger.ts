import type { LogLevel } from "@mirrorline/contracts";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = parseLogLevel(process.env.MIRRORLINE_LOG_LEVEL) ?? "info";

export interface Logger {
  /** Accepts a thunk so the payload is only built when debug output is on. */
  debug(message: string, data?: () => Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function parseLogLevel(value: unknown): LogLevel | null {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return null;
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string, data?: Record<string, unknown>): void {
  const line = `[${scope}] ${message}`;
  const args: unknown[] = data ? [line, data] : [line];
  // stdout belongs to the CLI's transcript output, so every level goes to stderr
  if (level === "warn") {
    console.warn(...args);
  } else {
    console.error(...args);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug(message, data) {
      if (!isLevelEnabled("debug")) return;
      write("debug", scope, message, data?.());
    },
    info(message, data) {
      if (!isLevelEnabled("info")) return;
      write("info", scope, message, data);
    },
    warn(message, data) {
      if (!isLevelEnabled("warn")) return;
      write("warn", scope, message, data);
    },
    error(message, data) {
      if (!isLevelEnabled("error")) return;
      write("error", scope, message, data);
    },
  };
}
