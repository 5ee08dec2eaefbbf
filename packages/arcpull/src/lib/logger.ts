// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Emit one JSON object per line instead of key=value text */
  json: boolean;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Render a single metadata value for the text format.
 * Strings containing spaces, quotes or `=` are quoted so lines stay parseable.
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (value === null) return "null";
  if (typeof value === "string") {
    return /[\s"=]/.test(value) || value === "" ? JSON.stringify(value) : value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function formatText(
  timestamp: string,
  level: LogLevel,
  message: string,
  meta: Record<string, unknown>
): string {
  const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
  const pairs = Object.entries(meta)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${formatValue(v)}`);
  return pairs.length > 0
    ? `${prefix} ${message} ${pairs.join(" ")}`
    : `${prefix} ${message}`;
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * info/debug go to stdout, warn/error to stderr, so a redirected run log
 * keeps problems separable from progress.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];

  function log(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {},
    bindings: Record<string, unknown> = {}
  ): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const timestamp = new Date().toISOString();
    const combined = { ...bindings, ...meta };
    const line = options.json
      ? JSON.stringify({ timestamp, level, message, ...combined } satisfies LogEntry)
      : formatText(timestamp, level, message, combined);

    if (level === "warn" || level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function instance(bindings: Record<string, unknown>): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, bindings),
      info: (msg, meta) => log("info", msg, meta, bindings),
      warn: (msg, meta) => log("warn", msg, meta, bindings),
      error: (msg, meta) => log("error", msg, meta, bindings),
      child: (more) => instance({ ...bindings, ...more }),
    };
  }

  return instance({});
}

/**
 * Logger that discards everything. Used under --json, where stdout carries
 * the machine-readable result only.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
