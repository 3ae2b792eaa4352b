/**
 * stderr logger for the MCP server (stdout carries the protocol).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
const isProduction = process.env.NODE_ENV === "production";

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(level: LogLevel, scope: string | undefined, message: string, meta?: object): string {
  const timestamp = new Date().toISOString();
  const scopeStr = scope ? ` [${scope}]` : "";
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}]${scopeStr} ${message}${metaStr}`;
}

function describeError(error: unknown): object {
  if (error instanceof Error) {
    // In production, omit stack traces to avoid leaking internal paths
    return isProduction
      ? { error: error.message }
      : { error: error.message, stack: error.stack };
  }
  return error === undefined ? {} : { error: String(error) };
}

export type Logger = {
  debug(message: string, meta?: object): void;
  info(message: string, meta?: object): void;
  warn(message: string, meta?: object): void;
  error(message: string, error?: unknown, meta?: object): void;
  child(scope: string): Logger;
};

export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, meta?: object): void => {
    if (shouldLog(level)) {
      console.error(formatMessage(level, scope, message, meta));
    }
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, error, meta) => write("error", message, { ...meta, ...describeError(error) }),
    child: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const logger = createLogger();
