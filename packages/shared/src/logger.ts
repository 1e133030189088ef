export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "json" | "pretty";

export interface LogContext {
  service?: string;
  stage?: string;
  index?: number;
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function getConfiguredFormat(): LogFormat {
  return process.env.LOG_FORMAT?.toLowerCase() === "pretty" ? "pretty" : "json";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getConfiguredLevel()];
}

function formatEntry(
  level: LogLevel,
  message: string,
  defaultContext?: LogContext,
  callContext?: LogContext,
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...defaultContext,
    ...callContext,
  };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Renders an entry as a single readable line:
 * `<timestamp> <LEVEL> <message> key=value ...`
 */
export function formatPretty(entry: LogEntry): string {
  const { level, message, timestamp, ...rest } = entry;
  const fields = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [timestamp, level.toUpperCase(), message, ...fields].join(" ");
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export function createLogger(defaultContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level)) {
      return;
    }

    const entry = formatEntry(level, message, defaultContext, context);
    const line =
      getConfiguredFormat() === "pretty"
        ? formatPretty(entry)
        : JSON.stringify(entry);

    if (level === "error") {
      process.stderr.write(line + "\n");
    } else {
      process.stdout.write(line + "\n");
    }
  }

  return {
    debug(message: string, context?: LogContext): void {
      log("debug", message, context);
    },
    info(message: string, context?: LogContext): void {
      log("info", message, context);
    },
    warn(message: string, context?: LogContext): void {
      log("warn", message, context);
    },
    error(message: string, context?: LogContext): void {
      log("error", message, context);
    },
    child(context: LogContext): Logger {
      return createLogger({ ...defaultContext, ...context });
    },
  };
}

export const logger = createLogger({ service: "medeval" });
