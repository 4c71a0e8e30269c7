export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export interface LogContext {
  [key: string]: unknown;
}

export type LogHandler = (level: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => void;

export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  /**
   * Replaces console output, mostly for tests and host frameworks that own logging.
   */
  handler?: LogHandler;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: "warn",
  timestamps: false
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

export function resetLogger(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

function formatMessage(level: LogLevel, message: string, context?: LogContext): string {
  let formatted = `[${level.toUpperCase()}] ${message}`;
  if (globalConfig.timestamps) {
    formatted = `[${new Date().toISOString()}] ${formatted}`;
  }
  if (context && Object.keys(context).length > 0) {
    formatted += ` ${JSON.stringify(context, errorReplacer)}`;
  }
  return formatted;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: describeError(value) };
  }
  return value;
}

function log(level: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[globalConfig.level]) {
    return;
  }

  if (globalConfig.handler) {
    globalConfig.handler(level, message, context);
    return;
  }

  const formatted = formatMessage(level, message, context);
  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.info(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      break;
  }
}

/**
 * Child logger whose messages carry a `[scope]` prefix.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    debug(message, context) {
      log("debug", prefix + message, context);
    },
    info(message, context) {
      log("info", prefix + message, context);
    },
    warn(message, context) {
      log("warn", prefix + message, context);
    },
    error(message, context) {
      log("error", prefix + message, context);
    }
  };
}

/**
 * Message of an error thrown in any realm (vm sandboxes included).
 */
export const describeError = (error: unknown): string =>
  typeof error === "object" && error !== null && "message" in error && typeof error.message === "string"
    ? error.message
    : String(error);
