type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  provider?: string;
  model?: string;
  target?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function getMinLevel(): number {
  const level = process.env.LOG_LEVEL;
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.warn;
}

function formatLog(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(entry);
}

// stdout belongs to the operator output and reports, so every level goes to stderr.
function write(level: LogLevel, message: string, context?: LogContext): void {
  if (getMinLevel() <= LOG_LEVELS[level]) {
    console.error(formatLog(level, message, context));
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    write("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    write("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    write("warn", message, context);
  },

  error(message: string, context?: LogContext): void {
    write("error", message, context);
  },

  withContext(defaultContext: LogContext): Logger {
    return {
      debug: (message: string, context?: LogContext) =>
        logger.debug(message, { ...defaultContext, ...context }),
      info: (message: string, context?: LogContext) =>
        logger.info(message, { ...defaultContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        logger.warn(message, { ...defaultContext, ...context }),
      error: (message: string, context?: LogContext) =>
        logger.error(message, { ...defaultContext, ...context }),
    };
  },
};
