/**
 * Structured Logging Utility - Court Alerts Engine
 *
 * Structured JSON logging with log levels, context, and error details.
 * Lines are written through console methods so any collector
 * (CloudWatch, Docker, systemd) picks them up unchanged.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Log entry structure
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const isLogLevel = (value: string): value is LogLevel =>
  LEVEL_ORDER.some((level) => level === value);

/**
 * Get the current log level from environment variable
 */
const getLogLevel = (): LogLevel => {
  const level = process.env['LOG_LEVEL']?.toUpperCase() ?? LogLevel.INFO;
  return isLogLevel(level) ? level : LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean =>
  LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(getLogLevel());

const errorCode = (error: Error): string | undefined => {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
};

/**
 * Format and output a log entry
 */
const writeLog = (entry: LogEntry): void => {
  if (!shouldLog(entry.level)) {
    return;
  }

  const logOutput = JSON.stringify(entry);

  switch (entry.level) {
    case LogLevel.ERROR:
      console.error(logOutput);
      break;
    case LogLevel.WARN:
      console.warn(logOutput);
      break;
    case LogLevel.DEBUG:
      console.debug(logOutput);
      break;
    case LogLevel.INFO:
    default:
      console.log(logOutput);
      break;
  }
};

/**
 * Logger class with context
 */
export class Logger {
  private context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
      error: error
        ? {
            name: error.name,
            message: error.message,
            code: errorCode(error),
            stack: error.stack,
          }
        : undefined,
    });
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({ service: 'court-alerts-engine' });

export const logCycleStart = (log: Logger, trigger: 'scheduled' | 'manual' | 'startup'): void => {
  log.info('Cycle started', { trigger });
};

export const logCycleCompletion = (
  log: Logger,
  durationMs: number,
  summary: Record<string, unknown>
): void => {
  log.info('Cycle completed', { durationMs, ...summary });
};

export const logCycleError = (log: Logger, error: Error): void => {
  log.error('Cycle failed', error);
};
