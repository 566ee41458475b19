import type { ILogger, LogContext, LogLevel } from './logger-interface';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const COLOR_MAP: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

function isValidLogLevel(level: string): level is LogLevel {
  return level in LEVEL_PRIORITY;
}

function resolveLogLevel(): LogLevel {
  const logLevel = process.env.LOG_LEVEL?.toUpperCase();

  if (logLevel && isValidLogLevel(logLevel)) {
    return logLevel;
  }

  switch (process.env.NODE_ENV) {
    case 'test':
      return 'SILENT';
    case 'production':
      return 'WARN';
    default:
      return 'INFO';
  }
}

export class LoggerImpl implements ILogger {
  private readonly level: LogLevel;
  private readonly baseContext: LogContext;

  constructor(baseContext: LogContext = {}, level: LogLevel = resolveLogLevel()) {
    this.baseContext = baseContext;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const merged: LogContext = { ...this.baseContext, ...context };

    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...merged,
      });
    }

    const reset = '\x1b[0m';
    const component = merged.component ? `[${merged.component}] ` : '';
    const { component: _component, ...rest } = merged;
    const details = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';

    return `${COLOR_MAP[level]}[${level}]${reset} ${component}${message}${details}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, context);

    if (level === 'ERROR' || level === 'FATAL') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }

  child(context: LogContext): LoggerImpl {
    return new LoggerImpl({ ...this.baseContext, ...context }, this.level);
  }
}

export const logger = new LoggerImpl();
export default logger;
