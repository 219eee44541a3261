/**
 * Structured Logging Utility
 * Colorized console logger with JSON metadata and child contexts
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
};

const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.gray,
  [LogLevel.INFO]: colors.blue,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

function parseLevel(value: string | undefined): LogLevel {
  switch (value) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
    case LogLevel.WARN:
    case LogLevel.ERROR:
      return value;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Turn an Error (or anything thrown) into loggable metadata
 */
export function describeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

class Logger {
  private readonly config: LoggerConfig;

  constructor(
    private readonly context: LogMeta = {},
    config?: LoggerConfig
  ) {
    this.config = config ?? {
      level: parseLevel(process.env.LOG_LEVEL),
      enableColors: process.env.NODE_ENV !== 'production',
      enableTimestamp: true,
    };
  }

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(new Date().toISOString(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    const merged = { ...this.context, ...meta };
    if (Object.keys(merged).length > 0) {
      parts.push(this.colorize(JSON.stringify(merged), colors.gray));
    }

    return parts.join(' ');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      default:
        console.log(formattedMessage);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging. An Error argument is expanded into name/message/stack.
   */
  error(message: string, error?: unknown): void {
    if (error === undefined) {
      this.log(LogLevel.ERROR, message);
      return;
    }
    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, { error: describeError(error) });
      return;
    }
    if (typeof error === 'object' && error !== null) {
      this.log(LogLevel.ERROR, message, { ...error });
      return;
    }
    this.log(LogLevel.ERROR, message, { error });
  }

  /**
   * Logger that stamps every line with the given context (sessionId, role, ...)
   * and shares this logger's configuration.
   */
  child(context: LogMeta): Logger {
    return new Logger({ ...this.context, ...context }, this.config);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }
}

// Export singleton instance
export const logger = new Logger();

// Export for testing
export { Logger };
