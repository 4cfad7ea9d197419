// Levelled stderr logging for the check template kit

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

/**
 * Converts a configured level name into a LogLevel
 */
export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_NAMES[name];
}

/**
 * Writes `[checktpl] [LEVEL] message {context}` lines to stderr. stdout is
 * left to rendered scripts and JSON metadata.
 */
export class Logger {
  private static instance: Logger | null = null;
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { level: LogLevel.WARN, prefix: '[checktpl]', ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared logger in place, so modules holding `logger` see it
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts = [this.config.prefix, `[${level}]`, message];
    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }
    return parts.filter(Boolean).join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, 'WARN', message, context);
  }

  private write(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= level) {
      console.error(this.format(label, message, context));
    }
  }
}

export const logger = Logger.getInstance();
