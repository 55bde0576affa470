/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  fatal(message: string, error?: unknown, meta?: LogMeta): void;
  setLevel?(level: LogLevel | string): void;
}

export type LogMeta = Record<string, unknown>;

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5
}

export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  timestamp?: boolean;
  colorize?: boolean;
  json?: boolean;
  prettyPrint?: boolean;
}

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
  private config: LoggerConfig;
  readonly name: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: true,
      json: false,
      prettyPrint: true,
      ...config
    };
    this.name = config.name || 'App';
  }

  /**
   * Log debug message
   */
  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  /**
   * Log info message
   */
  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  /**
   * Log warning message
   */
  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, toError(error));
  }

  /**
   * Log fatal message
   */
  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.FATAL, message, meta, toError(error));
  }

  /**
   * Set log level; unknown level names are ignored
   */
  setLevel(level: LogLevel | string): void {
    if (typeof level === 'string') {
      const levelValue = parseLogLevel(level);
      if (levelValue !== undefined) {
        this.config.level = levelValue;
      }
    } else {
      this.config.level = level;
    }
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error
    };

    if (this.config.json) {
      this.logJson(entry);
    } else {
      this.logPretty(entry);
    }
  }

  /**
   * One JSON object per line
   */
  private logJson(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      })
    };

    console.log(JSON.stringify(output));
  }

  /**
   * Human-readable line, with meta and error details below it
   */
  private logPretty(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    const logMethod = this.getConsoleMethod(entry.level);
    logMethod(parts.join(' '));

    if (entry.meta && this.config.prettyPrint) {
      console.log('  Meta:', entry.meta);
    }

    if (entry.error) {
      console.error('  Error:', entry.error.message);
      if (entry.error.stack && entry.level >= LogLevel.ERROR) {
        console.error('  Stack:', entry.error.stack);
      }
    }
  }

  /**
   * Get level string with optional color
   */
  private getLevelString(level: LogLevel): string {
    const levelName = LogLevel[level];

    if (!this.config.colorize) {
      return `[${levelName}]`;
    }

    const colors: Partial<Record<LogLevel, string>> = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
      [LogLevel.FATAL]: '\x1b[35m'
    };

    const reset = '\x1b[0m';
    return `${colors[level] ?? ''}[${levelName}]${reset}`;
  }

  /**
   * Get console method for level
   */
  private getConsoleMethod(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.DEBUG:
        return console.debug;
      case LogLevel.INFO:
        return console.info;
      case LogLevel.WARN:
        return console.warn;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        return console.error;
      default:
        return console.log;
    }
  }
}

/**
 * Logger that drops everything, handy for tests and library embedding
 */
export class SilentLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
}

/**
 * Logger factory
 */
export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static defaultConfig: Partial<LoggerConfig> = {
    level: LogLevel.INFO,
    timestamp: true,
    colorize: true
  };

  /**
   * Create or get logger
   */
  static getLogger(name: string, config?: Partial<LoggerConfig>): ILogger {
    const key = name || 'default';

    let logger = this.loggers.get(key);
    if (!logger) {
      logger = new ConsoleLogger({
        ...this.defaultConfig,
        ...config,
        name: key
      });
      this.loggers.set(key, logger);
    }

    return logger;
  }

  /**
   * Set default configuration. Applies to loggers created afterwards and
   * re-levels the ones already handed out.
   */
  static setDefaultConfig(config: Partial<LoggerConfig>): void {
    this.defaultConfig = { ...this.defaultConfig, ...config };
    if (config.level !== undefined) {
      const level = config.level;
      this.loggers.forEach(logger => logger.setLevel(level));
    }
  }

  /**
   * Clear all loggers
   */
  static clear(): void {
    this.loggers.clear();
  }
}

/**
 * Parse a level name, case-insensitively
 */
export function parseLogLevel(level: string): LogLevel | undefined {
  switch (level.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'FATAL': return LogLevel.FATAL;
    case 'SILENT': return LogLevel.SILENT;
    default: return undefined;
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Type alias for backward compatibility
 */
export type Logger = ILogger;
