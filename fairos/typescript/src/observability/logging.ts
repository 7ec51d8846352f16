/**
 * Logging for the FairOS-dfs client.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Creates a child logger with additional context. */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Where formatted lines go. Defaults to the console method matching the level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Log configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to include timestamps in text output. */
  timestamps: boolean;
  /** Whether to output one JSON object per line. */
  json: boolean;
  /** Context keys whose values are replaced with `[REDACTED]`. */
  redact: string[];
  /** Additional context for all logs. */
  context?: Record<string, unknown>;
  sink?: LogSink;
}

/**
 * Default log configuration.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
  redact: ['token', 'cookie', 'password', 'mnemonic'],
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: Partial<LogConfig> = {}, baseContext: Record<string, unknown> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = { ...this.config.context, ...baseContext };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: this.redact({ ...this.baseContext, ...context }),
      error,
    };

    const line = this.config.json ? this.formatJson(entry) : this.formatText(entry);
    const sink = this.config.sink ?? consoleSink;
    sink(level, line);
  }

  private redact(context: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(context)) {
      result[key] = this.config.redact.includes(key) ? '[REDACTED]' : value;
    }
    return result;
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp.toISOString(),
      ...entry.context,
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
        },
      }),
    });
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case LogLevel.Debug:
      console.debug(line);
      break;
    case LogLevel.Info:
      console.info(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    case LogLevel.Error:
      console.error(line);
      break;
  }
}

/**
 * No-op logger that discards all messages.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}
