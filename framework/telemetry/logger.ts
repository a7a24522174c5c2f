/**
 * Structured Logging
 *
 * Leveled logger writing one line per entry, either as JSON (production)
 * or as a colored human-readable line (development). Entries carry the
 * context of the logger that wrote them, so a child logger made for one
 * request tags every line with that request.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/** Receives every entry that passes the level filter */
export type LogSink = (entry: LogEntry) => void;

/** Level and format, as held by configuration */
export interface LogSettings {
  level: LogLevel;
  format: LogFormat;
}

export interface LoggerOptions extends Partial<LogSettings> {
  context?: Record<string, unknown>;
  output?: LogSink;
  /** ANSI colors in pretty output; defaults to whether stdout is a terminal */
  color?: boolean;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Settings used when nothing was configured: verbose and readable in
 * development, `info` and JSON in production
 */
export function defaultLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  return env.NODE_ENV === 'production'
    ? { level: 'info', format: 'json' }
    : { level: 'debug', format: 'pretty' };
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Render an entry as one line (plus the stack, in pretty format)
 */
export function formatEntry(entry: LogEntry, format: LogFormat, color = false): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const dim = (text: string) => (color ? DIM + text + RESET : text);
  const level = entry.level.toUpperCase().padEnd(5);

  let line = `${dim(entry.timestamp)} ${color ? COLORS[entry.level] + level + RESET : level} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${dim(JSON.stringify(entry.context))}`;
  }
  if (entry.error?.stack) {
    line += `\n${dim(entry.error.stack)}`;
  }
  return line;
}

/**
 * Sink writing formatted lines to stdout, and errors to stderr
 */
export function streamSink(format: LogFormat, color: boolean): LogSink {
  return (entry) => {
    const stream = entry.level === 'error' ? process.stderr : process.stdout;
    stream.write(formatEntry(entry, format, color) + '\n');
  };
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly output: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = options.context ?? {};
    this.output = options.output ??
      streamSink(options.format ?? 'json', options.color ?? process.stdout.isTTY === true);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log at a level chosen at runtime
   */
  at(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.log(level, message, context);
  }

  /**
   * Logger writing to the same sink with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }
}

/**
 * Fields attached to every line logged for one request
 */
export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
  userAgent?: string;
  ip?: string;
}

export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  return baseLogger.child({
    requestId: context.requestId,
    method: context.method,
    path: context.path,
    userAgent: context.userAgent,
    ip: context.ip,
  });
}

let defaultLogger: Logger | null = null;

/**
 * Get the process-wide logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({ ...defaultLogSettings(), context: { service: 'junction' } });
  }
  return defaultLogger;
}

/**
 * Replace the process-wide logger, e.g. with one built from configuration
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
