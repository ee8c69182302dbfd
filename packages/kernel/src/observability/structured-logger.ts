/**
 * Structured Logger
 *
 * JSON-lines logging with levels, child loggers carrying component and
 * tenant context, and an injectable output sink for tests. Values under
 * sensitive context keys (session ids, tokens) are replaced before output.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5,
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  service: string;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Service name */
  service: string;
  /** Minimum log level */
  level: LogLevel;
  /** Whether to pretty-print output */
  pretty: boolean;
  /** Default context to include in all logs */
  defaultContext?: Record<string, unknown>;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
  /** Whether to include stack traces */
  includeStackTrace: boolean;
  /** Context keys whose values are replaced with [REDACTED], at any depth */
  redactKeys?: readonly string[];
}

export const DEFAULT_REDACTED_KEYS: readonly string[] = ['sessionId', 'password', 'token', 'authorization', 'secret'];
const REDACTED = '[REDACTED]';

export class StructuredLogger {
  private context: Record<string, unknown> = {};
  private readonly redacted: ReadonlySet<string>;

  constructor(private readonly options: LoggerOptions) {
    if (options.defaultContext) {
      this.context = { ...options.defaultContext };
    }
    this.redacted = new Set(options.redactKeys ?? DEFAULT_REDACTED_KEYS);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      ...this.options,
      defaultContext: { ...this.context, ...context },
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log at ERROR level. Anything thrown may be passed as `error`; non-Error
   * values are stringified.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, { ...context, ...this.describeError(error, this.options.includeStackTrace) });
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, { ...context, ...this.describeError(error, true) });
  }

  /**
   * Log with timing information
   */
  time(label: string, context?: Record<string, unknown>): () => void {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} completed`, { ...context, duration: Math.round(duration * 100) / 100 });
    };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.options.level;
  }

  private describeError(error: unknown, withStack: boolean): Record<string, unknown> {
    if (error === undefined) return {};
    if (error instanceof Error) {
      const code: unknown = Reflect.get(error, 'code');
      return {
        error: {
          name: error.name,
          message: error.message,
          code: typeof code === 'string' ? code : undefined,
          stack: withStack ? error.stack : undefined,
        },
      };
    }
    return { error: { name: 'NonError', message: String(error) } };
  }

  /**
   * Core log method
   */
  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.options.level) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      service: this.options.service,
      ...redact({ ...this.context, ...context }, this.redacted),
    };

    if (this.options.output) {
      this.options.output(entry);
    } else if (this.options.pretty) {
      this.prettyPrint(entry, level);
    } else {
      this.jsonPrint(entry, level);
    }
  }

  private jsonPrint(entry: LogEntry, level: LogLevel): void {
    const output = JSON.stringify(entry);
    if (level >= LogLevel.ERROR) {
      process.stderr.write(output + '\n');
    } else {
      process.stdout.write(output + '\n');
    }
  }

  /**
   * Pretty-print output for development
   */
  private prettyPrint(entry: LogEntry, level: LogLevel): void {
    const colors: Record<number, string> = {
      [LogLevel.DEBUG]: '\x1b[36m',  // Cyan
      [LogLevel.INFO]: '\x1b[32m',   // Green
      [LogLevel.WARN]: '\x1b[33m',   // Yellow
      [LogLevel.ERROR]: '\x1b[31m',  // Red
      [LogLevel.FATAL]: '\x1b[35m',  // Magenta
    };
    const reset = '\x1b[0m';
    const color = colors[level] || '';

    const { timestamp, level: levelName, message, service, error, duration, ...rest } = entry;
    const time = timestamp.split('T')[1]?.replace('Z', '') || timestamp;
    const ctx = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
    const dur = duration !== undefined ? ` (${duration}ms)` : '';

    const output = `${color}[${time}] ${levelName.padEnd(5)} ${service}: ${message}${dur}${ctx}${reset}`;

    if (level >= LogLevel.ERROR) {
      console.error(output);
      if (error) {
        console.error(`  ${error.stack ?? `${error.name}: ${error.message}`}`);
      }
    } else {
      console.log(output);
    }
  }
}

function redact(context: Record<string, unknown>, keys: ReadonlySet<string>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (keys.has(key)) {
      out[key] = REDACTED;
    } else if (isPlainObject(value)) {
      out[key] = redact(value, keys);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/** LOG_LEVEL names, case-insensitive */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Create a logger instance. LOG_LEVEL overrides the level NODE_ENV implies.
 */
export function createLogger(options?: Partial<LoggerOptions>): StructuredLogger {
  const env = process.env.NODE_ENV || 'development';
  const envLevel = env === 'production' ? LogLevel.INFO : env === 'test' ? LogLevel.SILENT : LogLevel.DEBUG;
  return new StructuredLogger({
    service: 'tessellate-kernel',
    level: parseLogLevel(process.env.LOG_LEVEL) ?? envLevel,
    pretty: env === 'development',
    includeStackTrace: env !== 'production',
    ...options,
  });
}
