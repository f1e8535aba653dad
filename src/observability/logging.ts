/**
 * Logging for the Qdrant client.
 *
 * The client logs through the {@link Logger} interface so applications can
 * plug in their own logger. {@link NoopLogger} is the default.
 */

/**
 * Log level enumeration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'off';

/**
 * All accepted level names, lowest first.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'off'];

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Console logger options.
 */
export interface ConsoleLoggerOptions {
  /** Minimum level written. @default 'info' */
  level?: LogLevel;
  /** Prefix each line with an ISO timestamp. @default true */
  includeTimestamps?: boolean;
  /** Destination; defaults to the global console. */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

const SENSITIVE_KEYS = ['api-key', 'api_key', 'apikey', 'authorization', 'password', 'secret', 'token'];

/**
 * Writes single-line entries to the console, redacting credential-like keys.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly includeTimestamps: boolean;
  private readonly sink: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.sink = options.sink ?? console;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(
    level: Exclude<LogLevel, 'off'>,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.level]) return;

    const parts: string[] = [];
    if (this.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (context) {
      parts.push(JSON.stringify(redactContext(context)));
    }

    this.sink[level](parts.join(' '));
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Replaces the value of every credential-like key, at any depth.
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_KEYS.includes(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      redacted[key] = redactContext(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Creates a console logger, or a no-op logger for level 'off'.
 */
export function createLogger(level: LogLevel): Logger {
  return level === 'off' ? new NoopLogger() : new ConsoleLogger({ level });
}
