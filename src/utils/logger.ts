/**
 * Structured logging
 *
 * Writes one JSON object per line to the console so the output can be
 * shipped as-is by whatever collects stdout/stderr in production.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  scope: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3, silent: 4,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly scope: string = 'app'
  ) {}

  /** A logger sharing this one's level but tagged with another scope. */
  child(scope: string): Logger {
    return new Logger(this.minLevel, scope);
  }

  private shouldLog(level: LogEntry['level']): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private emit(entry: LogEntry) {
    if (!this.shouldLog(entry.level)) return;

    const output = JSON.stringify({
      ...entry,
      service: 'repair-dispatch',
    });

    switch (entry.level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.emit({ level: 'debug', message, scope: this.scope, timestamp: new Date().toISOString(), metadata: meta });
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.emit({ level: 'info', message, scope: this.scope, timestamp: new Date().toISOString(), metadata: meta });
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.emit({ level: 'warn', message, scope: this.scope, timestamp: new Date().toISOString(), metadata: meta });
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>) {
    this.emit({
      level: 'error',
      message,
      scope: this.scope,
      timestamp: new Date().toISOString(),
      metadata: meta,
      error: error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack?.slice(0, 500) }
        : error === undefined ? undefined : { name: 'NonError', message: String(error) },
    });
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : process.env.NODE_ENV === 'development' ? 'debug' : 'info'
);
