/**
 * Structured logging for the library code
 *
 * Console-based. Emits one JSON object per line when NODE_ENV is
 * "production" and a readable single line otherwise. The threshold comes
 * from LOG_LEVEL (default: info).
 *
 * @module logger
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerOptions {
  readonly service: string;
  readonly level?: LogLevel;
  readonly pretty?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function metadataPairs(metadata: LogMetadata): string {
  return Object.entries(metadata)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

export class Logger {
  readonly service: string;
  readonly level: LogLevel;
  private readonly pretty: boolean;

  constructor(options: LoggerOptions) {
    this.service = options.service;
    this.level = options.level ?? levelFromEnv();
    this.pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
  }

  /**
   * Logger for one module, named `<service>:<module>`
   */
  child(module: string): Logger {
    return new Logger({ service: `${this.service}:${module}`, level: this.level, pretty: this.pretty });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  formatMessage(level: LogLevel, message: string, metadata: LogMetadata = {}): string {
    const timestamp = new Date().toISOString();

    if (!this.pretty) {
      return JSON.stringify({ timestamp, level, service: this.service, message, ...metadata });
    }

    const pairs = metadataPairs(metadata);
    const head = `${timestamp} ${level.toUpperCase().padEnd(5)} [${this.service}] ${message}`;
    return pairs === '' ? head : `${head} ${pairs}`;
  }

  private write(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (this.isEnabled(level)) {
      SINKS[level](this.formatMessage(level, message, metadata));
    }
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.write('error', message, metadata);
  }
}

export const logger = new Logger({ service: 'incident-atlas' });

export function createLogger(context: { readonly module?: string }): Logger {
  return logger.child(context.module ?? 'unknown');
}
