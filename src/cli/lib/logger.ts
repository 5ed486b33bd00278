/**
 * CLI logging
 *
 * Progress and diagnostics go to stderr so that stdout carries only report
 * output. With --json every entry is a JSON object; otherwise a colored line.
 * Entries logged while a command runs carry the command name.
 *
 * @module cli/lib/logger
 */

import type { LookupFailure, RowParseFailure } from '../../core/errors.js';
import { LOG_LEVELS, type LogLevel, type LogMetadata } from '../../core/utils/logger.js';

export type { LogLevel, LogMetadata };

export interface CLILoggerOptions {
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service: string;
  /** Where finished lines go (default: stderr) */
  readonly sink: (line: string) => void;
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  gray: '\x1b[90m',
  blue: '\x1b[34m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
} as const;

const LEVEL_STYLES: Record<LogLevel, { readonly label: string; readonly color: string }> = {
  debug: { label: 'debug', color: ANSI.gray },
  info: { label: 'info ', color: ANSI.blue },
  warn: { label: 'warn ', color: ANSI.yellow },
  error: { label: 'error', color: ANSI.red },
};

export class CLILogger {
  private readonly options: CLILoggerOptions;
  private command: string | null = null;
  private commandStartedAt = Date.now();

  constructor(options: CLILoggerOptions) {
    this.options = options;
  }

  setCommand(command: string): void {
    this.command = command;
    this.commandStartedAt = Date.now();
  }

  formatJson(level: LogLevel, message: string, metadata: LogMetadata = {}): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      service: this.options.service,
      ...(this.command === null ? {} : { command: this.command }),
      message,
      ...metadata,
    });
  }

  formatHuman(level: LogLevel, message: string, metadata: LogMetadata = {}): string {
    const style = LEVEL_STYLES[level];
    const pairs = Object.entries(metadata)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);

    const line = `${ANSI.dim}${new Date().toISOString()}${ANSI.reset} ${style.color}${style.label}${ANSI.reset} ${message}`;
    return pairs.length === 0 ? line : `${line} ${ANSI.gray}${pairs.join(' ')}${ANSI.reset}`;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.options.level)) {
      return;
    }
    this.options.sink(
      this.options.json
        ? this.formatJson(level, message, metadata)
        : this.formatHuman(level, message, metadata)
    );
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, metadata?: LogMetadata): void {
    this.setCommand(command);
    this.debug(`Running ${command}`, metadata);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const entry = { duration_ms: Date.now() - this.commandStartedAt, ...metadata };
    if (success) {
      this.debug(`Finished ${this.command ?? 'command'}`, entry);
    } else {
      this.error(`${this.command ?? 'Command'} failed`, entry);
    }
  }

  /**
   * One debug entry per rejected row and per incident left without a population
   */
  failures(parseFailures: readonly RowParseFailure[], lookupFailures: readonly LookupFailure[]): void {
    for (const failure of parseFailures) {
      this.debug('Unparseable row', {
        line: failure.line,
        incidentKey: failure.incidentKey,
        reason: failure.reason,
      });
    }
    for (const failure of lookupFailures) {
      this.debug('No population entry', {
        incidentKey: failure.incidentKey,
        year: failure.year,
        region: failure.region,
        reason: failure.reason,
      });
    }
  }
}

export function createCLILogger(options: Partial<CLILoggerOptions> = {}): CLILogger {
  return new CLILogger({
    level: options.level ?? 'info',
    json: options.json ?? false,
    service: options.service ?? 'incident-atlas',
    sink: options.sink ?? ((line) => console.error(line)),
  });
}
