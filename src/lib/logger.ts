/**
 * Leveled logger passed explicitly to every component
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogAttrs = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Line sink; defaults to stderr */
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly write: (line: string) => void;
  private readonly attrs: LogAttrs;

  constructor(options: LoggerOptions = {}, attrs: LogAttrs = {}) {
    this.level = options.level ?? 'info';
    this.json = options.json ?? false;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
    this.attrs = attrs;
  }

  debug(msg: string, attrs?: LogAttrs): void {
    this.log('debug', msg, attrs);
  }

  info(msg: string, attrs?: LogAttrs): void {
    this.log('info', msg, attrs);
  }

  warn(msg: string, attrs?: LogAttrs): void {
    this.log('warn', msg, attrs);
  }

  error(msg: string, attrs?: LogAttrs): void {
    this.log('error', msg, attrs);
  }

  /**
   * Logger that stamps `attrs` on every record
   */
  child(attrs: LogAttrs): Logger {
    return new Logger(
      { level: this.level, json: this.json, write: this.write },
      { ...this.attrs, ...attrs }
    );
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, msg: string, attrs?: LogAttrs): void {
    if (!this.isEnabled(level)) return;

    const merged: LogAttrs = { ...this.attrs, ...attrs };

    if (this.json) {
      const record: LogAttrs = { time: new Date().toISOString(), level, msg };
      for (const [key, value] of Object.entries(merged)) {
        record[key] = renderValue(value);
      }
      this.write(JSON.stringify(record));
      return;
    }

    const pairs = Object.entries(merged).map(([key, value]) => `${key}=${formatText(renderValue(value))}`);
    const line = [LEVEL_COLORS[level](level.toUpperCase()), msg, ...pairs].join(' ');
    this.write(line);
  }
}

function renderValue(value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

function formatText(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value);
  if (text === undefined) return 'undefined';
  return /\s/.test(text) ? JSON.stringify(text) : text;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** Logger that drops everything; handy for library callers that don't care */
export const silentLogger = new Logger({ write: () => {} });
