/**
 * Structured logging for the CLI.
 *
 * Diagnostics (debug, warn, error) go to stderr so that a command's stdout
 * stays machine-readable under --json. Info and per-item failure lines are
 * part of the human report and go to stdout.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

type Emitter = (line: string) => void;

interface Channel {
  tag: string;
  paint: (text: string) => string;
  write: Emitter;
}

const CHANNELS: Record<Exclude<LogLevel, 'silent'>, Channel> = {
  debug: { tag: 'DEBUG', paint: (t) => chalk.gray(t), write: (l) => console.error(l) },
  info: { tag: 'INFO', paint: (t) => chalk.blue(t), write: (l) => console.log(l) },
  warn: { tag: 'WARN', paint: (t) => chalk.yellow(t), write: (l) => console.warn(l) },
  error: { tag: 'ERROR', paint: (t) => chalk.red(t), write: (l) => console.error(l) },
};

export class Logger {
  private level: LogLevel = 'info';
  private readonly prefix: string;
  private readonly parent: Logger | undefined;

  constructor(prefix = '', parent?: Logger) {
    this.prefix = prefix;
    this.parent = parent;
  }

  /** Children follow their root's level. */
  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
    } else {
      this.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, cause?: Error | Record<string, unknown>): void {
    if (cause instanceof Error) {
      this.emit('error', message);
      if (this.enabled('error')) CHANNELS.error.write(chalk.red(cause.stack ?? cause.message));
      return;
    }
    this.emit('error', message, cause);
  }

  /**
   * A failed item in a human-readable listing; shown at info level.
   */
  fail(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    const channel = CHANNELS[level];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    channel.write(channel.paint(`[${channel.tag}] ${text}`));
    if (data) {
      channel.write(channel.paint(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();
