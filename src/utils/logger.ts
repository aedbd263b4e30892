/**
 * Diagnostic output for the CLI.
 * Log lines go to stderr; stdout carries command output only.
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

/** Where formatted log lines are written. */
export interface LogSink {
  write(line: string): void;
}

export const stderrSink: LogSink = {
  write(line) {
    process.stderr.write(`${line}\n`);
  },
};

type Paint = (text: string) => string;

const STYLES: Record<Exclude<LogLevel, 'silent'>, { label: string; paint: Paint }> = {
  debug: { label: 'debug: ', paint: (s) => chalk.gray(s) },
  info: { label: '', paint: (s) => s },
  warn: { label: 'warning: ', paint: (s) => chalk.yellow(s) },
  error: { label: 'error: ', paint: (s) => chalk.red(s) },
};

export class Logger {
  constructor(
    private sink: LogSink = stderrSink,
    private level: LogLevel = 'info'
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
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

  /**
   * Log an error. A stack trace of `cause` is only written at debug level.
   */
  error(message: string, cause?: unknown): void {
    this.emit('error', message);
    if (cause instanceof Error && cause.stack && this.isEnabled('debug')) {
      this.sink.write(chalk.gray(cause.stack));
    }
  }

  success(message: string): void {
    if (this.isEnabled('info')) {
      this.sink.write(chalk.green(`✓ ${message}`));
    }
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { label, paint } = STYLES[level];
    this.sink.write(paint(`${label}${message}`));
    if (data) {
      this.sink.write(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();
