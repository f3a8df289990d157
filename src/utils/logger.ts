/**
 * Structured logging infrastructure.
 *
 * Output goes to stdout by default. The MCP server owns stdout for the
 * protocol, so it switches every logger to stderr with `useStderr()`.
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

type Paint = (text: string) => string;

const TAGS: Record<Exclude<LogLevel, 'silent'>, { tag: string; paint: Paint }> = {
  debug: { tag: '[DEBUG]', paint: chalk.gray },
  info: { tag: '[INFO]', paint: chalk.blue },
  warn: { tag: '[WARN]', paint: chalk.yellow },
  error: { tag: '[ERROR]', paint: chalk.red },
};

/**
 * Level-filtered logger for the library, the CLI and the MCP server.
 */
class Logger {
  private ownLevel: LogLevel | undefined = 'info';
  private ownStderr: boolean | undefined = false;
  private prefix: string = '';
  private parent: Logger | undefined;

  setLevel(level: LogLevel): void {
    this.ownLevel = level;
  }

  /** Children without their own level follow their parent. */
  getLevel(): LogLevel {
    return this.ownLevel ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  /** Route every level, including debug and info, to stderr. */
  useStderr(enabled = true): void {
    this.ownStderr = enabled;
  }

  private stderrOnly(): boolean {
    return this.ownStderr ?? this.parent?.stderrOnly() ?? false;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(level: Exclude<LogLevel, 'silent'>, line: string): void {
    if (this.stderrOnly() || level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { tag, paint } = TAGS[level];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    this.write(level, paint(`${tag} ${text}`));
    if (data) {
      this.write(level, paint(JSON.stringify(data, null, 2)));
    }
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

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    this.emit('error', message);
    if (error instanceof Error) {
      this.write('error', chalk.red(error.stack || error.message));
    } else if (error) {
      this.write('error', chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success message (shown at info and below).
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write('info', chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (shown at info and below).
   */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write('info', chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. Level and sink follow the parent until set on the child.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.ownLevel = undefined;
    child.ownStderr = undefined;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
