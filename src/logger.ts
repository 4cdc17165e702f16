import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = (line: string) => void;

const writeToStderr: Sink = (line) => process.stderr.write(`${line}\n`);

/**
 * Leveled logger for the CLI. Everything goes to stderr so that stdout
 * carries nothing but diagnostics.
 */
class Logger {
  private level: LogLevel = 'info';
  private sink: Sink = writeToStderr;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Without an argument, output goes back to stderr. */
  setSink(sink: Sink = writeToStderr): void {
    this.sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.sink(pc.gray(`[eolint] ${message}${data ? ` ${JSON.stringify(data)}` : ''}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    this.sink(`[eolint] ${message}`);
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    this.sink(pc.yellow(`[eolint] ${message}`));
  }

  error(message: string): void {
    if (!this.shouldLog('error')) return;
    this.sink(pc.red(`[eolint] ${message}`));
  }
}

export const logger = new Logger();
