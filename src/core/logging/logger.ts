export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  /** Send debug and info lines to stderr too, keeping stdout free for machine output. */
  toStderr?: boolean;
  now?: () => Date;
}

export function formatLogLine(level: LogLevel, message: string, time: Date): string {
  return `${time.toISOString()} - ${level.toUpperCase()} - ${message}`;
}

/**
 * Logger writing `<time> - LEVEL - message` lines through the console.
 * Debug lines are dropped unless `verbose` is set.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const verbose = options.verbose ?? false;
  const write = (line: string): void => {
    if (options.toStderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug(message) {
      if (verbose) {
        write(formatLogLine('debug', message, now()));
      }
    },
    info(message) {
      write(formatLogLine('info', message, now()));
    },
    warn(message) {
      console.warn(formatLogLine('warn', message, now()));
    },
    error(message) {
      console.error(formatLogLine('error', message, now()));
    },
  };
}
