/**
 * Logging for vm2mp3
 *
 * Everything goes to stderr: stdout is reserved for the message itself when
 * the filter runs with `--stdout`, and an MTA captures stderr of its filters.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface used across the pipeline
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;

  /**
   * Mask an API key for safe logging.
   *
   * Returns the first 3 characters, ellipsis, and last 3 characters.
   *
   * @example
   * maskApiKey("test-secret-value") // "tes...lue"
   */
  maskApiKey(key?: string): string;
}

export interface ConsoleLoggerOptions {
  /** Emit debug messages */
  debug?: boolean;
  /** Output function, console.error by default */
  write?: (line: string) => void;
}

/**
 * Console-based Logger writing to stderr
 *
 * @remarks
 * Lines look like `[vm2mp3] WARN message {"key":"value"}`. Debug lines are
 * dropped unless the verbosity flag is set.
 */
export class ConsoleLogger implements Logger {
  private readonly debugEnabled: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.write = options.write ?? ((line: string) => console.error(line));
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const prefix = `[vm2mp3] ${level.toUpperCase()} ${message}`;
    if (!context || Object.keys(context).length === 0) {
      this.write(prefix);
      return;
    }
    this.write(`${prefix} ${JSON.stringify(context)}`);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.debugEnabled) this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  maskApiKey(key?: string): string {
    if (!key) return 'not set';
    if (key.length <= 6) return '***';
    return `${key.slice(0, 3)}...${key.slice(-3)}`;
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  maskApiKey: () => '***',
};
