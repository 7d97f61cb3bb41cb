/**
 * Structured logger for the rosbridge client.
 *
 * Writes human-readable or JSON lines to stderr, so that stdout stays
 * available to programs (and the CLI) built on top of the client.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
  component?: string;
}

export type LogOutput = (line: string) => void;

/** Flatten an unknown thrown value into loggable fields. */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = 'code' in err ? err.code : undefined;
    return code === undefined
      ? { error: err.name, reason: err.message }
      : { error: err.name, code, reason: err.message };
  }
  return { reason: String(err) };
}

export class Logger {
  private level: LogLevel;
  private format: 'text' | 'json';
  private component: string;
  private output: LogOutput;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'text';
    this.component = options.component ?? 'rosbridge';
    this.output = (line: string) => process.stderr.write(line + '\n');
  }

  /**
   * Derive a logger for a sub-component. The child shares level, format and
   * output with its parent at the time of creation.
   */
  child(component: string): Logger {
    const child = new Logger({
      level: this.level,
      format: this.format,
      component: `${this.component}:${component}`,
    });
    child.output = this.output;
    return child;
  }

  /** Replace the output sink (tests capture lines this way). */
  setOutput(fn: LogOutput): void {
    this.output = fn;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (this.format === 'json') {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        component: this.component,
        message,
        ...(hasData ? { data } : {}),
      };
      this.output(JSON.stringify(entry));
      return;
    }

    const levelTag = level.toUpperCase().padEnd(5);
    const dataStr = hasData ? ' ' + JSON.stringify(data) : '';
    this.output(`[${this.component}] ${levelTag} ${message}${dataStr}`);
  }
}

/** Default process-wide logger. */
export const logger = new Logger();
