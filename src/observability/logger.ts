export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
  sink?: (line: string) => void; // Defaults to stderr
}

// What the rest of the library logs through; both Logger and its children satisfy it
export interface Log {
  debug(msg: string, context?: Record<string, unknown>): void;
  info(msg: string, context?: Record<string, unknown>): void;
  warn(msg: string, context?: Record<string, unknown>): void;
  error(msg: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Log;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger implements Log {
  private level: LogLevel;
  private json: boolean;
  private sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
    this.sink = options.sink ?? ((line) => process.stderr.write(line + '\n'));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, msg: string, context?: Record<string, unknown>): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink(this.formatMessage(level, msg, context));
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.write('error', msg, context);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setJson(json: boolean): void {
    this.json = json;
  }

  child(context: Record<string, unknown>): Log {
    return new ChildLogger(this, context);
  }
}

class ChildLogger implements Log {
  constructor(
    private parent: Log,
    private context: Record<string, unknown>
  ) {}

  debug(msg: string, context?: Record<string, unknown>): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: Record<string, unknown>): void {
    this.parent.error(msg, { ...this.context, ...context });
  }

  child(context: Record<string, unknown>): Log {
    return new ChildLogger(this, context);
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}
