// Levelled logging over console (or any sink with the same shape)
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class Logger {
  private level: LogLevel;
  private readonly sink: LogSink;

  constructor(level: LogLevel = 'info', sink: LogSink = console) {
    this.level = level;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void { this.level = level; }
  getLevel(): LogLevel { return this.level; }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return RANK[level] >= RANK[this.level];
  }

  debug(...args: unknown[]): void { if (this.isEnabled('debug')) this.sink.log(...args); }
  info(...args: unknown[]): void { if (this.isEnabled('info')) this.sink.log(...args); }
  warn(...args: unknown[]): void { if (this.isEnabled('warn')) this.sink.warn(...args); }
  error(...args: unknown[]): void { if (this.isEnabled('error')) this.sink.error(...args); }
}

