export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const consoleSink: LogSink = (level, ...args) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(...args);
      break;
    case LogLevel.INFO:
      console.info(...args);
      break;
    case LogLevel.WARN:
      console.warn(...args);
      break;
    default:
      console.error(...args);
  }
};

export function parseLogLevel(raw: string | undefined): LogLevel | null {
  if (typeof raw !== 'string') {
    return null;
  }
  return LEVEL_NAMES[raw.trim().toLowerCase()] ?? null;
}

/** Starting level, read once from `SWEEPLIGHT_LOG_LEVEL`; WARN when unset. */
export const DEFAULT_LOG_LEVEL: LogLevel =
  parseLogLevel(process.env.SWEEPLIGHT_LOG_LEVEL) ?? LogLevel.WARN;

let threshold: LogLevel = DEFAULT_LOG_LEVEL;
let sink: LogSink = consoleSink;

/** Sets the global threshold; errors are emitted regardless. */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Routes all loggers to `next`; `null` goes back to the console. */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

/** Tags every line with `[scope]`. */
export class Logger {
  constructor(private readonly scope: string) {}

  private emit(level: LogLevel, message: string, args: unknown[]): void {
    if (level < LogLevel.ERROR && level < threshold) {
      return;
    }
    sink(level, `[${this.scope}]`, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit(LogLevel.ERROR, message, args);
  }
}
