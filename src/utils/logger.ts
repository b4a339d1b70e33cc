/**
 * Leveled logger shared by the watcher, server and CLI.
 *
 * Lines look like `[2026-01-02T03:04:05.000Z] [INFO] File reloaded {"bytes":12}`.
 * The level comes from MOUNTWATCH_LOG_LEVEL; MOUNTWATCH_QUIET=true lowers the
 * default to errors only.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  if (!level) return fallback;
  return LEVELS_BY_NAME[level.toLowerCase()] ?? fallback;
}

export function formatLogLine(level: string, message: string, meta?: LogMetadata, now: Date = new Date()): string {
  const line = `[${now.toISOString()}] [${level}] ${message}`;
  return meta && Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
}

function describeError(error: unknown): LogMetadata {
  if (error === undefined) return {};
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message, errorStack: error.stack };
  }
  return { error: String(error) };
}

class Logger {
  private threshold: LogLevel;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const fallback = env.MOUNTWATCH_QUIET === 'true' ? LogLevel.ERROR : LogLevel.INFO;
    this.threshold = parseLogLevel(env.MOUNTWATCH_LOG_LEVEL, fallback);
  }

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  /** stdout for debug/info so CLI pipes see progress; stderr for problems */
  write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.threshold || level === LogLevel.SILENT) return;

    const line = formatLogLine(LogLevel[level], message, meta);
    if (level >= LogLevel.WARN) {
      process.stderr.write(`${line}\n`);
    } else {
      process.stdout.write(`${line}\n`);
    }
  }
}

export const logger = new Logger();

/**
 * Plain user-facing CLI output, never filtered by level
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.write(LogLevel.DEBUG, message, meta),
  info: (message: string, meta?: LogMetadata) => logger.write(LogLevel.INFO, message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.write(LogLevel.WARN, message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) =>
    logger.write(LogLevel.ERROR, message, { ...meta, ...describeError(error) }),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
