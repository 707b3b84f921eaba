/**
 * Minimal leveled logger passed explicitly to every stage.
 *
 * The entry point builds one with createLogger() and hands child loggers to
 * the components it creates; nothing logs through a module-level instance.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Logger that prefixes lines with a nested scope name */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Lowest level that is written (default: 'warn') */
  level?: LogLevel;
  /** Scope name shown on every line */
  scope?: string;
  /** Line sink (default: process.stderr) */
  write?: (line: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

/**
 * Format a single log line.
 *
 * @example
 * formatLogLine(new Date('2025-10-26T10:00:00Z'), 'cover', 'info', 'done')
 * // '2025-10-26T10:00:00.000Z - cover - INFO - done'
 */
export function formatLogLine(time: Date, scope: string, level: LogLevel, message: string): string {
  return `${time.toISOString()} - ${scope} - ${level.toUpperCase()} - ${message}`;
}

/**
 * Describe a thrown value including its stack when there is one.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "warn";
  const scope = options.scope ?? "skybook";
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());
  const threshold = LEVEL_RANK[level];

  const log = (lineLevel: LogLevel, message: string) => {
    if (LEVEL_RANK[lineLevel] < threshold) return;
    write(formatLogLine(now(), scope, lineLevel, message));
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message, error) => log("error", error === undefined ? message : `${message}\n${describeError(error)}`),
    child: (childScope) => createLogger({ ...options, scope: `${scope}.${childScope}` }),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger({ write: () => {} });
