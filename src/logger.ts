/**
 * Logger abstraction.
 *
 * Structured, level-based JSON logging with context. Services receive a
 * child logger through their request context instead of reaching for a
 * global. Consumers can replace the default output by calling setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 10,
  [LogLevel.Info]: 20,
  [LogLevel.Warn]: 30,
  [LogLevel.Error]: 40,
};

/** Context keys (compared lower-cased) whose values never reach the output. */
const SECRET_KEYS: ReadonlySet<string> = new Set([
  'password',
  'currentpassword',
  'newpassword',
  'passwordhash',
  'token',
  'authorization',
  'secret',
]);

export const REDACTED = '[redacted]';

/** Replace the values of secret-looking keys, one level deep. */
export function redactContext(context?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!context) return undefined;
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : value]),
  );
}

/** One JSON line per entry; warn and error go to stderr. */
const jsonLineHandler: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  const stream = SEVERITY[entry.level] >= SEVERITY[LogLevel.Warn] ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
};

const state: { handler: LogHandler; minLevel: LogLevel } = {
  handler: jsonLineHandler,
  minLevel: LogLevel.Info,
};

/** Route entries elsewhere (tests, an external log system). */
export function setLogHandler(handler: LogHandler): void {
  state.handler = handler;
}

/** Restore the JSON line handler. */
export function resetLogHandler(): void {
  state.handler = jsonLineHandler;
}

/** Entries below this level are dropped. */
export function setLogLevel(level: LogLevel): void {
  state.minLevel = level;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (SEVERITY[level] < SEVERITY[state.minLevel]) return;
  state.handler({ level, message, context: redactContext(context), timestamp: new Date().toISOString() });
}

/** Create a logger whose entries all carry `baseContext`. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>): void =>
      emit(level, message, { ...baseContext, ...context });
  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'devtrack' });
