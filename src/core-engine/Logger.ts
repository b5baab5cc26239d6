/**
 * Leveled console logger for the War Card Engine.
 *
 * Diagnostics only: game narration printed by the CLI goes straight to
 * stdout and is not filtered by level. The minimum level comes from
 * `WAR_LOG_LEVEL`, then `LOG_LEVEL`, and defaults to `info`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Structured fields appended to a log line as `key=value` pairs. */
export interface LogContext {
  [key: string]: unknown;
}

export function isLogLevel(raw: string): raw is LogLevel {
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error';
}

/** Resolve the minimum level from the environment. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.WAR_LOG_LEVEL ?? env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let minRank = LEVELS[resolveLogLevel()];

/** Override the minimum level for the rest of the process. */
export function setLogLevel(level: LogLevel): void {
  minRank = LEVELS[level];
}

const shouldLog = (level: LogLevel): boolean => LEVELS[level] >= minRank;

const isLogContext = (arg: unknown): arg is LogContext =>
  arg !== null && typeof arg === 'object' && !Array.isArray(arg) && !(arg instanceof Error);

/**
 * Format structured context as key=value pairs.
 */
export const formatContext = (context: LogContext): string =>
  Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');

/** Move a trailing context object, if any, to the end as key=value text. */
const withContext = (args: unknown[]): unknown[] => {
  const lastArg = args[args.length - 1];
  if (args.length >= 2 && isLogContext(lastArg)) {
    return [...args.slice(0, -1), formatContext(lastArg)];
  }
  return args;
};

export const logDebug = (...args: unknown[]): void => {
  if (shouldLog('debug')) {
    console.debug(...withContext(args));
  }
};

export const logInfo = (...args: unknown[]): void => {
  if (shouldLog('info')) {
    console.info(...withContext(args));
  }
};

export const logWarn = (...args: unknown[]): void => {
  if (shouldLog('warn')) {
    console.warn(...withContext(args));
  }
};

export const logError = (...args: unknown[]): void => {
  if (shouldLog('error')) {
    console.error(...withContext(args));
  }
};
