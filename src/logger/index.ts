export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

const configuredLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const currentLevel: LogLevel = isLogLevel(configuredLevel) ? configuredLevel : 'info';

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel];
}

function formatPrefix(level: LogLevel, scope?: string): string {
  const timestamp = new Date().toISOString();
  const base = `[${timestamp}] [${level.toUpperCase()}]`;
  return scope ? `${base} [${scope}]` : base;
}

function log(level: LogLevel, scope: string | undefined, ...args: unknown[]): void {
  if (!shouldLog(level)) return;
  const prefix = formatPrefix(level, scope);
  if (level === 'error') {
    console.error(prefix, ...args);
  } else if (level === 'warn') {
    console.warn(prefix, ...args);
  } else {
    console.log(prefix, ...args);
  }
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Logger whose lines carry a `[scope]` tag after the level,
 * e.g. `createLogger('validator')`.
 */
export function createLogger(scope?: string): Logger {
  return {
    debug: (...args: unknown[]) => log('debug', scope, ...args),
    info: (...args: unknown[]) => log('info', scope, ...args),
    warn: (...args: unknown[]) => log('warn', scope, ...args),
    error: (...args: unknown[]) => log('error', scope, ...args),
  };
}

export const logger = createLogger();
