export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

/** Level implied by NODE_ENV: quiet under test, `info` in production */
export function levelForEnv(nodeEnv: string | undefined): LogLevel {
  if (nodeEnv === 'production') return 'info';
  if (nodeEnv === 'test') return 'error';
  return 'debug';
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return levelForEnv(process.env.NODE_ENV);
}

// Until configureLogger runs, follow the process environment as it is at import.
let minLevel: LogLevel = defaultLevel();

/**
 * Apply the loaded settings: an explicit override wins, then `logLevel`,
 * then the level implied by `nodeEnv`. Returns the level in effect.
 */
export function configureLogger(
  settings: { logLevel?: LogLevel; nodeEnv: string },
  override?: LogLevel
): LogLevel {
  minLevel = override ?? settings.logLevel ?? levelForEnv(settings.nodeEnv);
  return minLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

function log(level: Exclude<LogLevel, 'silent'>, event: string, data?: Record<string, unknown>) {
  if (!shouldLog(level)) return;

  const entry = {
    level,
    timestamp: new Date().toISOString(),
    event,
    ...data,
  };

  const output = JSON.stringify(entry);

  if (level === 'error') {
    console.error(output);
  } else if (level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

export const logger = {
  debug: (event: string, data?: Record<string, unknown>) => log('debug', event, data),
  info: (event: string, data?: Record<string, unknown>) => log('info', event, data),
  warn: (event: string, data?: Record<string, unknown>) => log('warn', event, data),
  error: (event: string, data?: Record<string, unknown>) => log('error', event, data),
};

export type { LogLevel };
