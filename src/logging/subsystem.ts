/**
 * Subsystem Logging
 *
 * Creates loggers tagged with the subsystem that emits them. All subsystem
 * loggers share one winston instance writing to the console, so the level
 * set through LOG_LEVEL or setLogLevel() applies everywhere.
 */

import winston from 'winston';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogMeta = Record<string, unknown>;

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
}

const LEVELS: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m'
};

const levelColors: Record<string, string> = {
  fatal: colors.magenta,
  error: colors.red,
  warn: colors.yellow,
  info: colors.cyan,
  debug: colors.gray,
  trace: colors.gray
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Renders log metadata as space separated key=value pairs
 */
export function formatMeta(meta: LogMeta): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (value instanceof Error) {
      parts.push(`${key}=${value.message}`);
    } else if (typeof value === 'object') {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(' ');
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, subsystem, ...meta }) => {
    const color = levelColors[level] ?? '';
    const levelStr = `${color}${level.toUpperCase().padEnd(5)}${colors.reset}`;
    const scope = typeof subsystem === 'string' ? `${colors.dim}[${subsystem}]${colors.reset} ` : '';
    const metaStr = formatMeta(meta);
    const tail = metaStr ? ` ${colors.gray}${metaStr}${colors.reset}` : '';
    return `${colors.dim}${String(timestamp)}${colors.reset} ${levelStr} ${scope}${String(message)}${tail}`;
  })
);

const rootLogger = winston.createLogger({
  levels: LEVELS,
  level: initialLevel(),
  transports: [
    // Everything goes to stderr so stdout stays free for --plan output
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: Object.keys(LEVELS)
    })
  ]
});

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

export function getLogLevel(): LogLevel {
  const level = rootLogger.level;
  return isLogLevel(level) ? level : 'info';
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, meta?: LogMeta): void => {
    rootLogger.log(level, message, { ...meta, subsystem });
  };

  return {
    subsystem,
    trace: (message, meta) => emit('trace', message, meta),
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
    fatal: (message, meta) => emit('fatal', message, meta)
  };
}
