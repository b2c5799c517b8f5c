/**
 * Leveled logger. Writes to stderr so stdout carries only the text summary.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.POSTURE_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env.POSTURE_DEBUG
    ? 'debug'
    : 'info';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
  const prefix = `[${timestamp}] [POSTURE]`;
  const color = LEVEL_COLOR[level];

  let output = `${color}${prefix} ${level.toUpperCase().padEnd(5)}${COLORS.reset} ${message}`;
  if (data) {
    output += ` ${COLORS.dim}${JSON.stringify(data)}${COLORS.reset}`;
  }
  return output;
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  debug(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('debug')) console.error(formatMessage('debug', message, data));
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('info')) console.error(formatMessage('info', message, data));
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (shouldLog('warn')) console.error(formatMessage('warn', message, data));
  },

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (shouldLog('error')) {
      const errorData =
        error instanceof Error
          ? { ...data, error: error.message, stack: error.stack }
          : { ...data, error: String(error) };
      console.error(formatMessage('error', message, errorData));
    }
  },

  /** Log a provider call */
  probe(service: string, command: string, data?: Record<string, unknown>): void {
    this.debug(`Probe: ${service} ${command}`, data);
  },

  /** Log a gate state change */
  transition(from: string, to: string): void {
    this.info(`Permission gate: ${from} -> ${to}`);
  },
};
