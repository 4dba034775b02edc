/**
 * Logger configuration using Pino
 * Structured logging with configurable levels and a compact pretty output for terminals
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  session: '🔐',
  startup: '🚀',
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

const defaultOptions: LoggerOptions = {
  level: levelFromEnv(),
  pretty: process.env['LOG_PRETTY'] !== 'false',
};

/**
 * Format a value for inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return keys.length === 0 ? '{}' : `{${keys.length} fields}`;
  }

  return String(value);
}

// Cloudflare IDs are 32 hex chars; show a short prefix only
const ID_KEYS = new Set(['id', 'zoneId', 'recordId', 'sessionId']);

/**
 * Format context fields, most useful first
 */
function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const priorityKeys = ['zone', 'type', 'name', 'count', 'method', 'url', 'status'];

  const sortedKeys = Object.keys(log)
    .filter((k) => !excludeKeys.includes(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key], ID_KEYS.has(key) ? 12 : 40);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const level = typeof log['level'] === 'string' ? log['level'] : 'info';
      const service = log['service'];
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = typeof service === 'string' ? `[${service}] ` : '';
      output += String(log[messageKey] ?? '');
      output += formatContext(log, ['level', 'time', 'app', 'service', messageKey, 'err', 'error', 'stack']);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

export function createLogger(options: LoggerOptions = defaultOptions): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: options.level,
    base: {
      app: 'cf-dns-panel',
      pid: undefined,
      hostname: undefined,
    },
    redact: {
      paths: ['apiToken', 'token', '*.apiToken', 'req.headers.authorization', 'req.headers.cookie'],
      censor: '[redacted]',
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (options.pretty) {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
