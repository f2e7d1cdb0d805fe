import { config, LogLevelSetting } from '../../config/index';

/**
 * Log level type
 */
export type LogLevel = LogLevelSetting;

/**
 * Log entry structure
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Log level priority
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sensitive fields to mask in logs
 */
const SENSITIVE_FIELDS = [
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'token',
  'password',
  'secret',
  'clientSecret',
  'client_secret',
  'authorization',
];

/**
 * Keys masked only on exact match ('statusCode' must stay readable)
 */
const SENSITIVE_EXACT_KEYS = ['code'];

/**
 * Query parameters that carry credentials inside URLs
 */
const SENSITIVE_QUERY_PATTERN = /([?&](?:access_token|refresh_token|code)=)[^&\s]+/gi;

/**
 * Mask sensitive data in context
 */
export function maskSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();

    if (
      SENSITIVE_EXACT_KEYS.includes(lowerKey) ||
      SENSITIVE_FIELDS.some(field => lowerKey.includes(field.toLowerCase()))
    ) {
      masked[key] = typeof value === 'string' ? maskString(value) : '[REDACTED]';
    } else if (typeof value === 'string') {
      masked[key] = maskUrlCredentials(value);
    } else if (isPlainRecord(value)) {
      masked[key] = maskSensitiveData(value);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Mask credentials passed as query parameters, e.g. download URLs with ?access_token=
 */
export function maskUrlCredentials(value: string): string {
  return value.replace(SENSITIVE_QUERY_PATTERN, '$1[REDACTED]');
}

/**
 * Mask a string value (show first 4 and last 4 characters)
 */
function maskString(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, 4)}${'*'.repeat(value.length - 8)}${value.slice(-4)}`;
}

/**
 * Logger implementation
 */
export class Logger implements ILogger {
  private readonly level: LogLevel;
  private readonly levelPriority: number;

  constructor(level?: LogLevel) {
    this.level = level ?? config.logging.level;
    this.levelPriority = LOG_LEVELS[this.level];
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.levelPriority;
  }

  private formatEntry(entry: LogEntry): string {
    return JSON.stringify(entry);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: maskUrlCredentials(message),
    };

    if (context) {
      entry.context = maskSensitiveData(context);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: maskUrlCredentials(error.message),
        stack: error.stack,
      };
    }

    const output = this.formatEntry(entry);

    switch (level) {
      case 'debug':
      case 'info':
        console.log(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
        console.error(output);
        break;
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger();

export default logger;
