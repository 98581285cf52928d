import { isLoggingDisabled, isVerboseLoggingEnabled } from '../utils/runtime_controls.js';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(WEIGHTS, value);
}

function shouldEmit(level: LogLevel): boolean {
  if (isLoggingDisabled()) {
    return false;
  }

  const envLevel = String(process.env.PROBLEMSET_AUDIT_LOG_LEVEL ?? '').toLowerCase().trim();
  const threshold = isLogLevel(envLevel)
    ? WEIGHTS[envLevel]
    : (isVerboseLoggingEnabled() ? WEIGHTS.info : WEIGHTS.warn);

  return WEIGHTS[level] >= threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (!shouldEmit(level)) return;

  // stdout carries the report and --json output; logs always go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
