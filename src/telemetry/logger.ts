import { redactContext, redactText } from '../security/redaction.js';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const isDebugEnabled = (): boolean =>
  process.env.PKGSTAGE_DEBUG === '1' || process.env.PKGSTAGE_DEBUG === 'true';

const emit = (level: 'info' | 'warn' | 'error' | 'debug', message: string, context?: LogContext): void => {
  if (level === 'debug' && !isDebugEnabled()) return;
  // stdout carries command output (`status --json`); logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  const safeMessage = redactText(message).text;
  if (context && Object.keys(context).length > 0) {
    logger(safeMessage, redactContext(context));
    return;
  }
  logger(safeMessage);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
