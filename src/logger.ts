export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  round?: number;
  step?: number;
  tool?: string;
  callId?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function contextPrefix(context?: LogContext): string {
  if (!context) {
    return '';
  }

  const parts: string[] = [];
  if (context.round !== undefined) parts.push(`round=${context.round}`);
  if (context.step !== undefined) parts.push(`step=${context.step}`);
  if (context.tool) parts.push(`tool=${context.tool}`);
  if (context.callId) parts.push(`call=${context.callId}`);

  return parts.length ? `[${parts.join(' ')}] ` : '';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function format(level: LogLevel, message: string, context?: LogContext): string {
  return `${new Date().toISOString()} ${level.toUpperCase()} ${contextPrefix(context)}${message}`;
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled('debug')) console.log(format('debug', message, context));
  },

  info(message: string, context?: LogContext): void {
    if (enabled('info')) console.log(format('info', message, context));
  },

  warn(message: string, context?: LogContext): void {
    if (enabled('warn')) console.warn(format('warn', message, context));
  },

  error(message: string, context?: LogContext): void {
    if (enabled('error')) console.error(format('error', message, context));
  },
};
