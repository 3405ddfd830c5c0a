/* eslint-disable no-restricted-syntax */
import { LogContext, LogEntryLevel } from '../../core/logging/types';
import { LogManager } from '../../core/logging/log-manager';

type LogEventListener = (log: LoggedEvent) => void;

export interface LoggedEvent {
  timestamp: string;
  level: LogEntryLevel;
  source: string;
  message: string;
  data?: Record<string, unknown>;
  context?: LogContext;
}

class LogEventEmitter {
  private listeners: LogEventListener[] = [];

  addListener(listener: LogEventListener) {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  emit(log: LoggedEvent) {
    this.listeners.forEach(listener => listener(log));
  }
}

const logEmitter = new LogEventEmitter();

function normalizeData(data?: unknown): Record<string, unknown> | undefined {
  if (data === undefined) return undefined;
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...data };
  }
  return { value: data };
}

function getSource(context?: LogContext): string {
  return typeof context?.source === 'string' ? context.source : 'unknown';
}

async function write(level: LogEntryLevel, message: string, data?: unknown, context?: LogContext): Promise<void> {
  const source = getSource(context);
  await LogManager.getInstance()[level](source, message, data, context);
  logEmitter.emit({
    timestamp: new Date().toISOString(),
    level,
    source,
    message,
    data: normalizeData(data),
    context
  });
}

/**
 * Application logger. Every module passes its SOURCE in the context.
 */
export const logger = {
  addLogListener: (listener: LogEventListener) => logEmitter.addListener(listener),

  async debug(message: string, data?: unknown, context?: LogContext) {
    await write('debug', message, data, context);
  },

  async info(message: string, data?: unknown, context?: LogContext) {
    await write('info', message, data, context);
  },

  async warn(message: string, data?: unknown, context?: LogContext) {
    await write('warn', message, data, context);
  },

  async error(message: string, data?: unknown, context?: LogContext) {
    await write('error', message, data, context);
  }
};

/* eslint-enable no-restricted-syntax */
