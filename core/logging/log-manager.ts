/* eslint-disable no-restricted-syntax */
// NOTE: LogManager backs the logger facade in utils/logging/logger. Application code logs through `logger`.
import { v4 as uuidv4 } from 'uuid';
import { LoggingConfig, LogEntry, ILogAdapter, LogContext, LogEntryLevel, ConfiguredLevel } from './types';
import {
  isLogLevelEnabled,
  setLogLevel,
  getLogLevel,
  getLogLevelConfig,
  clearModuleLevels,
  isLogLevel,
  LogLevel
} from './logLevelConfig';

/**
 * Singleton log sink for the importer core
 */
export class LogManager {
  private static instance: LogManager;
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000;
  private rateLimits: Map<string, number> = new Map();
  private readonly RATE_LIMIT_MS = 1000;
  private config: LoggingConfig = loadLoggingConfig();
  private adapters: ILogAdapter[];
  private readonly instanceId: string;

  private constructor() {
    this.instanceId = uuidv4();
    this.adapters = resolveAdapters(this.config.adapters);
    applyConfiguredLevels(this.config);
  }

  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  public getInstanceId(): string {
    return this.instanceId;
  }

  public setLogLevel(level: LogLevel): void {
    setLogLevel(level);
  }

  public getLogLevel(): LogLevel {
    return getLogLevel();
  }

  public setComponentLogLevel(component: string, level: LogLevel): void {
    setLogLevel(level, component);
  }

  public getComponentLogLevel(component: string): LogLevel {
    return getLogLevel(component);
  }

  public getComponentFilters(): [string, LogLevel][] {
    return Object.entries(getLogLevelConfig().modules);
  }

  public clearFilters(): void {
    clearModuleLevels();
  }

  public setAdapters(adapters: ILogAdapter[]): void {
    this.adapters = [...adapters];
  }

  private shouldLog(level: LogLevel, source: string): boolean {
    return isLogLevelEnabled(source, level);
  }

  private shouldRateLimit(key: string): boolean {
    // Messages emitted on every page, chunk or timer tick
    const noisyPatterns = [
      'Request registered',
      'Request settled',
      'Progress update',
      'Chunk imported',
      'Session check'
    ];

    const importantPatterns = [
      'Login',
      'Logout',
      'Session expired',
      'Fetch complete',
      'Fetch failed',
      'Import complete',
      'Import failed',
      'Token refresh'
    ];

    if (importantPatterns.some(pattern => key.includes(pattern))) {
      return false;
    }

    if (noisyPatterns.some(pattern => key.includes(pattern))) {
      const now = Date.now();
      const lastLog = this.rateLimits.get(key);
      if (lastLog !== undefined && now - lastLog < this.RATE_LIMIT_MS) {
        return true;
      }
      this.rateLimits.set(key, now);
    }

    return false;
  }

  /**
   * Safely stringify an object, handling circular references and large objects
   */
  public safeStringify(obj: unknown, indent: number = 2): string {
    const MAX_DEPTH = 3;
    const MAX_ARRAY_LENGTH = 10;
    const TRUNCATE_LENGTH = 100;
    const MAX_OBJECT_KEYS = 20;
    // Token material never reaches a log sink
    const REDACTED_KEYS = new Set(['accessToken', 'refreshToken', 'idToken', 'password', 'Authorization']);

    const seen = new WeakSet<object>();

    const visit = (value: unknown, depth: number): unknown => {
      if (value === null || value === undefined) {
        return value ?? null;
      }
      if (typeof value === 'string') {
        return value.length > TRUNCATE_LENGTH ? `${value.slice(0, TRUNCATE_LENGTH)}...` : value;
      }
      if (typeof value === 'function') {
        return '[Function]';
      }
      if (typeof value !== 'object') {
        return value;
      }
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack?.split('\n').slice(0, 3).join('\n')
        };
      }
      if (value instanceof Date) {
        return value.toISOString();
      }
      if (value instanceof Map) {
        return `[Map(${value.size})]`;
      }
      if (value instanceof Set) {
        return `[Set(${value.size})]`;
      }
      if (seen.has(value)) {
        return '[Circular]';
      }
      if (depth >= MAX_DEPTH) {
        return Array.isArray(value) ? `[Array(${value.length})]` : '[Nested]';
      }
      seen.add(value);

      if (Array.isArray(value)) {
        if (value.length > MAX_ARRAY_LENGTH) {
          return `[Array(${value.length})]`;
        }
        return value.map(item => visit(item, depth + 1));
      }

      const entries = Object.entries(value).filter(([key]) => !key.startsWith('_'));
      const result: Record<string, unknown> = {};
      for (const [key, item] of entries.slice(0, MAX_OBJECT_KEYS)) {
        result[key] = REDACTED_KEYS.has(key) ? '[Redacted]' : visit(item, depth + 1);
      }
      if (entries.length > MAX_OBJECT_KEYS) {
        result['...'] = `${entries.length - MAX_OBJECT_KEYS} more properties`;
      }
      return result;
    };

    return JSON.stringify(visit(obj, 0), null, indent) ?? 'null';
  }

  private async addLog(entry: LogEntry): Promise<void> {
    try {
      if (!entry.message || !entry.source) {
        return;
      }

      const rateKey = `${entry.source}:${entry.level}:${entry.message}`;
      if (this.shouldRateLimit(rateKey)) {
        return;
      }

      this.logs.push(entry);
      if (this.logs.length > this.MAX_LOGS) {
        this.logs = this.logs.slice(-this.MAX_LOGS);
      }

      await Promise.all(this.adapters.map(adapter => adapter.log(entry)));
    } catch (error) {
      console.error('Error adding log entry:', { error, source: entry.source, message: entry.message });
    }
  }

  private async write(level: LogEntryLevel, source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    if (this.shouldLog(level, source)) {
      await this.addLog({
        timestamp: new Date().toISOString(),
        level, source, message, data, context
      });
    }
  }

  public async debug(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('debug', source, message, data, context);
  }

  public async info(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('info', source, message, data, context);
  }

  public async warn(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('warn', source, message, data, context);
  }

  public async error(source: string, message: string, data?: unknown, context?: LogContext): Promise<void> {
    await this.write('error', source, message, data, context);
  }

  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  public clearLogs(): void {
    this.logs = [];
    this.rateLimits.clear();
  }

  public formatLogEntry(entry: LogEntry): string {
    let dataStr = '';
    if (entry.data !== undefined) {
      try {
        dataStr = ` ${this.safeStringify(entry.data, 0)}`;
      } catch {
        dataStr = ' [Error stringifying data]';
      }
    }
    return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}${dataStr}`;
  }

  /**
   * Render the retained history as a text report, e.g. for a "copy logs" action
   */
  public exportLogs(): string {
    const header = [
      '=== Mining Data Importer Logs ===',
      `Generated: ${new Date().toISOString()}`,
      `Environment: ${process.env.NODE_ENV ?? 'development'}`,
      `Log Level: ${this.getLogLevel()}`,
      `Total Logs: ${this.logs.length}`,
      '================================',
      ''
    ].join('\n');

    return header + this.logs.map(entry => this.formatLogEntry(entry)).join('\n');
  }
}

function toLevel(value: string | undefined): ConfiguredLevel | undefined {
  const upper = value?.trim().toUpperCase();
  switch (upper) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
    case 'NONE':
      return upper;
    default:
      return undefined;
  }
}

// Config loader (env)
function loadLoggingConfig(): LoggingConfig {
  const logLevel = toLevel(process.env.LOG_LEVEL);
  let sourceFilters: LoggingConfig['sourceFilters'] = undefined;
  if (process.env.LOG_SOURCES) {
    const filters: Record<string, ConfiguredLevel> = {};
    for (const pair of process.env.LOG_SOURCES.split(',')) {
      const [src, lvl] = pair.split(':');
      const level = toLevel(lvl);
      if (src && level) filters[src.trim()] = level;
    }
    sourceFilters = filters;
  }
  return { logLevel, sourceFilters, adapters: ['console'] };
}

function applyConfiguredLevels(config: LoggingConfig): void {
  const global = config.logLevel?.toLowerCase();
  if (global && isLogLevel(global)) {
    setLogLevel(global);
  }
  for (const [source, level] of Object.entries(config.sourceFilters ?? {})) {
    const normalized = level.toLowerCase();
    if (isLogLevel(normalized)) {
      setLogLevel(normalized, source);
    }
  }
}

// Console adapter (default)
class ConsoleAdapter implements ILogAdapter {
  async log(entry: LogEntry): Promise<void> {
    const line = `[${entry.timestamp}] [${entry.source}] ${entry.message}`;
    const data = entry.data === undefined ? '' : LogManager.getInstance().safeStringify(entry.data, 0);
    switch (entry.level) {
      case 'debug':
        console.debug(line, data);
        break;
      case 'info':
        console.info(line, data);
        break;
      case 'warn':
        console.warn(line, data);
        break;
      case 'error':
        console.error(line, data);
        break;
    }
  }
}

// Adapter registry
const adapterRegistry: Record<string, ILogAdapter> = {
  console: new ConsoleAdapter()
};

function resolveAdapters(names: string[]): ILogAdapter[] {
  const adapters = names
    .map(name => adapterRegistry[name])
    .filter((adapter): adapter is ILogAdapter => adapter !== undefined);
  return adapters.length > 0 ? adapters : [adapterRegistry.console];
}
/* eslint-enable no-restricted-syntax */
