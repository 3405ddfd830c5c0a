export type LogContext = {
  source?: string;
  requestId?: string;
  datasetKind?: string;
  [key: string]: unknown;
};

export type LogEntryLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogEntryLevel;
  source: string;
  message: string;
  data?: unknown;
  context?: LogContext;
}

export interface ILogAdapter {
  log(entry: LogEntry): Promise<void>;
}

export type ConfiguredLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

export type LoggingConfig = {
  logLevel?: ConfiguredLevel;
  sourceFilters?: Record<string, ConfiguredLevel>;
  adapters: string[]; // e.g., ['console']
};
