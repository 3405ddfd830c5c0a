import { isDebugEnabled } from '../../utils/logging/debugFlags';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'none';

const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5,
};

interface LogLevelConfig {
  global: LogLevel;
  modules: Record<string, LogLevel>;
  environment: 'development' | 'production' | 'test';
}

function detectEnvironment(): LogLevelConfig['environment'] {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

const env = detectEnvironment();

function defaultGlobalLevel(): LogLevel {
  if (env === 'production') return 'info';
  // Jest sets NODE_ENV=test; keep test output quiet
  if (env === 'test') return 'none';
  return 'debug';
}

let config: LogLevelConfig = {
  global: defaultGlobalLevel(),
  modules: {},
  environment: env,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_NUM, value);
}

export function getLogLevel(moduleName?: string): LogLevel {
  if (moduleName && config.modules[moduleName]) {
    return config.modules[moduleName];
  }
  return config.global;
}

export function setLogLevel(level: LogLevel, moduleName?: string) {
  if (moduleName) {
    config.modules[moduleName] = level;
  } else {
    config.global = level;
  }
}

export function clearModuleLevels() {
  config = { ...config, modules: {} };
}

export function isLogLevelEnabled(moduleName: string, level: LogLevel): boolean {
  // A debug flag lowers the module's threshold to 'debug'
  if (isDebugEnabled(moduleName)) {
    return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM['debug'];
  }
  const configuredLevel = config.modules[moduleName] || config.global;
  return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[configuredLevel];
}

export function getLogLevelConfig(): LogLevelConfig {
  return { ...config, modules: { ...config.modules } };
}
