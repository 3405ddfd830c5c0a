// Module-scoped verbose logging switches.
// Read from DEBUG_FLAGS="SessionController,FetchOrchestrator"; always off in production.

/**
 * Type for debug flag map
 */
export type DebugFlagMap = Record<string, boolean>;

const isProd = process.env.NODE_ENV === 'production';

let debugFlags: DebugFlagMap = {};

function loadEnvFlags(): DebugFlagMap {
  const raw = process.env.DEBUG_FLAGS;
  if (!raw) return {};
  const map: DebugFlagMap = {};
  for (const flag of raw.split(',').map(f => f.trim()).filter(Boolean)) {
    map[flag] = true;
  }
  return map;
}

debugFlags = isProd ? {} : loadEnvFlags();

/**
 * Check if debug is enabled for a given module
 * @param module - The module name (e.g., 'SessionController')
 */
export function isDebugEnabled(module: string): boolean {
  if (isProd) return false;
  return !!debugFlags[module];
}

export function setDebugFlag(module: string, enabled: boolean): void {
  if (isProd) return;
  debugFlags[module] = enabled;
}

export function resetDebugFlags(): void {
  debugFlags = {};
}
