/**
 * Runtime configuration for the core structures.
 * Initial values are read from the environment once, then held in memory.
 */

// Environment variable that switches debug logging on
export const DEBUG_ENV_VAR = 'BOARDKIT_DEBUG';

export interface CoreConfig {
  /** Log structural events (rejected edges, shuffles, plugin moves) to the console */
  debug: boolean;
}

const DEFAULT_CONFIG: CoreConfig = {
  debug: false,
};

// In-memory config cache
let cachedConfig: CoreConfig | null = null;

/**
 * Parse a flag value the way the debug switches are written: 1, true or yes.
 */
export function parseFlag(value: string | undefined): boolean {
  const flag = String(value ?? '').trim().toLowerCase();
  return flag === '1' || flag === 'true' || flag === 'yes';
}

/**
 * Load overrides from the process environment
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Partial<CoreConfig> {
  const stored: Partial<CoreConfig> = {};
  if (env[DEBUG_ENV_VAR] !== undefined) {
    stored.debug = parseFlag(env[DEBUG_ENV_VAR]);
  }
  return stored;
}

/**
 * Get the current configuration
 */
export function getConfig(): CoreConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const stored = loadFromEnvironment(process.env);
  cachedConfig = { ...DEFAULT_CONFIG, ...stored };
  return cachedConfig;
}

/**
 * Update the configuration
 */
export function setConfig(updates: Partial<CoreConfig>): CoreConfig {
  const current = getConfig();
  cachedConfig = { ...current, ...updates };
  return cachedConfig;
}

/**
 * Reset configuration to defaults, ignoring the environment
 */
export function resetConfig(): CoreConfig {
  cachedConfig = { ...DEFAULT_CONFIG };
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next read consults the environment again
 */
export function reloadConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  cachedConfig = { ...DEFAULT_CONFIG, ...loadFromEnvironment(env) };
  return cachedConfig;
}
