/**
 * Debug logging helpers.
 */

import { getConfig } from './config';

export function debugEnabled(): boolean {
  return getConfig().debug;
}

/**
 * Log under a bracketed tag, e.g. `[PartialOrder] rejected edge`.
 * Silent unless debug logging is enabled.
 */
export function debugLog(tag: string, ...args: unknown[]): void {
  if (!debugEnabled()) return;
  // eslint-disable-next-line no-console
  console.log(`[${tag}]`, ...args);
}
