/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the codebase.
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Network fetch timeout
   * Time for the single page GET of a cycle, including body download
   */
  NETWORK_FETCH: 30000,

  /**
   * Poll interval
   * Fixed sleep between the end of one cycle and the start of the next
   */
  POLL_INTERVAL: 600000,
} as const;

/**
 * Type for timeout keys
 */
export type TimeoutKey = keyof typeof TIMEOUTS;

/**
 * Get a timeout value with optional override
 */
export function getTimeout(key: TimeoutKey, override?: number): number {
  return override ?? TIMEOUTS[key];
}
