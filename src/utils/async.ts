/**
 * Async Utility Functions
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Clock
// =============================================================================

/**
 * Time source used by the polling loops. Swapped for a manual clock in tests.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
