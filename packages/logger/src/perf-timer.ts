/**
 * @fileoverview Performance timers for measuring call durations.
 * Backed by performance.now(); durations are whole milliseconds.
 */

/**
 * A running or stopped timer.
 */
export interface PerfTimer {
  /** High-resolution start time in milliseconds */
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Starts a new timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const frame = await quote.history({ start: '2024-01-01' });
 * logger.info('history fetched', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,
    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },
    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Measures an async function. A rejection propagates unchanged.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
