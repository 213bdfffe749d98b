/**
 * Throttled Logging
 *
 * Suppresses repeats of the same warning within a window so that a hot
 * path (a full export queue, a backend that keeps rejecting) produces one
 * line per window instead of one per event. The first suppressed-window
 * emission reports how many repeats were swallowed.
 *
 * @module logging/throttle
 */

import type { Logger, LogMetadata } from './logger.js';

export interface ThrottleConfig {
  /** Minimum time between two emissions for the same key. */
  windowMs: number;
  /** Clock, exposed for deterministic tests. Defaults to Date.now. */
  now?: () => number;
}

export interface ThrottledLogger {
  /** Log a warning unless one was logged for this key inside the window. Returns true if emitted. */
  warn(key: string, message: string, metadata?: LogMetadata): boolean;
  /** Number of warnings swallowed for the key since the last emission. */
  suppressedCount(key: string): number;
  reset(): void;
}

interface KeyState {
  lastEmittedAt: number;
  suppressed: number;
}

export function createThrottledLogger(logger: Logger, config: ThrottleConfig): ThrottledLogger {
  const now = config.now ?? Date.now;
  const keys = new Map<string, KeyState>();

  return {
    warn(key: string, message: string, metadata?: LogMetadata): boolean {
      const at = now();
      const state = keys.get(key);

      if (state && at - state.lastEmittedAt < config.windowMs) {
        state.suppressed++;
        return false;
      }

      const suppressed = state?.suppressed ?? 0;
      keys.set(key, { lastEmittedAt: at, suppressed: 0 });
      logger.warn(message, suppressed > 0 ? { ...metadata, suppressed } : metadata);
      return true;
    },

    suppressedCount(key: string): number {
      return keys.get(key)?.suppressed ?? 0;
    },

    reset(): void {
      keys.clear();
    },
  };
}
