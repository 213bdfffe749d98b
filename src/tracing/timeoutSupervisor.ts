/**
 * Trace Timeout Supervisor
 *
 * One background interval that scans in-progress traces and force-closes
 * those older than the configured timeout. Started lazily by the first
 * trace, stopped after the registry has been empty for a grace period, and
 * restarted by the next trace. The application keeps running untouched;
 * only the trace record is marked failed.
 *
 * @module tracing/timeoutSupervisor
 */

import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { TraceTimeoutError, toError } from './errors.js';
import type { TraceRegistry } from './registry.js';

export interface TimeoutSupervisorConfig {
  registry: TraceRegistry;
  /** Closes one expired trace; returns false if it had already finished. */
  expire: (traceId: string, at: number, reason: TraceTimeoutError) => boolean;
  /** Maximum trace lifetime. Supervision is disabled when unset. */
  timeoutMs?: number;
  /** Polling period (default: 1000). */
  checkIntervalMs?: number;
  /** Stop polling after the registry stays empty this long (default: 30000). */
  idleGraceMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface TimeoutSupervisor {
  /** Start the polling loop if supervision is enabled and it is not running. */
  ensureStarted(): void;
  /** Run one scan. Returns the number of traces force-closed. */
  check(): number;
  stop(): void;
  isRunning(): boolean;
  isEnabled(): boolean;
}

export function createTimeoutSupervisor(config: TimeoutSupervisorConfig): TimeoutSupervisor {
  const timeoutMs = config.timeoutMs;
  const checkIntervalMs = config.checkIntervalMs ?? 1000;
  const idleGraceMs = config.idleGraceMs ?? 30_000;
  const now = config.now ?? Date.now;
  const logger = (config.logger ?? createSilentLogger()).child({ component: 'timeout-supervisor' });

  let timer: ReturnType<typeof setInterval> | null = null;
  let idleSince: number | null = null;

  function enabled(): boolean {
    return timeoutMs !== undefined && timeoutMs > 0;
  }

  function stop(): void {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
      logger.debug('Timeout supervisor stopped');
    }
    idleSince = null;
  }

  function check(): number {
    if (timeoutMs === undefined || timeoutMs <= 0) return 0;
    const at = now();
    let expired = 0;

    for (const trace of config.registry.inProgress()) {
      if (at - trace.createdAt <= timeoutMs) continue;
      try {
        if (config.expire(trace.traceId, at, new TraceTimeoutError(trace.traceId, timeoutMs))) {
          expired++;
        }
      } catch (error) {
        logger.error('Failed to force-close expired trace', toError(error), {
          traceId: trace.traceId,
        });
      }
    }

    if (config.registry.inProgress().length === 0) {
      idleSince ??= at;
      if (timer !== null && at - idleSince >= idleGraceMs) stop();
    } else {
      idleSince = null;
    }

    return expired;
  }

  return {
    ensureStarted(): void {
      if (!enabled() || timer !== null) return;
      idleSince = null;
      timer = setInterval(() => {
        check();
      }, checkIntervalMs);
      // Supervision alone must not keep the process alive
      timer.unref();
      logger.debug('Timeout supervisor started', { timeoutMs, checkIntervalMs });
    },
    check,
    stop,
    isRunning(): boolean {
      return timer !== null;
    },
    isEnabled: enabled,
  };
}
