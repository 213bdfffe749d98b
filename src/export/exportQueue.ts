/**
 * Bounded Export Queue
 *
 * FIFO hand-off between trace producers and export workers. Producers never
 * wait: when the buffer is full the incoming item is dropped and counted.
 * Consumers wait on `take()` until an item arrives or the queue closes.
 *
 * Besides the buffer, the queue counts unfinished items: an item is
 * unfinished from the moment it is accepted until a worker reports it done
 * with `taskDone()`. `onIdle()` resolves when that count reaches zero, which
 * is what flush waits on.
 *
 * @module export/exportQueue
 */

import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { createThrottledLogger } from '../logging/throttle.js';

export interface ExportQueueConfig {
  /** Maximum buffered items (default: 1000). */
  capacity?: number;
  /** Minimum time between two queue-full warnings (default: 60000). */
  dropWarningIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ExportQueue<T> {
  readonly capacity: number;
  /** Enqueue without waiting. Returns false if the item was dropped. */
  offer(item: T): boolean;
  /** Next item, or undefined once the queue is closed and drained. */
  take(): Promise<T | undefined>;
  /** Mark one taken item as fully processed. */
  taskDone(): void;
  /** Resolves once every accepted item has been marked done. */
  onIdle(): Promise<void>;
  /** Buffered items not yet taken. */
  size(): number;
  /** Accepted items not yet marked done, buffered or in a worker. */
  unfinished(): number;
  droppedCount(): number;
  /** Stop accepting items and release waiting takers once drained. */
  close(options?: { discard?: boolean }): void;
  isClosed(): boolean;
}

export function createExportQueue<T>(config: ExportQueueConfig = {}): ExportQueue<T> {
  const capacity = config.capacity ?? 1000;
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Export queue capacity must be a positive integer, got ${capacity}`);
  }
  const logger = (config.logger ?? createSilentLogger()).child({ component: 'export-queue' });
  const throttled = createThrottledLogger(logger, {
    windowMs: config.dropWarningIntervalMs ?? 60_000,
    now: config.now,
  });

  const buffer: T[] = [];
  const takers: Array<(item: T | undefined) => void> = [];
  let idleWaiters: Array<() => void> = [];
  let pending = 0;
  let dropped = 0;
  let closed = false;

  function settleIdle(): void {
    if (pending > 0) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function drop(reason: string): boolean {
    dropped++;
    throttled.warn('queue-full', 'Export queue rejected a trace; it will not be exported', {
      reason,
      capacity,
      dropped,
    });
    return false;
  }

  return {
    capacity,

    offer(item: T): boolean {
      if (closed) return drop('closed');

      const taker = takers.shift();
      if (taker) {
        pending++;
        taker(item);
        return true;
      }
      if (buffer.length >= capacity) return drop('full');

      buffer.push(item);
      pending++;
      return true;
    },

    take(): Promise<T | undefined> {
      if (buffer.length > 0) {
        return Promise.resolve(buffer.shift());
      }
      if (closed) return Promise.resolve(undefined);
      return new Promise((resolve) => {
        takers.push(resolve);
      });
    },

    taskDone(): void {
      if (pending === 0) {
        throw new Error('taskDone() called more times than items were accepted');
      }
      pending--;
      settleIdle();
    },

    onIdle(): Promise<void> {
      if (pending === 0) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    size(): number {
      return buffer.length;
    },

    unfinished(): number {
      return pending;
    },

    droppedCount(): number {
      return dropped;
    },

    close(options?: { discard?: boolean }): void {
      closed = true;
      if (options?.discard && buffer.length > 0) {
        const discarded = buffer.length;
        buffer.length = 0;
        pending -= discarded;
        dropped += discarded;
        logger.warn('Export queue closed with unexported traces discarded', { discarded });
        settleIdle();
      }
      while (takers.length > 0) {
        takers.shift()?.(undefined);
      }
    },

    isClosed(): boolean {
      return closed;
    },
  };
}
