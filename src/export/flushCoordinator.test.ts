import { describe, it, expect } from 'vitest';
import type { TraceSnapshot } from '../types/index.js';
import { createInMemoryTraceStore } from '../store/traceStore.js';
import { deferred, makeSnapshot } from '../test/fixtures.js';
import { createExportQueue } from './exportQueue.js';
import { createFlushCoordinator } from './flushCoordinator.js';
import { createExportWorkerPool } from './workerPool.js';

function setup(capacity = 100) {
  const queue = createExportQueue<TraceSnapshot>({ capacity });
  const store = createInMemoryTraceStore();
  const pool = createExportWorkerPool({ queue, store, size: 2 });
  const coordinator = createFlushCoordinator({ queue, pool, shutdownFlushTimeoutMs: 1000 });
  return { queue, store, pool, coordinator };
}

describe('FlushCoordinator', () => {
  it('returns true at once when nothing is pending', async () => {
    const { pool, coordinator } = setup();
    await expect(coordinator.flush(0)).resolves.toBe(true);
    expect(pool.isRunning()).toBe(false);
  });

  it('starts the workers and waits for queued traces', async () => {
    const { queue, store, pool, coordinator } = setup();
    queue.offer(makeSnapshot('t1'));
    queue.offer(makeSnapshot('t2'));

    await expect(coordinator.flush(1000)).resolves.toBe(true);

    expect(store.traces).toHaveLength(2);
    await pool.stop();
  });

  it('returns false when the deadline passes first, without cancelling the export', async () => {
    const { queue, store, pool, coordinator } = setup();
    const gate = deferred();
    store.gate = gate.promise;
    queue.offer(makeSnapshot('slow'));

    await expect(coordinator.flush(20)).resolves.toBe(false);
    expect(queue.unfinished()).toBe(1);

    gate.resolve();
    await expect(coordinator.flush(1000)).resolves.toBe(true);
    expect(store.getTrace('slow')).toBeDefined();
    await pool.stop();
  });

  it('drains and stops the workers on shutdown, only once', async () => {
    const { queue, store, pool, coordinator } = setup();
    queue.offer(makeSnapshot('t1'));

    const first = coordinator.shutdown();
    const second = coordinator.shutdown();

    expect(second).toBe(first);
    await expect(first).resolves.toBe(true);
    expect(store.traces).toHaveLength(1);
    expect(pool.isRunning()).toBe(false);
    expect(queue.offer(makeSnapshot('late'))).toBe(false);
  });

  it('discards what is still buffered when shutdown times out', async () => {
    const { queue, store, pool, coordinator } = setup();
    const gate = deferred();
    store.gate = gate.promise;
    queue.offer(makeSnapshot('a'));
    queue.offer(makeSnapshot('b'));
    queue.offer(makeSnapshot('c'));

    await expect(coordinator.shutdown(20)).resolves.toBe(false);

    expect(queue.size()).toBe(0);
    expect(pool.getStats().dropped).toBe(1);
    gate.resolve();
    await queue.onIdle();
    expect(store.traces.map((t) => t.info.traceId)).toEqual(['a', 'b']);
  });

  it('installs and removes a single exit hook', () => {
    const { coordinator } = setup();
    const before = process.listenerCount('beforeExit');

    coordinator.installShutdownHook();
    coordinator.installShutdownHook();
    expect(process.listenerCount('beforeExit')).toBe(before + 1);

    coordinator.removeShutdownHook();
    expect(process.listenerCount('beforeExit')).toBe(before);
  });
});
