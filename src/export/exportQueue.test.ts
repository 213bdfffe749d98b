import { describe, it, expect } from 'vitest';
import { createLogger } from '../logging/logger.js';
import type { LogEntry } from '../logging/logger.js';
import { createExportQueue } from './exportQueue.js';

function recordingLogger() {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { entries, logger };
}

describe('ExportQueue', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => createExportQueue({ capacity: 0 })).toThrow(RangeError);
    expect(() => createExportQueue({ capacity: 1.5 })).toThrow(RangeError);
  });

  it('delivers items in FIFO order', async () => {
    const queue = createExportQueue<string>();
    queue.offer('a');
    queue.offer('b');

    expect(await queue.take()).toBe('a');
    expect(await queue.take()).toBe('b');
  });

  it('drops the incoming item when full and counts it', () => {
    const queue = createExportQueue<number>({ capacity: 2 });

    expect(queue.offer(1)).toBe(true);
    expect(queue.offer(2)).toBe(true);
    expect(queue.offer(3)).toBe(false);

    expect(queue.size()).toBe(2);
    expect(queue.unfinished()).toBe(2);
    expect(queue.droppedCount()).toBe(1);
  });

  it('warns about drops at most once per interval', () => {
    const { entries, logger } = recordingLogger();
    let clock = 0;
    const queue = createExportQueue<number>({
      capacity: 1,
      dropWarningIntervalMs: 1000,
      logger,
      now: () => clock,
    });
    queue.offer(0);

    queue.offer(1);
    queue.offer(2);
    clock = 500;
    queue.offer(3);
    clock = 1000;
    queue.offer(4);

    const warnings = entries.filter((e) => e.level === 'warn');
    expect(warnings).toHaveLength(2);
    expect(warnings[0]?.message).toBe('Export queue rejected a trace; it will not be exported');
    expect(warnings[0]?.component).toBe('export-queue');
    expect(warnings[1]?.metadata).toEqual({ reason: 'full', capacity: 1, dropped: 4, suppressed: 2 });
  });

  it('hands an item straight to a waiting taker', async () => {
    const queue = createExportQueue<string>({ capacity: 1 });
    const taken = queue.take();

    expect(queue.offer('direct')).toBe(true);
    expect(queue.size()).toBe(0);
    expect(queue.unfinished()).toBe(1);
    expect(await taken).toBe('direct');
  });

  it('resolves onIdle once every accepted item is done', async () => {
    const queue = createExportQueue<string>();
    queue.offer('a');
    queue.offer('b');
    let idle = false;
    const waiting = queue.onIdle().then(() => {
      idle = true;
    });

    await queue.take();
    queue.taskDone();
    await Promise.resolve();
    expect(idle).toBe(false);

    await queue.take();
    queue.taskDone();
    await waiting;
    expect(idle).toBe(true);
  });

  it('is idle immediately when nothing was accepted', async () => {
    const queue = createExportQueue<string>();
    await expect(queue.onIdle()).resolves.toBeUndefined();
  });

  it('throws when taskDone outnumbers accepted items', () => {
    const queue = createExportQueue<string>();
    expect(() => queue.taskDone()).toThrow(/more times than items were accepted/);
  });

  it('releases waiting takers on close and drops later offers', async () => {
    const queue = createExportQueue<string>();
    const taken = queue.take();

    queue.close();

    expect(await taken).toBeUndefined();
    expect(queue.isClosed()).toBe(true);
    expect(queue.offer('late')).toBe(false);
    expect(queue.droppedCount()).toBe(1);
  });

  it('still drains buffered items after a plain close', async () => {
    const queue = createExportQueue<string>();
    queue.offer('kept');
    queue.close();

    expect(await queue.take()).toBe('kept');
    expect(await queue.take()).toBeUndefined();
  });

  it('discards buffered items and settles idle waiters on close with discard', async () => {
    const queue = createExportQueue<string>();
    queue.offer('a');
    queue.offer('b');
    const idle = queue.onIdle();

    queue.close({ discard: true });

    await idle;
    expect(queue.size()).toBe(0);
    expect(queue.unfinished()).toBe(0);
    expect(queue.droppedCount()).toBe(2);
  });
});
