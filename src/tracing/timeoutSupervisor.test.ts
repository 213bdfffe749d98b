import { describe, it, expect, afterEach } from 'vitest';
import type { TraceSnapshot } from '../types/index.js';
import { createLogger } from '../logging/logger.js';
import type { LogEntry } from '../logging/logger.js';
import { createTraceRegistry } from './registry.js';
import { createTimeoutSupervisor } from './timeoutSupervisor.js';
import type { TimeoutSupervisor } from './timeoutSupervisor.js';
import { createTracer } from './tracer.js';

const started: TimeoutSupervisor[] = [];

function setup(timeoutMs: number | undefined, idleGraceMs = 30_000) {
  let clock = 0;
  const submitted: TraceSnapshot[] = [];
  const registry = createTraceRegistry();
  const now = () => clock;
  const tracer = createTracer({
    registry,
    submit: (snapshot) => {
      submitted.push(snapshot);
    },
    now,
  });
  const supervisor = createTimeoutSupervisor({
    registry,
    expire: tracer.expireTrace,
    timeoutMs,
    checkIntervalMs: 60_000,
    idleGraceMs,
    now,
  });
  started.push(supervisor);
  return {
    tracer,
    supervisor,
    submitted,
    setClock(at: number): void {
      clock = at;
    },
  };
}

afterEach(() => {
  for (const supervisor of started.splice(0)) supervisor.stop();
});

describe('TimeoutSupervisor', () => {
  it('force-closes a trace that outlives the timeout while the application carries on', () => {
    const { tracer, supervisor, submitted, setClock } = setup(5000);

    const root = tracer.startSpan('long-job');
    setClock(1000);
    const early = tracer.startSpan('early-step');
    setClock(2000);
    early.end();

    setClock(4000);
    expect(supervisor.check()).toBe(0);

    setClock(5500);
    expect(supervisor.check()).toBe(1);

    setClock(6000);
    const late = tracer.startSpan('late-step');
    late.end();
    setClock(9000);
    root.end();

    expect(late.isRecording).toBe(false);
    expect(submitted).toHaveLength(1);
    const snapshot = submitted[0];
    expect(snapshot?.info).toMatchObject({ state: 'error', timedOut: true, endedAt: 5500 });
    expect(snapshot?.spans.map((s) => [s.name, s.status, s.endTime])).toEqual([
      ['long-job', 'error', 5500],
      ['early-step', 'ok', 2000],
    ]);
  });

  it('leaves traces exactly at the timeout alone', () => {
    const { tracer, supervisor, submitted, setClock } = setup(5000);
    const root = tracer.startSpan('root');

    setClock(5000);
    expect(supervisor.check()).toBe(0);
    root.end();

    expect(submitted[0]?.info.timedOut).toBe(false);
  });

  it('does nothing when no timeout is configured', () => {
    const { tracer, supervisor, setClock } = setup(undefined);
    tracer.startSpan('root');

    supervisor.ensureStarted();
    setClock(10_000_000);

    expect(supervisor.isEnabled()).toBe(false);
    expect(supervisor.isRunning()).toBe(false);
    expect(supervisor.check()).toBe(0);
  });

  it('stops after the registry stays empty for the grace period and restarts on demand', () => {
    const { tracer, supervisor, setClock } = setup(5000, 1000);

    supervisor.ensureStarted();
    expect(supervisor.isRunning()).toBe(true);

    setClock(100);
    supervisor.check();
    expect(supervisor.isRunning()).toBe(true);

    setClock(1100);
    supervisor.check();
    expect(supervisor.isRunning()).toBe(false);

    tracer.startSpan('next');
    supervisor.ensureStarted();
    expect(supervisor.isRunning()).toBe(true);
  });

  it('resets the idle clock while traces are in progress', () => {
    const { tracer, supervisor, setClock } = setup(60_000, 1000);
    supervisor.ensureStarted();

    supervisor.check();
    setClock(500);
    const root = tracer.startSpan('root');
    supervisor.check();
    setClock(1200);
    root.end();
    supervisor.check();

    expect(supervisor.isRunning()).toBe(true);
  });

  it('logs and skips a trace whose force-close throws', () => {
    const entries: LogEntry[] = [];
    const registry = createTraceRegistry();
    const tracer = createTracer({ registry, submit: () => {}, now: () => 0 });
    tracer.startSpan('a');
    tracer.runInNewContext(() => tracer.startSpan('b'));

    let calls = 0;
    const supervisor = createTimeoutSupervisor({
      registry,
      timeoutMs: 10,
      now: () => 100,
      expire: () => {
        calls++;
        if (calls === 1) throw new Error('registry corrupted');
        return true;
      },
      logger: createLogger({ level: 'debug', output: (entry) => entries.push(entry) }),
    });

    expect(supervisor.check()).toBe(1);
    expect(calls).toBe(2);
    expect(entries.find((e) => e.level === 'error')?.message).toBe(
      'Failed to force-close expired trace',
    );
  });
});
