import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, createSilentLogger, isLogLevel, type LogEntry, type LogOutput } from './logger.js';

describe('Logger', () => {
  let captured: LogEntry[];
  let output: LogOutput;

  beforeEach(() => {
    captured = [];
    output = (entry: LogEntry) => {
      captured.push(entry);
    };
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  // ─── JSON Structured Output ────────────────────────────────────────────

  describe('JSON structured output', () => {
    it('writes one JSON line per entry to stdout by default', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const logger = createLogger({ service: 'test-svc', level: 'info' });

      logger.info('hello');

      expect(writeSpy).toHaveBeenCalledOnce();
      const raw = String(writeSpy.mock.calls[0]?.[0]);
      expect(raw.endsWith('\n')).toBe(true);
      expect(JSON.parse(raw)).toMatchObject({ level: 'info', message: 'hello', service: 'test-svc' });

      writeSpy.mockRestore();
    });

    it('defaults the service name', () => {
      createLogger({ output, level: 'info' }).info('x');
      expect(captured[0]?.service).toBe('trace-pipeline');
    });

    it('includes context fields and non-empty metadata', () => {
      const logger = createLogger({
        output,
        level: 'debug',
        context: { component: 'export-queue', traceId: 't-1', spanId: 's-1' },
      });

      logger.warn('queue full', { capacity: 2 });
      logger.info('no metadata', {});

      expect(captured[0]).toMatchObject({
        level: 'warn',
        component: 'export-queue',
        traceId: 't-1',
        spanId: 's-1',
        metadata: { capacity: 2 },
      });
      expect(captured[1]?.metadata).toBeUndefined();
    });

    it('serializes errors with name, message and stack', () => {
      const logger = createLogger({ output, level: 'debug' });
      const error = new TypeError('bad input');

      logger.error('failed', error, { attempt: 3 });

      expect(captured[0]?.error).toEqual({ name: 'TypeError', message: 'bad input', stack: error.stack });
      expect(captured[0]?.metadata).toEqual({ attempt: 3 });
    });
  });

  // ─── Level Filtering ───────────────────────────────────────────────────

  describe('level filtering', () => {
    it('drops entries below the minimum level', () => {
      const logger = createLogger({ output, level: 'warn' });

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');
      logger.fatal('f');

      expect(captured.map((e) => e.level)).toEqual(['warn', 'error', 'fatal']);
    });

    it('reads the minimum level from LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'ERROR');
      const logger = createLogger({ output });

      logger.warn('w');
      logger.error('e');

      expect(captured.map((e) => e.level)).toEqual(['error']);
    });

    it('falls back to info for an unknown LOG_LEVEL', () => {
      vi.stubEnv('LOG_LEVEL', 'verbose');
      const logger = createLogger({ output });

      logger.debug('d');
      logger.info('i');

      expect(captured.map((e) => e.level)).toEqual(['info']);
    });

    it('recognises only the five levels', () => {
      expect(isLogLevel('fatal')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel('toString')).toBe(false);
    });
  });

  // ─── Child Loggers ─────────────────────────────────────────────────────

  describe('child loggers', () => {
    it('merge their context over the parent context', () => {
      const parent = createLogger({ output, level: 'debug', context: { component: 'tracing' } });
      const child = parent.child({ component: 'tracer', traceId: 't-9' });

      child.debug('span started');
      parent.debug('parent entry');

      expect(captured[0]).toMatchObject({ component: 'tracer', traceId: 't-9' });
      expect(captured[1]?.component).toBe('tracing');
      expect(captured[1]?.traceId).toBeUndefined();
    });

    it('keep the parent level and output', () => {
      const child = createLogger({ output, level: 'error' }).child({ component: 'x' });

      child.warn('dropped');
      child.error('kept');

      expect(captured.map((e) => e.message)).toEqual(['kept']);
    });
  });

  describe('createSilentLogger', () => {
    it('writes nothing', () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

      createSilentLogger().fatal('nothing to see', new Error('x'));

      expect(writeSpy).not.toHaveBeenCalled();
      writeSpy.mockRestore();
    });
  });
});
