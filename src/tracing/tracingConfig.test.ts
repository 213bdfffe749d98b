import { describe, it, expect } from 'vitest';
import { DEFAULT_TRACING_CONFIG, loadTracingConfig } from './tracingConfig.js';

describe('loadTracingConfig', () => {
  it('should return defaults for an empty environment', () => {
    expect(loadTracingConfig({})).toEqual(DEFAULT_TRACING_CONFIG);
  });

  it('should leave the trace timeout disabled unless set', () => {
    expect(loadTracingConfig({}).timeoutMs).toBeUndefined();
    expect(loadTracingConfig({ TRACE_TIMEOUT_SECONDS: '0' }).timeoutMs).toBeUndefined();
    expect(loadTracingConfig({ TRACE_TIMEOUT_SECONDS: '2.5' }).timeoutMs).toBe(2500);
  });

  it('should convert every duration from seconds to milliseconds', () => {
    const config = loadTracingConfig({
      TRACE_TIMEOUT_CHECK_INTERVAL_SECONDS: '0.5',
      TRACE_TIMEOUT_IDLE_GRACE_SECONDS: '5',
      TRACE_EXPORT_RETRY_TIMEOUT_SECONDS: '60',
      TRACE_SHUTDOWN_FLUSH_TIMEOUT_SECONDS: '3',
    });

    expect(config.timeoutCheckIntervalMs).toBe(500);
    expect(config.timeoutIdleGraceMs).toBe(5000);
    expect(config.exportRetryTimeoutMs).toBe(60_000);
    expect(config.shutdownFlushTimeoutMs).toBe(3000);
  });

  it('should read pool, queue and backend settings', () => {
    const config = loadTracingConfig({
      TRACE_ENABLED: 'FALSE',
      TRACE_EXPORT_MAX_WORKERS: '4',
      TRACE_EXPORT_MAX_QUEUE_SIZE: '50',
      TRACE_BACKEND: 'HTTP',
      TRACE_BACKEND_ENDPOINT: 'http://tracking.test/api/traces',
      TRACE_BACKEND_TOKEN: 'test-secret',
    });

    expect(config.enabled).toBe(false);
    expect(config.exportMaxWorkers).toBe(4);
    expect(config.exportMaxQueueSize).toBe(50);
    expect(config.backend).toBe('http');
    expect(config.backendEndpoint).toBe('http://tracking.test/api/traces');
    expect(config.backendToken).toBe('test-secret');
  });

  it('should fall back to defaults for invalid values', () => {
    const config = loadTracingConfig({
      TRACE_EXPORT_MAX_WORKERS: 'many',
      TRACE_EXPORT_MAX_QUEUE_SIZE: '-1',
      TRACE_TIMEOUT_CHECK_INTERVAL_SECONDS: 'soon',
      TRACE_BACKEND: 'kafka',
    });

    expect(config.exportMaxWorkers).toBe(10);
    expect(config.exportMaxQueueSize).toBe(1000);
    expect(config.timeoutCheckIntervalMs).toBe(1000);
    expect(config.backend).toBe('none');
  });

  it('should treat anything but "false" as enabled', () => {
    expect(loadTracingConfig({ TRACE_ENABLED: '0' }).enabled).toBe(true);
    expect(loadTracingConfig({ TRACE_ENABLED: 'false' }).enabled).toBe(false);
  });
});
