/**
 * Tracing Configuration
 *
 * Environment-driven settings for the tracing service. Values that are
 * missing or fail to parse fall back to their defaults. Durations are read
 * in seconds and carried in milliseconds.
 *
 * @module tracing/tracingConfig
 */

export type TraceBackend = 'http' | 'postgres' | 'memory' | 'none';

export interface TracingConfig {
  enabled: boolean;
  /** Unset disables the timeout supervisor. */
  timeoutMs?: number;
  timeoutCheckIntervalMs: number;
  timeoutIdleGraceMs: number;
  exportMaxWorkers: number;
  exportMaxQueueSize: number;
  exportRetryTimeoutMs: number;
  shutdownFlushTimeoutMs: number;
  dropWarningIntervalMs: number;
  backend: TraceBackend;
  backendEndpoint: string;
  backendToken?: string;
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: true,
  timeoutCheckIntervalMs: 1000,
  timeoutIdleGraceMs: 30_000,
  exportMaxWorkers: 10,
  exportMaxQueueSize: 1000,
  exportRetryTimeoutMs: 500_000,
  shutdownFlushTimeoutMs: 10_000,
  dropWarningIntervalMs: 60_000,
  backend: 'none',
  backendEndpoint: 'http://localhost:5000/api/traces',
};

function isTraceBackend(value: string): value is TraceBackend {
  return value === 'http' || value === 'postgres' || value === 'memory' || value === 'none';
}

/** Positive seconds as milliseconds, or undefined when unset or invalid. */
function secondsToMs(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const seconds = parseFloat(raw);
  return Number.isFinite(seconds) && seconds > 0 ? Math.round(seconds * 1000) : undefined;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadTracingConfig(env: NodeJS.ProcessEnv = process.env): TracingConfig {
  const defaults = DEFAULT_TRACING_CONFIG;
  const backend = (env['TRACE_BACKEND'] ?? defaults.backend).toLowerCase();

  const config: TracingConfig = {
    enabled: (env['TRACE_ENABLED'] ?? 'true').toLowerCase() !== 'false',
    timeoutCheckIntervalMs:
      secondsToMs(env['TRACE_TIMEOUT_CHECK_INTERVAL_SECONDS']) ?? defaults.timeoutCheckIntervalMs,
    timeoutIdleGraceMs:
      secondsToMs(env['TRACE_TIMEOUT_IDLE_GRACE_SECONDS']) ?? defaults.timeoutIdleGraceMs,
    exportMaxWorkers: positiveInt(env['TRACE_EXPORT_MAX_WORKERS'], defaults.exportMaxWorkers),
    exportMaxQueueSize: positiveInt(env['TRACE_EXPORT_MAX_QUEUE_SIZE'], defaults.exportMaxQueueSize),
    exportRetryTimeoutMs:
      secondsToMs(env['TRACE_EXPORT_RETRY_TIMEOUT_SECONDS']) ?? defaults.exportRetryTimeoutMs,
    shutdownFlushTimeoutMs:
      secondsToMs(env['TRACE_SHUTDOWN_FLUSH_TIMEOUT_SECONDS']) ?? defaults.shutdownFlushTimeoutMs,
    dropWarningIntervalMs: defaults.dropWarningIntervalMs,
    backend: isTraceBackend(backend) ? backend : defaults.backend,
    backendEndpoint: env['TRACE_BACKEND_ENDPOINT'] ?? defaults.backendEndpoint,
  };

  const timeoutMs = secondsToMs(env['TRACE_TIMEOUT_SECONDS']);
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;
  const token = env['TRACE_BACKEND_TOKEN'];
  if (token) config.backendToken = token;

  return config;
}
