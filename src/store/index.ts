/**
 * Trace Stores
 *
 * Backends for finished traces and direct writes, and the factory that
 * picks one from configuration.
 *
 * @module store
 */

import type { TracingConfig } from '../tracing/tracingConfig.js';
import { createPool } from '../utils/db.js';
import { createHttpTraceStore } from './httpTraceStore.js';
import type { HttpTransport } from './httpTraceStore.js';
import { createPostgresTraceStore } from './postgresTraceStore.js';
import { createInMemoryTraceStore, createNoopTraceStore } from './traceStore.js';
import type { TraceStore } from './traceStore.js';

export {
  type TraceStore,
  type InMemoryTraceStore,
  type InMemoryTraceStoreOptions,
  createInMemoryTraceStore,
  createNoopTraceStore,
} from './traceStore.js';

export {
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type HttpTraceStoreConfig,
  createDefaultHttpTransport,
  createHttpTraceStore,
  parseAssessmentResponse,
} from './httpTraceStore.js';

export {
  type PostgresTraceStoreOptions,
  classifyDatabaseError,
  createPostgresTraceStore,
  rowToAssessment,
} from './postgresTraceStore.js';

export interface TraceStoreDependencies {
  transport?: HttpTransport;
}

/** Build the store named by `config.backend`. */
export function createTraceStore(
  config: Pick<TracingConfig, 'backend' | 'backendEndpoint' | 'backendToken'>,
  deps: TraceStoreDependencies = {},
): TraceStore {
  switch (config.backend) {
    case 'http':
      return createHttpTraceStore(
        { endpoint: config.backendEndpoint, token: config.backendToken },
        deps.transport,
      );
    case 'postgres': {
      const pool = createPool();
      return createPostgresTraceStore(pool, { onClose: () => pool.end() });
    }
    case 'memory':
      return createInMemoryTraceStore();
    case 'none':
      return createNoopTraceStore();
  }
}
