/**
 * HTTP Trace Store
 *
 * Sends finished traces and direct writes to a tracking server as JSON.
 * Routes hang off one base endpoint:
 *
 *   POST   {endpoint}                                 persist a trace
 *   PATCH  {endpoint}/{traceId}/tags                  set a tag
 *   DELETE {endpoint}/{traceId}/tags/{key}            delete a tag
 *   POST   {endpoint}/{traceId}/assessments           create an assessment
 *   PATCH  {endpoint}/{traceId}/assessments/{id}      update an assessment
 *   DELETE {endpoint}/{traceId}/assessments/{id}      delete an assessment
 *
 * Response statuses are mapped onto retryable and non-retryable
 * HttpExportErrors; the retry policy decides what happens next.
 *
 * @module store/httpTraceStore
 */

import type {
  Assessment,
  AssessmentSourceType,
  AssessmentUpdate,
  Feedback,
  TraceSnapshot,
} from '../types/index.js';
import { ExportError, HttpExportError, ResourceNotFoundError } from '../tracing/errors.js';
import type { TraceStore } from './traceStore.js';

// ─── Transport ───────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  body?: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * HTTP transport abstraction for testability.
 * In production, this wraps fetch. In tests, it can be replaced.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/** Default HTTP transport using the global fetch API with a per-request timeout. */
export function createDefaultHttpTransport(): HttpTransport {
  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), request.timeoutMs);
      try {
        const response = await fetch(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
          signal: controller.signal,
        });
        return {
          status: response.status,
          statusText: response.statusText,
          body: await response.text(),
        };
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

// ─── Configuration ───────────────────────────────────────────────────────────

export interface HttpTraceStoreConfig {
  /** Base URL, e.g. http://localhost:5000/api/traces. */
  endpoint: string;
  /** Sent as a bearer token when set. */
  token?: string;
  /** Per-request timeout (default: 30000). */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

// ─── Response Parsing ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSourceType(value: unknown): value is AssessmentSourceType {
  return value === 'human' || value === 'llm_judge' || value === 'code';
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
}

/** Validate an assessment returned by the server. */
export function parseAssessmentResponse(body: string): Assessment {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ExportError('Tracking server returned malformed JSON', {
      retryable: false,
      cause: error,
    });
  }
  const data = isRecord(parsed) && isRecord(parsed['assessment']) ? parsed['assessment'] : parsed;
  if (!isRecord(data)) {
    throw new ExportError('Tracking server response has no assessment', { retryable: false });
  }

  const rawSource = data['source'];
  const source: Record<string, unknown> = isRecord(rawSource) ? rawSource : {};
  const { sourceType, sourceId } = source;
  const { traceId, name, assessmentId, createTimeMs, lastUpdateTimeMs } = data;
  if (
    typeof traceId !== 'string' ||
    typeof name !== 'string' ||
    typeof assessmentId !== 'string' ||
    typeof createTimeMs !== 'number' ||
    typeof lastUpdateTimeMs !== 'number' ||
    !isSourceType(sourceType) ||
    typeof sourceId !== 'string'
  ) {
    throw new ExportError('Tracking server returned an invalid assessment', { retryable: false });
  }

  const assessment: Assessment = {
    assessmentId,
    traceId,
    name,
    source: { sourceType, sourceId },
    createTimeMs,
    lastUpdateTimeMs,
  };
  const spanId = optionalString(data['spanId']);
  if (spanId !== undefined) assessment.spanId = spanId;
  const rationale = optionalString(data['rationale']);
  if (rationale !== undefined) assessment.rationale = rationale;
  const metadata = stringRecord(data['metadata']);
  if (metadata !== undefined) assessment.metadata = metadata;

  const expectation = data['expectation'];
  if (isRecord(expectation) && 'value' in expectation) {
    assessment.expectation = { value: expectation['value'] };
  }
  const feedback = data['feedback'];
  if (isRecord(feedback)) {
    const parsedFeedback: Feedback = {};
    if ('value' in feedback) parsedFeedback.value = feedback['value'];
    const error = feedback['error'];
    if (isRecord(error) && typeof error['errorCode'] === 'string') {
      const errorMessage = optionalString(error['errorMessage']);
      parsedFeedback.error = {
        errorCode: error['errorCode'],
        ...(errorMessage !== undefined && { errorMessage }),
      };
    }
    assessment.feedback = parsedFeedback;
  }
  return assessment;
}

// ─── Store ───────────────────────────────────────────────────────────────────

export function createHttpTraceStore(
  config: HttpTraceStoreConfig,
  transport?: HttpTransport,
): TraceStore {
  const httpTransport = transport ?? createDefaultHttpTransport();
  const base = config.endpoint.replace(/\/+$/, '');
  const timeoutMs = config.timeoutMs ?? 30000;
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    ...config.headers,
    ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
  };

  function encodeBody(payload: unknown): string {
    try {
      return JSON.stringify(payload);
    } catch (error) {
      // A payload that cannot be encoded now never will be
      throw new ExportError('Failed to serialize request body', { retryable: false, cause: error });
    }
  }

  async function request(
    method: HttpMethod,
    path: string,
    payload?: unknown,
    notFound?: string,
  ): Promise<HttpResponse> {
    const url = `${base}${path}`;
    const response = await httpTransport.send({
      method,
      url,
      body: payload === undefined ? undefined : encodeBody(payload),
      headers,
      timeoutMs,
    });
    if (response.status === 404 && notFound !== undefined) {
      throw new ResourceNotFoundError(notFound);
    }
    if (response.status >= 400) {
      throw new HttpExportError(
        `${method} ${url} failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    return response;
  }

  const tracePath = (traceId: string): string => `/${encodeURIComponent(traceId)}`;

  return {
    async persistTrace(snapshot: TraceSnapshot): Promise<void> {
      await request('POST', '', snapshot);
    },

    async setTraceTag(traceId: string, key: string, value: string): Promise<void> {
      await request('PATCH', `${tracePath(traceId)}/tags`, { key, value }, `Trace ${traceId} not found`);
    },

    async deleteTraceTag(traceId: string, key: string): Promise<void> {
      await request(
        'DELETE',
        `${tracePath(traceId)}/tags/${encodeURIComponent(key)}`,
        undefined,
        `Tag '${key}' not found on trace ${traceId}`,
      );
    },

    async createAssessment(assessment: Assessment): Promise<Assessment> {
      const response = await request(
        'POST',
        `${tracePath(assessment.traceId)}/assessments`,
        { assessment },
        `Trace ${assessment.traceId} not found`,
      );
      return parseAssessmentResponse(response.body);
    },

    async updateAssessment(update: AssessmentUpdate): Promise<Assessment> {
      const { traceId, assessmentId, ...fields } = update;
      const response = await request(
        'PATCH',
        `${tracePath(traceId)}/assessments/${encodeURIComponent(assessmentId)}`,
        fields,
        `Assessment ${assessmentId} not found on trace ${traceId}`,
      );
      return parseAssessmentResponse(response.body);
    },

    async deleteAssessment(traceId: string, assessmentId: string): Promise<void> {
      await request(
        'DELETE',
        `${tracePath(traceId)}/assessments/${encodeURIComponent(assessmentId)}`,
        undefined,
        `Assessment ${assessmentId} not found on trace ${traceId}`,
      );
    },

    async close(): Promise<void> {},
  };
}
