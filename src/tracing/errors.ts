/**
 * Tracing Errors
 *
 * Error kinds raised by the span model and the export path. Only
 * SpanStateError and AssessmentValidationError ever reach application
 * code; the rest are handled inside the export workers.
 *
 * @module tracing/errors
 */

export class SpanStateError extends Error {
  public readonly code = 'SPAN_STATE_ERROR';

  constructor(
    message: string,
    public readonly spanId: string,
  ) {
    super(message);
    this.name = 'SpanStateError';
  }
}

/** Recorded on spans the timeout supervisor closes. Never thrown. */
export class TraceTimeoutError extends Error {
  public readonly code = 'TRACE_TIMEOUT';

  constructor(
    public readonly traceId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Trace ${traceId} exceeded the ${timeoutMs}ms timeout and was closed`);
    this.name = 'TraceTimeoutError';
  }
}

export interface ExportErrorOptions {
  retryable: boolean;
  cause?: unknown;
}

export class ExportError extends Error {
  public readonly code: string = 'EXPORT_FAILED';
  public readonly retryable: boolean;

  constructor(message: string, options: ExportErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'ExportError';
    this.retryable = options.retryable;
  }
}

export class HttpExportError extends ExportError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, { retryable: isRetryableStatus(status) });
    this.name = 'HttpExportError';
  }
}

export class AssessmentValidationError extends Error {
  public readonly code = 'INVALID_PARAMETER_VALUE';

  constructor(message: string) {
    super(message);
    this.name = 'AssessmentValidationError';
  }
}

/** A tag or assessment addressed by a direct store write does not exist. */
export class ResourceNotFoundError extends Error {
  public readonly code = 'RESOURCE_DOES_NOT_EXIST';

  constructor(message: string) {
    super(message);
    this.name = 'ResourceNotFoundError';
  }
}

/** Server errors, request timeouts and rate limiting are worth another attempt. */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Decide whether a failed export may be retried.
 * Errors that carry no classification (socket resets, DNS failures,
 * aborted fetches) are treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExportError) {
    return error.retryable;
  }
  return true;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
