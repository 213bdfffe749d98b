/**
 * Span Helpers
 *
 * Wrap a function so every call runs inside its own span. The call's
 * arguments become the span inputs and the return value its outputs;
 * a throw marks the span as failed and propagates unchanged.
 *
 * @module tracing/spanHelpers
 */

import type { SpanAttributes } from '../types/index.js';
import type { Tracer } from './tracer.js';

export interface TracedOptions {
  /** Span name. Defaults to the function's name, or 'anonymous'. */
  name?: string;
  attributes?: SpanAttributes;
  /** Map call arguments to span inputs. Defaults to the argument array. */
  captureInputs?: (args: unknown[]) => unknown;
}

function spanNameFor(fn: { name: string }, options: TracedOptions): string {
  return options.name ?? (fn.name !== '' ? fn.name : 'anonymous');
}

function inputsFor(args: unknown[], options: TracedOptions): unknown {
  return options.captureInputs ? options.captureInputs(args) : args;
}

export function traced<A extends unknown[], R>(
  tracer: Tracer,
  fn: (...args: A) => R,
  options: TracedOptions = {},
): (...args: A) => R {
  const name = spanNameFor(fn, options);
  return (...args: A): R =>
    tracer.withSpan(name, () => fn(...args), {
      attributes: options.attributes,
      inputs: inputsFor(args, options),
    });
}

export function tracedAsync<A extends unknown[], R>(
  tracer: Tracer,
  fn: (...args: A) => Promise<R>,
  options: TracedOptions = {},
): (...args: A) => Promise<R> {
  const name = spanNameFor(fn, options);
  return (...args: A): Promise<R> =>
    tracer.withSpanAsync(name, () => fn(...args), {
      attributes: options.attributes,
      inputs: inputsFor(args, options),
    });
}
