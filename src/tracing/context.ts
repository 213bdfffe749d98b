/**
 * Execution Context Handles
 *
 * A ContextHandle owns the stack of spans currently open in one unit of
 * asynchronous work. Handles are bound to async work with AsyncLocalStorage,
 * but a fresh unit of work never picks up its creator's stack on its own:
 * `runInNewContext` always starts empty, and sharing is explicit through
 * `runWithContext(handle, ...)` (same stack) or `handle.fork()` (own stack,
 * same parent linkage).
 *
 * Code running outside any bound handle uses the process-wide default
 * handle, the equivalent of a main thread.
 *
 * @module tracing/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

/** Reference to an open span as seen from one context's stack. */
export interface SpanRef {
  readonly traceId: string;
  readonly spanId: string;
  /** False for placeholder spans handed out while tracing could not record. */
  readonly recording: boolean;
}

export class ContextHandle {
  readonly id: string;
  private readonly stack: SpanRef[];

  constructor(initial: ReadonlyArray<SpanRef> = []) {
    this.id = randomBytes(6).toString('hex');
    this.stack = [...initial];
  }

  get depth(): number {
    return this.stack.length;
  }

  top(): SpanRef | undefined {
    return this.stack[this.stack.length - 1];
  }

  find(spanId: string): SpanRef | undefined {
    return this.stack.find((ref) => ref.spanId === spanId);
  }

  push(ref: SpanRef): void {
    this.stack.push(ref);
  }

  /**
   * Remove a span from the stack wherever it sits. Spans ended out of
   * order (interleaved async siblings) leave the rest of the stack intact.
   */
  remove(spanId: string): SpanRef | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const ref = this.stack[i];
      if (ref && ref.spanId === spanId) {
        this.stack.splice(i, 1);
        return ref;
      }
    }
    return undefined;
  }

  /** Drop every ref belonging to a trace. Returns how many were removed. */
  removeTrace(traceId: string): number {
    const before = this.stack.length;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i]?.traceId === traceId) this.stack.splice(i, 1);
    }
    return before - this.stack.length;
  }

  entries(): ReadonlyArray<SpanRef> {
    return [...this.stack];
  }

  /** New handle whose spans will parent under the same span as this one's. */
  fork(): ContextHandle {
    return new ContextHandle(this.stack);
  }
}

export interface ContextManager {
  /** The handle bound to the calling async context, or the default handle. */
  current(): ContextHandle;
  /** Run `fn` with `handle` bound. The handle's stack is shared, not copied. */
  runWithContext<T>(handle: ContextHandle, fn: () => T): T;
  /** Run `fn` as a new unit of work with an empty stack. */
  runInNewContext<T>(fn: (handle: ContextHandle) => T): T;
  /** The process-wide handle used outside any bound context. */
  defaultContext(): ContextHandle;
}

export function createContextManager(): ContextManager {
  const storage = new AsyncLocalStorage<ContextHandle>();
  const fallback = new ContextHandle();

  return {
    current(): ContextHandle {
      return storage.getStore() ?? fallback;
    },

    runWithContext<T>(handle: ContextHandle, fn: () => T): T {
      return storage.run(handle, fn);
    },

    runInNewContext<T>(fn: (handle: ContextHandle) => T): T {
      const handle = new ContextHandle();
      return storage.run(handle, () => fn(handle));
    },

    defaultContext(): ContextHandle {
      return fallback;
    },
  };
}
