import { describe, it, expect } from 'vitest';
import { ContextHandle, createContextManager } from './context.js';

const ref = (spanId: string) => ({ traceId: 't1', spanId, recording: true });

describe('ContextHandle', () => {
  it('tracks the innermost open span', () => {
    const handle = new ContextHandle();
    expect(handle.top()).toBeUndefined();
    handle.push(ref('a'));
    handle.push(ref('b'));
    expect(handle.top()?.spanId).toBe('b');
    expect(handle.depth).toBe(2);
  });

  it('removes spans ended out of order without disturbing the rest', () => {
    const handle = new ContextHandle();
    handle.push(ref('a'));
    handle.push(ref('b'));
    handle.push(ref('c'));

    expect(handle.remove('b')?.spanId).toBe('b');
    expect(handle.entries().map((r) => r.spanId)).toEqual(['a', 'c']);
    expect(handle.remove('missing')).toBeUndefined();
  });

  it('forks a copy that evolves independently', () => {
    const handle = new ContextHandle();
    handle.push(ref('a'));
    const fork = handle.fork();
    fork.push(ref('b'));

    expect(handle.entries().map((r) => r.spanId)).toEqual(['a']);
    expect(fork.entries().map((r) => r.spanId)).toEqual(['a', 'b']);
    expect(fork.id).not.toBe(handle.id);
  });

  it('drops every ref of one trace', () => {
    const handle = new ContextHandle();
    handle.push(ref('a'));
    handle.push({ traceId: 't2', spanId: 'x', recording: true });
    handle.push(ref('b'));

    expect(handle.removeTrace('t1')).toBe(2);
    expect(handle.entries().map((r) => r.spanId)).toEqual(['x']);
  });
});

describe('ContextManager', () => {
  it('uses the default handle outside any bound context', () => {
    const contexts = createContextManager();
    expect(contexts.current()).toBe(contexts.defaultContext());
  });

  it('binds a handle for synchronous and asynchronous work', async () => {
    const contexts = createContextManager();
    const handle = new ContextHandle();

    const seen = await contexts.runWithContext(handle, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return contexts.current();
    });

    expect(seen).toBe(handle);
    expect(contexts.current()).toBe(contexts.defaultContext());
  });

  it('starts every new context with an empty stack', () => {
    const contexts = createContextManager();
    contexts.defaultContext().push(ref('outer'));

    const depth = contexts.runInNewContext((handle) => {
      expect(contexts.current()).toBe(handle);
      return handle.depth;
    });

    expect(depth).toBe(0);
  });
});
