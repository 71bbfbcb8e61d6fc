import { describe, it, expect } from 'vitest';
import { ContextStore } from './ContextStore';

describe('ContextStore', () => {
  it('should start from the initial context', () => {
    const store = new ContextStore({ student: 'sam' });

    expect(store.get('student')).toBe('sam');
    expect(store.size).toBe(1);
  });

  it('should keep the last written value per key', () => {
    const store = new ContextStore();
    store.apply({ response_haiku: 'false' });
    store.apply({ response_haiku: 'true' });

    expect(store.get('response_haiku')).toBe('true');
  });

  it('should keep untouched keys across updates', () => {
    const store = new ContextStore({ a: 1 });
    store.apply({ b: 2 });

    expect(store.snapshot()).toEqual({ a: 1, b: 2 });
  });

  it('should preserve insertion order', () => {
    const store = new ContextStore({ z: 1, a: 2 });
    store.apply({ m: 3, z: 4 });

    expect(Object.keys(store.snapshot())).toEqual(['z', 'a', 'm']);
  });

  it('should report written keys and ignore undefined updates', () => {
    const store = new ContextStore();

    expect(store.apply({ x: 1, y: 2 })).toEqual(['x', 'y']);
    expect(store.apply(undefined)).toEqual([]);
  });

  it('should hand out snapshots that do not write back', () => {
    const store = new ContextStore({ a: 1 });
    const snapshot = store.snapshot();
    snapshot.a = 99;

    expect(store.get('a')).toBe(1);
  });

  it('should store a key whose value is undefined', () => {
    const store = new ContextStore();
    store.apply({ maybe: undefined });

    expect(store.has('maybe')).toBe(true);
    expect(store.has('other')).toBe(false);
  });
});
