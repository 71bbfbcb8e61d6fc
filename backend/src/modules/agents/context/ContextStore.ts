/**
 * Context Store
 *
 * Per-session mapping of context keys to opaque values. Keys keep their
 * insertion order and last-written value; nothing expires. Only handler and
 * executor updates reach `apply`, the loop never writes directly.
 *
 * @module modules/agents/context/ContextStore
 */

import type { ContextMap } from '@campus-desk/shared';

export class ContextStore {
  private readonly values = new Map<string, unknown>();

  constructor(initial: ContextMap = {}) {
    this.apply(initial);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  /**
   * Merge updates; later keys overwrite earlier ones.
   * @returns the keys that were written
   */
  apply(updates: ContextMap | undefined): string[] {
    if (!updates) return [];
    const keys = Object.keys(updates);
    for (const key of keys) {
      this.values.set(key, updates[key]);
    }
    return keys;
  }

  /**
   * Detached copy for executors and results.
   */
  snapshot(): ContextMap {
    return Object.fromEntries(this.values);
  }

  get size(): number {
    return this.values.size;
  }
}
