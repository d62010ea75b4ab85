/**
 * Disabled Record Store
 *
 * Accepts every write and remembers nothing. Used when persistence is switched off.
 */

import type { RecordStore } from './types.js';

export class DisabledRecordStore<T> implements RecordStore<T> {
  readonly backend = 'disabled' as const;

  constructor(readonly namespace: string) {}

  async load(_key: string): Promise<T | null> {
    return null;
  }

  async loadAll(): Promise<Map<string, T>> {
    return new Map();
  }

  async save(_key: string, _value: T): Promise<void> {
    // no-op
  }

  async delete(_key: string): Promise<void> {
    // no-op
  }

  async clear(): Promise<void> {
    // no-op
  }
}
