/**
 * In-Memory Record Store
 *
 * Fast, ephemeral storage for development and testing.
 * Values are deep-copied on the way in and out so callers never share state with the store.
 */

import type { RecordStore } from './types.js';

export class MemoryRecordStore<T> implements RecordStore<T> {
  readonly backend = 'memory' as const;
  private records: Map<string, T> = new Map();

  constructor(readonly namespace: string) {}

  async load(key: string): Promise<T | null> {
    const record = this.records.get(key);
    return record === undefined ? null : structuredClone(record);
  }

  async loadAll(): Promise<Map<string, T>> {
    return new Map(
      Array.from(this.records.entries()).map(([key, value]) => [key, structuredClone(value)])
    );
  }

  async save(key: string, value: T): Promise<void> {
    this.records.set(key, structuredClone(value));
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }

  /**
   * Number of stored records (test helper)
   */
  get size(): number {
    return this.records.size;
  }
}
