/**
 * Durable Storage Types
 *
 * Flat key-value documents, one per rule id, grouped by namespace.
 */

import type { StorageBackend } from '../../shared/config.js';

/**
 * Record store backend interface
 */
export interface RecordStore<T> {
  readonly backend: StorageBackend;
  readonly namespace: string;

  /** Load one record, null when absent */
  load(key: string): Promise<T | null>;

  /** Load every record in the namespace */
  loadAll(): Promise<Map<string, T>>;

  /** Replace the record stored under key */
  save(key: string, value: T): Promise<void>;

  delete(key: string): Promise<void>;

  /** Remove every record in the namespace */
  clear(): Promise<void>;
}
