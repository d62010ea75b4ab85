/**
 * Record Store Factory
 *
 * Creates the appropriate store based on configuration.
 */

import type { z } from 'zod';
import {
  RULE_ENGINE_BACKEND,
  RULE_ENGINE_DATA_DIR,
  type StorageBackend,
} from '../../shared/config.js';
import type { RecordStore } from './types.js';
import { MemoryRecordStore } from './memory-store.js';
import { FileRecordStore } from './file-store.js';
import { DisabledRecordStore } from './disabled-store.js';

export interface RecordStoreOptions {
  /** Overrides RULE_ENGINE_BACKEND */
  backend?: StorageBackend;
  /** Overrides RULE_ENGINE_DATA_DIR (file backend only) */
  dataDir?: string;
}

/**
 * Create the configured record store for a namespace
 */
export function createRecordStore<T>(
  namespace: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RecordStoreOptions = {}
): RecordStore<T> {
  const backend = options.backend ?? RULE_ENGINE_BACKEND;

  switch (backend) {
    case 'disabled':
      return new DisabledRecordStore<T>(namespace);
    case 'memory':
      return new MemoryRecordStore<T>(namespace);
    case 'file':
      return new FileRecordStore<T>(options.dataDir ?? RULE_ENGINE_DATA_DIR, namespace, schema);
  }
}
