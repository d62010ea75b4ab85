/**
 * File Record Store
 *
 * One JSON document per key inside `<dataDir>/<namespace>/`.
 * Writes go to a temp file first and are renamed into place, so a reader
 * never sees a half-written document. Documents are validated with a zod
 * schema on read; anything that fails validation is skipped and logged.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import type { RecordStore } from './types.js';
import { RuleEngineLogger } from '../rule-engine-logger.js';

const FILE_SUFFIX = '.json';

export class FileRecordStore<T> implements RecordStore<T> {
  readonly backend = 'file' as const;
  private readonly directory: string;
  private tempCounter = 0;

  constructor(
    dataDir: string,
    readonly namespace: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    this.directory = path.join(dataDir, namespace);
  }

  async load(key: string): Promise<T | null> {
    const filePath = this.pathFor(key);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    return this.parse(filePath, content);
  }

  async loadAll(): Promise<Map<string, T>> {
    const records = new Map<string, T>();

    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return records;
      throw error;
    }

    for (const entry of entries.sort()) {
      if (!entry.endsWith(FILE_SUFFIX)) continue;

      const key = decodeURIComponent(entry.slice(0, -FILE_SUFFIX.length));
      const record = await this.load(key);
      if (record !== null) {
        records.set(key, record);
      }
    }

    RuleEngineLogger.storeLoaded(this.namespace, records.size, this.backend);
    return records;
  }

  async save(key: string, value: T): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true });

    const filePath = this.pathFor(key);
    this.tempCounter++;
    const tempPath = `${filePath}.${process.pid}.${this.tempCounter}.tmp`;

    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf-8');
    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  async clear(): Promise<void> {
    await fs.rm(this.directory, { recursive: true, force: true });
    RuleEngineLogger.storeCleared(this.namespace, this.backend);
  }

  /**
   * Keys are URI-encoded so any rule id maps to a safe file name
   */
  private pathFor(key: string): string {
    return path.join(this.directory, encodeURIComponent(key) + FILE_SUFFIX);
  }

  private parse(filePath: string, content: string): T | null {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      RuleEngineLogger.error(`Unreadable record skipped: ${filePath}`, error);
      return null;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      RuleEngineLogger.error(`Invalid record skipped: ${filePath}`, parsed.error);
      return null;
    }
    return parsed.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
