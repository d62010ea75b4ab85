/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 * Effectiveness and improvement thresholds are NOT here: they are tunable policy
 * objects next to the code that applies them.
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';

// Load .env file
loadDotenv();

/**
 * Storage Configuration
 */
export type StorageBackend = 'file' | 'memory' | 'disabled';

const STORAGE_BACKENDS: readonly StorageBackend[] = ['file', 'memory', 'disabled'];

function parseBackend(value: string | undefined): StorageBackend {
  const candidate = value || 'file';
  return STORAGE_BACKENDS.find((backend) => backend === candidate) ?? 'file';
}

export const RULE_ENGINE_BACKEND_RAW = process.env.RULE_ENGINE_BACKEND || 'file';
export const RULE_ENGINE_BACKEND: StorageBackend = parseBackend(process.env.RULE_ENGINE_BACKEND);
export const RULE_ENGINE_DATA_DIR =
  process.env.RULE_ENGINE_DATA_DIR || path.join(process.cwd(), '.rule-engine');

/**
 * Logging
 * Use /tmp explicitly so the log survives working-directory changes
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'rule-engine.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();

/**
 * Application Configuration
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const SUPPRESS_TEST_LOGS =
  process.env.SUPPRESS_TEST_LOGS === 'true' || NODE_ENV === 'test';

/**
 * Optimizer Configuration
 */
export const OPTIMIZER_MAX_GRID_STEPS = parseInt(process.env.OPTIMIZER_MAX_GRID_STEPS || '200', 10);
export const OPTIMIZATION_HISTORY_LIMIT = parseInt(process.env.OPTIMIZATION_HISTORY_LIMIT || '0', 10); // 0 = unbounded

/**
 * Validate environment-derived configuration
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!STORAGE_BACKENDS.some((backend) => backend === RULE_ENGINE_BACKEND_RAW)) {
    errors.push(
      `RULE_ENGINE_BACKEND must be 'file', 'memory', or 'disabled', got '${RULE_ENGINE_BACKEND_RAW}'`
    );
  }

  if (!['INFO', 'DEBUG'].includes(LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be 'INFO' or 'DEBUG', got '${LOG_LEVEL}'`);
  }

  if (!Number.isFinite(OPTIMIZER_MAX_GRID_STEPS) || OPTIMIZER_MAX_GRID_STEPS < 1) {
    errors.push(`OPTIMIZER_MAX_GRID_STEPS must be >= 1, got ${OPTIMIZER_MAX_GRID_STEPS}`);
  }

  if (!Number.isFinite(OPTIMIZATION_HISTORY_LIMIT) || OPTIMIZATION_HISTORY_LIMIT < 0) {
    errors.push(`OPTIMIZATION_HISTORY_LIMIT must be >= 0, got ${OPTIMIZATION_HISTORY_LIMIT}`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
