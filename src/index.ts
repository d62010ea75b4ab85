/**
 * Public entry point
 */

export * from './shared/types/rule.js';
export { validateConfig, type StorageBackend } from './shared/config.js';
export * from './rule-engine/index.js';
