/**
 * Rule Engine
 *
 * Effectiveness tracking, improvement suggestions and parameter optimization
 * for validation rules, orchestrated by the ValidationManager.
 */

export * from './errors.js';
export { RuleEngineLogger, RuleEngineLogLevel } from './rule-engine-logger.js';
export * from './storage/index.js';
export * from './effectiveness/index.js';
export * from './improvements/index.js';
export * from './optimizer/index.js';
export * from './validation/index.js';
