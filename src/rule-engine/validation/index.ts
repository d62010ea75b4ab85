/**
 * Rule registry and validation orchestration
 */

export type {
  RuleValidationResult,
  ValidationSummary,
  RuleTestCaseResult,
  RuleTestReport,
} from './types.js';

export { RuleRegistry } from './rule-registry.js';

export {
  ValidationManager,
  createValidationManager,
  type ValidationManagerOptions,
  type CreateValidationManagerOptions,
} from './validation-manager.js';
