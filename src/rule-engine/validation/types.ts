/**
 * Validation Run Types
 */

import type { RuleCategory, RuleSeverity } from '../../shared/types/rule.js';
import type { ValidationExecutionError } from '../errors.js';

/**
 * Outcome of one rule in a validation run
 */
export interface RuleValidationResult {
  ruleId: string;
  ruleName: string;
  category: RuleCategory;
  passed: boolean;
  /** Severity of a failure (the rule's own severity unless the check overrode it) */
  severity: RuleSeverity;
  message: string;
  /** Set when the check threw; the result is then a failed ERROR result */
  error?: ValidationExecutionError;
}

/**
 * Aggregate of a validation run
 *
 * passed is false only when a failure of ERROR severity or above occurred.
 */
export interface ValidationSummary {
  passed: boolean;
  hasErrors: boolean;
  hasWarnings: boolean;
  /** Failures at ERROR or CRITICAL */
  errorCount: number;
  /** Failures at WARNING */
  warningCount: number;
  results: RuleValidationResult[];
}

export interface RuleTestCaseResult {
  name: string;
  description?: string;
  expectedResult: boolean;
  /** null when the check threw */
  actualResult: boolean | null;
  passed: boolean;
  error?: string;
}

/**
 * Self-test results keyed by category, then rule name
 */
export type RuleTestReport = Partial<Record<RuleCategory, Record<string, RuleTestCaseResult[]>>>;
