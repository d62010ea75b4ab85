/**
 * Effectiveness Tracking Types
 */

import type { RuleCategory, ValidationRule } from '../../shared/types/rule.js';

/**
 * Classification of a rule's real-world usefulness
 */
export enum EffectivenessStatus {
  UNKNOWN = 'unknown',
  EFFECTIVE = 'effective',
  INEFFECTIVE = 'ineffective',
  NEEDS_IMPROVEMENT = 'needs_improvement',
}

/**
 * Identity fields the tracker needs to create a record lazily
 */
export type TrackedRule = Pick<ValidationRule, 'id' | 'name' | 'category' | 'severity'>;

/**
 * Raw counters a status is derived from
 */
export interface EffectivenessCounters {
  totalValidations: number;
  passedValidations: number;
  failedValidations: number;
  feedbackCount: number;
  positiveFeedback: number;
  negativeFeedback: number;
}

/**
 * Per-rule effectiveness record
 *
 * Invariants:
 * - passedValidations + failedValidations === totalValidations
 * - positiveFeedback + negativeFeedback === feedbackCount
 * - status === classifyEffectiveness(counters)
 */
export interface RuleEffectiveness extends EffectivenessCounters {
  ruleId: string;
  ruleName: string;
  category: RuleCategory;
  /** Mean severity weight over failed validations (0 while there are none) */
  averageSeverity: number;
  status: EffectivenessStatus;
  lastUpdated: Date;
}

/**
 * Aggregate counts across all tracked rules
 */
export interface EffectivenessSummary {
  totalRules: number;
  effectiveRules: number;
  ineffectiveRules: number;
  rulesNeedingImprovement: number;
  /** effectiveRules / totalRules (0 when nothing is tracked) */
  effectivenessRate: number;
}

/**
 * Snapshot pushed to the metrics sink after every tracked validation
 */
export interface RuleMetricsSnapshot {
  ruleId: string;
  totalValidations: number;
  passedValidations: number;
  failedValidations: number;
  averageSeverity: number;
  status: EffectivenessStatus;
  timestamp: Date;
}

/**
 * Receiver of rule metrics (community metrics, dashboards).
 * Failures are logged by the tracker and never fail a validation.
 */
export interface MetricsSink {
  reportRuleEffectiveness(snapshot: RuleMetricsSnapshot): void | Promise<void>;
}
