/**
 * Rule Improvement Types
 */

import type { RuleCategory, ValidationRule } from '../../shared/types/rule.js';
import type { RuleEffectiveness } from '../effectiveness/types.js';

export enum ImprovementPriority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

/**
 * Generated suggestion for an underperforming rule (never persisted)
 */
export interface RuleImprovement {
  ruleId: string;
  title: string;
  description: string;
  priority: ImprovementPriority;
  category: RuleCategory;
  /** Remediation steps, most important first */
  suggestions: string[];
  /** Numeric evidence that triggered the improvement (snake_case keys) */
  metrics: Record<string, number>;
  createdAt: Date;
}

export interface ImprovementThresholds {
  /** failed / total above this is a high failure rate */
  highFailureRate: number;
  /** averageSeverity at or above this (ERROR = 3) is high severity */
  highSeverity: number;
  /** negative / feedback above this is high negative feedback */
  highNegativeFeedbackRatio: number;
  /** Validations required before pass/fail balance or engagement is judged */
  minValidations: number;
  /** |passed - failed| / total at or below this is inconsistent */
  inconsistencyBand: number;
  /** Feedback entries expected once minValidations is reached */
  minFeedback: number;
  /** Descriptions shorter than this are minimal */
  minDescriptionLength: number;
}

/**
 * Rule fields the rule-specific patterns read
 */
export type ImprovableRule = Pick<ValidationRule, 'id' | 'description' | 'parameters' | 'dependencies'>;

/**
 * Input every pattern sees
 */
export interface ImprovementContext {
  effectiveness: RuleEffectiveness;
  rule: ImprovableRule | null;
  /** Registered rule ids; dependency checks are skipped when absent */
  knownRuleIds: ReadonlySet<string> | null;
  thresholds: ImprovementThresholds;
}

/**
 * One triggered finding; the generator turns it into a RuleImprovement
 */
export interface ImprovementFinding {
  description: string;
  suggestions: string[];
  metrics: Record<string, number>;
}

/**
 * Independent check with a fixed title and priority
 */
export interface ImprovementPattern {
  id: string;
  title: string;
  priority: ImprovementPriority;
  /** Runs only when a rule definition is supplied */
  requiresRule: boolean;
  detect(context: ImprovementContext): ImprovementFinding[];
}

export interface GenerateImprovementsOptions {
  knownRuleIds?: Iterable<string>;
}
