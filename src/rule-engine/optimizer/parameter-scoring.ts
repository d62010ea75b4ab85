/**
 * Parameter Scoring
 *
 * Deterministic heuristic that projects how a rule's recorded statistics would
 * have looked with a different parameter value. No historical boards are
 * replayed: the projection works purely on the effectiveness counters.
 *
 * relaxation r in [-1, 1] is the relative move of the value in the direction
 * that loosens the rule (negative = tightening). From it:
 *   failure rate      f' = f * (1 - r)
 *   severity (0..1)   s' = s * (1 - r/2)
 *   feedback score    q' = q + r * (n - q) * f
 * where f is the recorded failure rate, s the mean failure severity over the
 * maximum weight, q / n the positive / negative feedback ratios (0.5 each
 * without feedback). Relaxing a rule whose failures users endorsed (q > n)
 * lowers q'; relaxing one users complained about raises it.
 */

import { MAX_SEVERITY_WEIGHT } from '../../shared/types/rule.js';
import type { RuleEffectiveness } from '../effectiveness/types.js';
import type { ParameterRangeRule } from './parameter-ranges.js';
import { OptimizationStrategy, type ParameterMetrics } from './types.js';

/**
 * Recorded statistics normalized to 0..1
 */
export interface ScoringContext {
  hasValidations: boolean;
  failureRate: number;
  severity: number;
  positiveRatio: number;
  negativeRatio: number;
}

/**
 * Statistics projected for one candidate value
 */
export interface ProjectedOutcome {
  failureRate: number;
  passRate: number;
  severity: number;
  feedbackScore: number;
}

// TUNABLE
export const SCORING_WEIGHTS = Object.freeze({
  /** How strongly severity falls as the rule is relaxed */
  severityRelief: 0.5,
  /** Penalty for relaxing away failures users endorsed (MINIMIZE_FAILURES) */
  endorsedFailurePenalty: 0.5,
});

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function buildScoringContext(effectiveness: RuleEffectiveness): ScoringContext {
  const hasValidations = effectiveness.totalValidations > 0;
  const hasFeedback = effectiveness.feedbackCount > 0;

  return {
    hasValidations,
    failureRate: hasValidations ? effectiveness.failedValidations / effectiveness.totalValidations : 0,
    severity: clamp01(effectiveness.averageSeverity / MAX_SEVERITY_WEIGHT),
    positiveRatio: hasFeedback ? effectiveness.positiveFeedback / effectiveness.feedbackCount : 0.5,
    negativeRatio: hasFeedback ? effectiveness.negativeFeedback / effectiveness.feedbackCount : 0.5,
  };
}

/**
 * Relative loosening of the rule when moving from currentValue to candidate
 */
export function relaxation(rangeRule: ParameterRangeRule, currentValue: number, candidate: number): number {
  if (currentValue === 0 || !Number.isFinite(candidate)) return 0;
  const relativeChange = (candidate - currentValue) / Math.abs(currentValue);
  return Math.max(-1, Math.min(1, rangeRule.relaxDirection * relativeChange));
}

export function projectOutcome(context: ScoringContext, r: number): ProjectedOutcome {
  const failureRate = clamp01(context.failureRate * (1 - r));

  return {
    failureRate,
    passRate: context.hasValidations ? 1 - failureRate : 0,
    severity: clamp01(context.severity * (1 - SCORING_WEIGHTS.severityRelief * r)),
    feedbackScore: clamp01(
      context.positiveRatio + r * (context.negativeRatio - context.positiveRatio) * context.failureRate
    ),
  };
}

/**
 * 0..1 score of a projected outcome under a strategy
 */
export function scoreOutcome(
  strategy: OptimizationStrategy,
  context: ScoringContext,
  projected: ProjectedOutcome,
  r: number
): number {
  switch (strategy) {
    case OptimizationStrategy.MINIMIZE_FAILURES:
      return clamp01(
        1 -
          projected.failureRate -
          SCORING_WEIGHTS.endorsedFailurePenalty * context.positiveRatio * context.failureRate * Math.max(0, r)
      );
    case OptimizationStrategy.MAXIMIZE_PASS_RATE:
      return projected.passRate;
    case OptimizationStrategy.BALANCE_SEVERITY:
      return clamp01(1 - projected.failureRate * projected.severity);
    case OptimizationStrategy.OPTIMIZE_FEEDBACK:
      return projected.feedbackScore;
  }
}

/**
 * Transparency metrics for a projected outcome
 */
export function toParameterMetrics(projected: ProjectedOutcome): ParameterMetrics {
  return {
    failure_rate: projected.failureRate,
    pass_rate: projected.passRate,
    average_severity: projected.severity * MAX_SEVERITY_WEIGHT,
    feedback_score: projected.feedbackScore,
  };
}
