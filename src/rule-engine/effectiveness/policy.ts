/**
 * Effectiveness Policy
 *
 * Status is a pure function of the current counters. It is recomputed from
 * scratch after every mutation and never patched incrementally.
 *
 * UNKNOWN until both sample sizes are reached, then:
 * 1. INEFFECTIVE       negative feedback ratio or failure rate too high
 * 2. NEEDS_IMPROVEMENT pass/fail counts roughly balanced (rule fires unpredictably)
 * 3. EFFECTIVE         positive feedback ratio high enough
 * 4. NEEDS_IMPROVEMENT mixed feedback
 */

import { EffectivenessStatus, type EffectivenessCounters } from './types.js';

export interface EffectivenessPolicy {
  /** Validations required before judging */
  minValidations: number;
  /** Feedback entries required before judging */
  minFeedback: number;
  /** positive / feedback at or above this is EFFECTIVE */
  effectiveFeedbackRatio: number;
  /** negative / feedback at or above this is INEFFECTIVE */
  ineffectiveNegativeRatio: number;
  /** failed / total at or above this is INEFFECTIVE */
  ineffectiveFailureRate: number;
  /** |passed - failed| / total at or below this (both non-zero) is inconsistent */
  inconsistencyBand: number;
}

// TUNABLE
export const DEFAULT_EFFECTIVENESS_POLICY: Readonly<EffectivenessPolicy> = Object.freeze({
  minValidations: 10,
  minFeedback: 5,
  effectiveFeedbackRatio: 0.7,
  ineffectiveNegativeRatio: 0.55,
  ineffectiveFailureRate: 0.6,
  inconsistencyBand: 0.2,
});

export function resolvePolicy(overrides: Partial<EffectivenessPolicy> = {}): EffectivenessPolicy {
  return { ...DEFAULT_EFFECTIVENESS_POLICY, ...overrides };
}

/**
 * Both outcomes occur and neither clearly dominates
 */
export function isInconsistent(
  passed: number,
  failed: number,
  band: number
): boolean {
  const total = passed + failed;
  if (total === 0 || passed === 0 || failed === 0) return false;
  return Math.abs(passed - failed) / total <= band;
}

/**
 * Derive status from counters
 */
export function classifyEffectiveness(
  counters: EffectivenessCounters,
  policy: EffectivenessPolicy = DEFAULT_EFFECTIVENESS_POLICY
): EffectivenessStatus {
  const { totalValidations, failedValidations, passedValidations, feedbackCount } = counters;

  if (totalValidations < policy.minValidations || feedbackCount < policy.minFeedback) {
    return EffectivenessStatus.UNKNOWN;
  }

  const negativeRatio = counters.negativeFeedback / feedbackCount;
  const positiveRatio = counters.positiveFeedback / feedbackCount;
  const failureRate = failedValidations / totalValidations;

  if (
    negativeRatio >= policy.ineffectiveNegativeRatio ||
    failureRate >= policy.ineffectiveFailureRate
  ) {
    return EffectivenessStatus.INEFFECTIVE;
  }

  if (isInconsistent(passedValidations, failedValidations, policy.inconsistencyBand)) {
    return EffectivenessStatus.NEEDS_IMPROVEMENT;
  }

  if (positiveRatio >= policy.effectiveFeedbackRatio) {
    return EffectivenessStatus.EFFECTIVE;
  }

  return EffectivenessStatus.NEEDS_IMPROVEMENT;
}
