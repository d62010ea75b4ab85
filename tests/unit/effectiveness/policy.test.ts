/**
 * Effectiveness policy: status classification from counters
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EFFECTIVENESS_POLICY,
  classifyEffectiveness,
  isInconsistent,
  resolvePolicy,
} from '../../../src/rule-engine/effectiveness/policy.js';
import { EffectivenessStatus, type EffectivenessCounters } from '../../../src/rule-engine/effectiveness/types.js';

function counters(overrides: Partial<EffectivenessCounters>): EffectivenessCounters {
  return {
    totalValidations: 0,
    passedValidations: 0,
    failedValidations: 0,
    feedbackCount: 0,
    positiveFeedback: 0,
    negativeFeedback: 0,
    ...overrides,
  };
}

describe('classifyEffectiveness', () => {
  it('is UNKNOWN with no validations and no feedback', () => {
    expect(classifyEffectiveness(counters({}))).toBe(EffectivenessStatus.UNKNOWN);
  });

  it('stays UNKNOWN until the feedback minimum is reached', () => {
    const c = counters({
      totalValidations: 50,
      passedValidations: 50,
      feedbackCount: 4,
      positiveFeedback: 4,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.UNKNOWN);
  });

  it('stays UNKNOWN until the validation minimum is reached', () => {
    const c = counters({
      totalValidations: 9,
      passedValidations: 9,
      feedbackCount: 10,
      positiveFeedback: 10,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.UNKNOWN);
  });

  it('is EFFECTIVE with mostly positive feedback and no failures', () => {
    const c = counters({
      totalValidations: 10,
      passedValidations: 10,
      feedbackCount: 10,
      positiveFeedback: 8,
      negativeFeedback: 2,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.EFFECTIVE);
  });

  it('is INEFFECTIVE when negative feedback dominates', () => {
    // 10 passes + 10 failures, 8 positive then 10 negative
    const c = counters({
      totalValidations: 20,
      passedValidations: 10,
      failedValidations: 10,
      feedbackCount: 18,
      positiveFeedback: 8,
      negativeFeedback: 10,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.INEFFECTIVE);
  });

  it('is INEFFECTIVE when the failure rate is too high despite positive feedback', () => {
    const c = counters({
      totalValidations: 10,
      passedValidations: 4,
      failedValidations: 6,
      feedbackCount: 5,
      positiveFeedback: 5,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.INEFFECTIVE);
  });

  it('is NEEDS_IMPROVEMENT when pass and fail counts are balanced', () => {
    const c = counters({
      totalValidations: 10,
      passedValidations: 5,
      failedValidations: 5,
      feedbackCount: 5,
      positiveFeedback: 4,
      negativeFeedback: 1,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.NEEDS_IMPROVEMENT);
  });

  it('is NEEDS_IMPROVEMENT with mixed feedback', () => {
    const c = counters({
      totalValidations: 10,
      passedValidations: 9,
      failedValidations: 1,
      feedbackCount: 10,
      positiveFeedback: 5,
      negativeFeedback: 5,
    });
    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.NEEDS_IMPROVEMENT);
  });

  it('applies policy overrides', () => {
    const policy = resolvePolicy({ minValidations: 1, minFeedback: 1 });
    const c = counters({
      totalValidations: 1,
      passedValidations: 1,
      feedbackCount: 1,
      positiveFeedback: 1,
    });

    expect(classifyEffectiveness(c)).toBe(EffectivenessStatus.UNKNOWN);
    expect(classifyEffectiveness(c, policy)).toBe(EffectivenessStatus.EFFECTIVE);
  });

  it('gives the same status for identical counters', () => {
    const c = counters({
      totalValidations: 30,
      passedValidations: 12,
      failedValidations: 18,
      feedbackCount: 7,
      positiveFeedback: 3,
      negativeFeedback: 4,
    });
    expect(classifyEffectiveness({ ...c })).toBe(classifyEffectiveness(c));
  });
});

describe('isInconsistent', () => {
  it('needs both outcomes', () => {
    expect(isInconsistent(0, 0, 0.2)).toBe(false);
    expect(isInconsistent(10, 0, 0.2)).toBe(false);
    expect(isInconsistent(0, 10, 0.2)).toBe(false);
  });

  it('treats the band edge as inconsistent', () => {
    expect(isInconsistent(6, 4, 0.2)).toBe(true);
    expect(isInconsistent(7, 3, 0.2)).toBe(false);
  });
});

describe('resolvePolicy', () => {
  it('fills unspecified thresholds from the defaults', () => {
    const policy = resolvePolicy({ minFeedback: 3 });
    expect(policy).toEqual({ ...DEFAULT_EFFECTIVENESS_POLICY, minFeedback: 3 });
  });
});
