import { describe, it, expect } from 'vitest';
import { findParameterRangeRule } from '../../../src/rule-engine/optimizer/parameter-ranges.js';
import {
  buildScoringContext,
  projectOutcome,
  relaxation,
  scoreOutcome,
  toParameterMetrics,
  type ScoringContext,
} from '../../../src/rule-engine/optimizer/parameter-scoring.js';
import { OptimizationStrategy } from '../../../src/rule-engine/optimizer/types.js';
import { createEffectiveness } from '../../setup.js';

function rangeRule(name: string) {
  const rule = findParameterRangeRule(name);
  if (!rule) throw new Error(`no range rule for ${name}`);
  return rule;
}

describe('buildScoringContext', () => {
  it('normalizes counters to 0..1', () => {
    const context = buildScoringContext(
      createEffectiveness({
        totalValidations: 10,
        passedValidations: 6,
        failedValidations: 4,
        averageSeverity: 2,
        feedbackCount: 10,
        positiveFeedback: 3,
        negativeFeedback: 7,
      })
    );

    expect(context).toEqual({
      hasValidations: true,
      failureRate: 0.4,
      severity: 0.5,
      positiveRatio: 0.3,
      negativeRatio: 0.7,
    });
  });

  it('treats missing feedback as neutral', () => {
    const context = buildScoringContext(createEffectiveness());
    expect(context.positiveRatio).toBe(0.5);
    expect(context.negativeRatio).toBe(0.5);
    expect(context.failureRate).toBe(0);
  });
});

describe('relaxation', () => {
  it('is positive when a threshold is raised', () => {
    expect(relaxation(rangeRule('threshold'), 1000, 1500)).toBe(0.5);
    expect(relaxation(rangeRule('threshold'), 1000, 500)).toBe(-0.5);
  });

  it('is positive when a min_* parameter is lowered', () => {
    expect(relaxation(rangeRule('min_width'), 100, 50)).toBe(0.5);
  });

  it('is clamped to [-1, 1] and zero for a zero current value', () => {
    expect(relaxation(rangeRule('max_current'), 1000, 3000)).toBe(1);
    expect(relaxation(rangeRule('threshold'), 0, 10)).toBe(0);
  });
});

describe('projectOutcome / scoreOutcome', () => {
  // Every validation failed at ERROR; all feedback negative
  const failing: ScoringContext = {
    hasValidations: true,
    failureRate: 1,
    severity: 0.75,
    positiveRatio: 0,
    negativeRatio: 1,
  };

  it('projects the outcome of relaxing by half', () => {
    const projected = projectOutcome(failing, 0.5);

    expect(projected.failureRate).toBeCloseTo(0.5);
    expect(projected.passRate).toBeCloseTo(0.5);
    expect(projected.severity).toBeCloseTo(0.5625);
    expect(projected.feedbackScore).toBeCloseTo(0.5);
  });

  it('scores each strategy', () => {
    const projected = projectOutcome(failing, 0.5);

    expect(scoreOutcome(OptimizationStrategy.MINIMIZE_FAILURES, failing, projected, 0.5)).toBeCloseTo(0.5);
    expect(scoreOutcome(OptimizationStrategy.MAXIMIZE_PASS_RATE, failing, projected, 0.5)).toBeCloseTo(0.5);
    expect(scoreOutcome(OptimizationStrategy.BALANCE_SEVERITY, failing, projected, 0.5)).toBeCloseTo(0.71875);
    expect(scoreOutcome(OptimizationStrategy.OPTIMIZE_FEEDBACK, failing, projected, 0.5)).toBeCloseTo(0.5);
  });

  it('penalizes relaxing away failures users endorsed', () => {
    const endorsed: ScoringContext = {
      hasValidations: true,
      failureRate: 0.5,
      severity: 0.5,
      positiveRatio: 1,
      negativeRatio: 0,
    };
    const projected = projectOutcome(endorsed, 0.5);

    // 1 - 0.25 - 0.5 * 1 * 0.5 * 0.5
    expect(scoreOutcome(OptimizationStrategy.MINIMIZE_FAILURES, endorsed, projected, 0.5)).toBeCloseTo(0.625);
    // relaxing lowers the feedback score when users agreed with the failures
    expect(projected.feedbackScore).toBeCloseTo(0.75);
  });

  it('reports a zero pass rate without validations', () => {
    const empty = buildScoringContext(createEffectiveness());
    expect(projectOutcome(empty, 0.2).passRate).toBe(0);
  });
});

describe('toParameterMetrics', () => {
  it('reports severity on the 1..4 scale', () => {
    const metrics = toParameterMetrics({ failureRate: 0.5, passRate: 0.5, severity: 0.5625, feedbackScore: 0.5 });
    expect(metrics).toEqual({
      failure_rate: 0.5,
      pass_rate: 0.5,
      average_severity: 2.25,
      feedback_score: 0.5,
    });
  });
});
