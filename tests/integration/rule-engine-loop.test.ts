/**
 * Integration: validate -> feedback -> improve -> optimize -> apply, persisted to disk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RuleCategory } from '../../src/shared/types/rule.js';
import { createValidationManager } from '../../src/rule-engine/validation/validation-manager.js';
import { EffectivenessStatus } from '../../src/rule-engine/effectiveness/types.js';
import { OptimizationStrategy } from '../../src/rule-engine/optimizer/types.js';
import {
  createSampleBoard,
  createTempDir,
  createThresholdRule,
  createTraceWidthRule,
  removeTempDir,
  type SampleBoard,
} from '../setup.js';

async function openManager(dataDir: string) {
  const manager = createValidationManager<SampleBoard>({ backend: 'file', dataDir });
  manager.addRule(createThresholdRule());
  manager.addRule(createTraceWidthRule());
  await manager.initialize();
  return manager;
}

describe('integration: rule engine feedback loop', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dataDir);
  });

  it('tunes a misfiring rule and keeps its state across restarts', async () => {
    const manager = await openManager(dataDir);

    for (let i = 0; i < 10; i++) {
      await manager.validate(createSampleBoard(), [RuleCategory.POWER]);
    }
    for (let i = 0; i < 10; i++) {
      await manager.addRuleFeedback('r1', i < 8);
    }
    expect(manager.getRuleEffectiveness('r1')?.status).toBe(EffectivenessStatus.EFFECTIVE);

    for (let i = 0; i < 10; i++) {
      const summary = await manager.validate(createSampleBoard({ maxCurrentMa: 1400 }), [RuleCategory.POWER]);
      expect(summary.passed).toBe(false);
    }
    for (let i = 0; i < 8; i++) {
      await manager.addRuleFeedback('r1', false);
    }
    expect(manager.getRuleEffectiveness('r1')?.status).toBe(EffectivenessStatus.INEFFECTIVE);
    expect(manager.getHighPriorityImprovements().map((i) => i.ruleId)).toEqual(['r1', 'r1']);

    const results = await manager.optimizeRuleParameters('r1', OptimizationStrategy.MINIMIZE_FAILURES);
    const best = manager.getBestOptimization('r1');
    expect(results).toHaveLength(5);
    expect(best?.optimizedValue).toBe(1500);
    if (!best) return;

    expect(manager.applyOptimization('r1', best)).toBe(true);
    const tuned = await manager.validate(createSampleBoard({ maxCurrentMa: 1400 }), [RuleCategory.POWER]);
    expect(tuned.passed).toBe(true);

    const restarted = await openManager(dataDir);
    expect(restarted.getRuleEffectiveness('r1')).toMatchObject({
      totalValidations: 21,
      passedValidations: 11,
      failedValidations: 10,
      feedbackCount: 18,
      status: EffectivenessStatus.INEFFECTIVE,
    });
    expect(restarted.getOptimizationHistory('r1')).toEqual(manager.getOptimizationHistory('r1'));
    expect(restarted.getRule('r1')?.parameters).toEqual({ threshold: 1000 });
  });

  it('moves history between data directories through an export', async () => {
    const source = await openManager(dataDir);
    for (let i = 0; i < 10; i++) {
      await source.validate(createSampleBoard({ maxCurrentMa: 1200 }));
    }
    await source.optimizeRuleParameters('r1');
    const exported = source.exportOptimizationHistory('r1', 'table');

    const otherDir = await createTempDir();
    try {
      const target = await openManager(otherDir);
      await target.importOptimizationHistory('r1', exported, 'table');

      const reopened = await openManager(otherDir);
      expect(reopened.getOptimizationHistory('r1')).toEqual(source.getOptimizationHistory('r1'));
    } finally {
      await removeTempDir(otherDir);
    }
  });
});
