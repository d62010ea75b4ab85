import { describe, it, expect, beforeEach } from 'vitest';
import { RuleCategory, RuleSeverity } from '../../../src/shared/types/rule.js';
import { RuleRegistry } from '../../../src/rule-engine/validation/rule-registry.js';
import { DependencyError, DuplicateRuleError, RuleNotFoundError } from '../../../src/rule-engine/errors.js';
import { createThresholdRule, createTraceWidthRule, type SampleBoard } from '../../setup.js';

describe('RuleRegistry', () => {
  let registry: RuleRegistry<SampleBoard>;

  beforeEach(() => {
    registry = new RuleRegistry<SampleBoard>();
  });

  it('rejects a duplicate id', () => {
    registry.add(createThresholdRule());
    expect(() => registry.add(createThresholdRule())).toThrow(DuplicateRuleError);
    expect(registry.size).toBe(1);
  });

  it('indexes rules by category in registration order', () => {
    registry.add(createThresholdRule());
    registry.add(createTraceWidthRule());
    registry.add(createThresholdRule({ id: 'r3', name: 'Rail Ripple' }));

    expect(registry.getByCategory(RuleCategory.POWER).map((r) => r.id)).toEqual(['r1', 'r3']);
    expect(registry.getCategories()).toEqual([RuleCategory.POWER, RuleCategory.MANUFACTURING]);
    expect(registry.getByCategory(RuleCategory.AUDIO)).toEqual([]);
  });

  it('drops a category when its last rule is removed', () => {
    registry.add(createThresholdRule());
    registry.add(createTraceWidthRule());

    registry.remove('r2');

    expect(registry.getCategories()).toEqual([RuleCategory.POWER]);
    expect(registry.has('r2')).toBe(false);
  });

  it('refuses to remove a rule another rule depends on', () => {
    registry.add(createTraceWidthRule());
    registry.add(createThresholdRule({ dependencies: ['r2'] }));

    expect(() => registry.remove('r2')).toThrow(DependencyError);
    expect(() => registry.remove('r2')).toThrow("Rule 'r2' is still required by: r1");

    registry.remove('r1');
    registry.remove('r2');
    expect(registry.size).toBe(0);
  });

  it('is not affected by later changes to the added rule object', () => {
    const rule = createThresholdRule();
    registry.add(rule);

    rule.category = RuleCategory.AUDIO;
    rule.parameters.threshold = 1;
    rule.dependencies.push('r2');

    expect(registry.get('r1')).toMatchObject({ category: RuleCategory.POWER, parameters: { threshold: 1000 } });
    expect(registry.get('r1')?.dependencies).toEqual([]);
    expect(registry.getByCategory(RuleCategory.POWER).map((r) => r.id)).toEqual(['r1']);
    expect(registry.getDependents('r2')).toEqual([]);
  });

  it('throws RuleNotFoundError for unknown ids', () => {
    expect(() => registry.remove('missing')).toThrow(RuleNotFoundError);
    expect(() => registry.require('missing', 'lookup')).toThrow("Rule 'missing' not found (lookup)");
    expect(registry.get('missing')).toBeNull();
  });

  describe('update', () => {
    it('moves a rule to its new category', () => {
      registry.add(createThresholdRule());

      const updated = registry.update('r1', { category: RuleCategory.SIGNAL, severity: RuleSeverity.CRITICAL });

      expect(updated.category).toBe(RuleCategory.SIGNAL);
      expect(updated.severity).toBe(RuleSeverity.CRITICAL);
      expect(registry.getByCategory(RuleCategory.POWER)).toEqual([]);
      expect(registry.getByCategory(RuleCategory.SIGNAL).map((r) => r.id)).toEqual(['r1']);
    });

    it('de-duplicates dependencies', () => {
      registry.add(createThresholdRule());
      expect(registry.update('r1', { dependencies: ['r2', 'r2', 'r3'] }).dependencies).toEqual(['r2', 'r3']);
      expect(registry.getDependents('r2')).toEqual(['r1']);
    });

    it('leaves the rule untouched when the dependency patch is invalid', () => {
      registry.add(createThresholdRule());

      expect(() => registry.update('r1', { name: 'Renamed', dependencies: ['r1'] })).toThrow(
        "Rule 'r1' cannot depend on itself"
      );
      expect(registry.get('r1')?.name).toBe('Trace Current Threshold');
    });
  });
});
