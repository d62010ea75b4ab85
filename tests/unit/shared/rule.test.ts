import { describe, it, expect } from 'vitest';
import {
  RuleCategory,
  RuleSeverity,
  createValidationRule,
  getNumericParameters,
  isBlockingSeverity,
  isRuleCategory,
  normalizeDependencies,
} from '../../../src/shared/types/rule.js';

describe('createValidationRule', () => {
  it('fills in defaults', () => {
    const rule = createValidationRule({
      id: 'ground-split',
      name: 'Ground Split',
      category: RuleCategory.GROUND,
      check: () => true,
    });

    expect(rule).toMatchObject({
      description: '',
      severity: RuleSeverity.WARNING,
      parameters: {},
      dependencies: [],
      enabled: true,
      testCases: [],
    });
  });

  it('copies parameters and de-duplicates dependencies', () => {
    const parameters = { max_current: 2000 };
    const rule = createValidationRule({
      id: 'r1',
      name: 'Rail Current',
      category: RuleCategory.POWER,
      parameters,
      dependencies: new Set(['r2', 'r3']),
      check: () => true,
    });
    parameters.max_current = 1;

    expect(rule.parameters).toEqual({ max_current: 2000 });
    expect(rule.dependencies).toEqual(['r2', 'r3']);
  });

  it('rejects an empty id', () => {
    expect(() =>
      createValidationRule({ id: '  ', name: 'Blank', category: RuleCategory.DESIGN, check: () => true })
    ).toThrow('Rule id must not be empty');
  });
});

describe('normalizeDependencies', () => {
  it('keeps declaration order', () => {
    expect(normalizeDependencies('r1', ['r3', 'r2', 'r3'])).toEqual(['r3', 'r2']);
  });

  it('rejects a self-dependency', () => {
    expect(() => normalizeDependencies('r1', ['r1'])).toThrow("Rule 'r1' cannot depend on itself");
  });
});

describe('getNumericParameters', () => {
  it('keeps finite numbers only', () => {
    const parameters = { threshold: 10, mode: 'strict', strict: true, limit: Number.POSITIVE_INFINITY };
    expect(getNumericParameters({ parameters })).toEqual([['threshold', 10]]);
  });
});

describe('severity and category helpers', () => {
  it('treats ERROR and CRITICAL as blocking', () => {
    expect(Object.values(RuleSeverity).filter(isBlockingSeverity)).toEqual([
      RuleSeverity.ERROR,
      RuleSeverity.CRITICAL,
    ]);
  });

  it('recognizes category names', () => {
    expect(isRuleCategory('audio')).toBe(true);
    expect(isRuleCategory('acoustics')).toBe(false);
    expect(isRuleCategory(3)).toBe(false);
  });
});
