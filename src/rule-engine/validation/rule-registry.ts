/**
 * Rule Registry
 *
 * Registered rules in registration order, plus a category index.
 * A rule cannot be removed while another registered rule depends on it.
 */

import {
  normalizeDependencies,
  type RuleCategory,
  type ValidationRule,
  type ValidationRulePatch,
} from '../../shared/types/rule.js';
import { DependencyError, DuplicateRuleError, RuleNotFoundError } from '../errors.js';

export class RuleRegistry<TInput = unknown> {
  private rules: Map<string, ValidationRule<TInput>> = new Map();
  private categoryIndex: Map<RuleCategory, Set<string>> = new Map();

  /**
   * Registers a copy; later changes go through update()
   */
  add(rule: ValidationRule<TInput>): void {
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    const registered: ValidationRule<TInput> = {
      ...rule,
      parameters: { ...rule.parameters },
      dependencies: [...rule.dependencies],
      testCases: [...rule.testCases],
    };
    this.rules.set(registered.id, registered);
    this.index(registered);
  }

  /**
   * @throws DependencyError when other registered rules list this id as a dependency
   */
  remove(ruleId: string): ValidationRule<TInput> {
    const rule = this.require(ruleId, 'remove');

    const dependents = this.getDependents(ruleId);
    if (dependents.length > 0) {
      throw new DependencyError(ruleId, dependents);
    }

    this.rules.delete(ruleId);
    this.unindex(rule);
    return rule;
  }

  get(ruleId: string): ValidationRule<TInput> | null {
    return this.rules.get(ruleId) ?? null;
  }

  has(ruleId: string): boolean {
    return this.rules.has(ruleId);
  }

  require(ruleId: string, context: string): ValidationRule<TInput> {
    const rule = this.rules.get(ruleId);
    if (!rule) {
      throw new RuleNotFoundError(ruleId, context);
    }
    return rule;
  }

  getAll(): ValidationRule<TInput>[] {
    return Array.from(this.rules.values());
  }

  getIds(): string[] {
    return Array.from(this.rules.keys());
  }

  getByCategory(category: RuleCategory): ValidationRule<TInput>[] {
    const ids = this.categoryIndex.get(category);
    if (!ids) return [];

    const rules: ValidationRule<TInput>[] = [];
    for (const id of ids) {
      const rule = this.rules.get(id);
      if (rule) rules.push(rule);
    }
    return rules;
  }

  getCategories(): RuleCategory[] {
    return Array.from(this.categoryIndex.keys());
  }

  /**
   * Rule ids whose dependencies include ruleId
   */
  getDependents(ruleId: string): string[] {
    return this.getAll()
      .filter((rule) => rule.id !== ruleId && rule.dependencies.includes(ruleId))
      .map((rule) => rule.id);
  }

  /**
   * Apply a patch in place. The category index follows a category change.
   */
  update(ruleId: string, patch: ValidationRulePatch<TInput>): ValidationRule<TInput> {
    const rule = this.require(ruleId, 'update');
    const previousCategory = rule.category;
    const dependencies =
      patch.dependencies !== undefined ? normalizeDependencies(ruleId, patch.dependencies) : rule.dependencies;

    if (patch.name !== undefined) rule.name = patch.name;
    if (patch.description !== undefined) rule.description = patch.description;
    if (patch.severity !== undefined) rule.severity = patch.severity;
    if (patch.parameters !== undefined) rule.parameters = { ...patch.parameters };
    if (patch.enabled !== undefined) rule.enabled = patch.enabled;
    if (patch.check !== undefined) rule.check = patch.check;
    if (patch.testCases !== undefined) rule.testCases = [...patch.testCases];
    rule.dependencies = dependencies;

    if (patch.category !== undefined && patch.category !== previousCategory) {
      this.unindex(rule);
      rule.category = patch.category;
      this.index(rule);
    }

    return rule;
  }

  get size(): number {
    return this.rules.size;
  }

  private index(rule: ValidationRule<TInput>): void {
    const ids = this.categoryIndex.get(rule.category) ?? new Set<string>();
    ids.add(rule.id);
    this.categoryIndex.set(rule.category, ids);
  }

  private unindex(rule: ValidationRule<TInput>): void {
    const ids = this.categoryIndex.get(rule.category);
    if (!ids) return;
    ids.delete(rule.id);
    if (ids.size === 0) {
      this.categoryIndex.delete(rule.category);
    }
  }
}
