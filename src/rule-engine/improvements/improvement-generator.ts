/**
 * Rule Improvement Generator
 *
 * Pure function of an effectiveness snapshot (plus the rule definition, when
 * known). Runs every pattern in order and turns each finding into a
 * RuleImprovement. A healthy rule yields no findings.
 */

import type { RuleEffectiveness } from '../effectiveness/types.js';
import { DEFAULT_IMPROVEMENT_THRESHOLDS, IMPROVEMENT_PATTERNS } from './improvement-patterns.js';
import type {
  GenerateImprovementsOptions,
  ImprovableRule,
  ImprovementContext,
  ImprovementPattern,
  ImprovementPriority,
  ImprovementThresholds,
  RuleImprovement,
} from './types.js';

export interface ImprovementGeneratorOptions {
  thresholds?: Partial<ImprovementThresholds>;
  /** Replaces the default pattern list */
  patterns?: readonly ImprovementPattern[];
  now?: () => Date;
}

export class RuleImprovementGenerator {
  private readonly thresholds: ImprovementThresholds;
  private readonly patterns: readonly ImprovementPattern[];
  private readonly now: () => Date;

  constructor(options: ImprovementGeneratorOptions = {}) {
    this.thresholds = { ...DEFAULT_IMPROVEMENT_THRESHOLDS, ...options.thresholds };
    this.patterns = options.patterns ?? IMPROVEMENT_PATTERNS;
    this.now = options.now ?? (() => new Date());
  }

  getPatterns(): readonly ImprovementPattern[] {
    return this.patterns;
  }

  getThresholds(): ImprovementThresholds {
    return { ...this.thresholds };
  }

  generateImprovements(
    effectiveness: RuleEffectiveness,
    rule: ImprovableRule | null = null,
    options: GenerateImprovementsOptions = {}
  ): RuleImprovement[] {
    const context: ImprovementContext = {
      effectiveness,
      rule,
      knownRuleIds: options.knownRuleIds ? new Set(options.knownRuleIds) : null,
      thresholds: this.thresholds,
    };

    const improvements: RuleImprovement[] = [];
    for (const pattern of this.patterns) {
      if (pattern.requiresRule && !rule) continue;

      for (const finding of pattern.detect(context)) {
        improvements.push(
          this.createImprovement(
            effectiveness,
            pattern.title,
            finding.description,
            pattern.priority,
            finding.suggestions,
            finding.metrics
          )
        );
      }
    }
    return improvements;
  }

  createImprovement(
    effectiveness: Pick<RuleEffectiveness, 'ruleId' | 'category'>,
    title: string,
    description: string,
    priority: ImprovementPriority,
    suggestions: string[],
    metrics: Record<string, number>
  ): RuleImprovement {
    return {
      ruleId: effectiveness.ruleId,
      title,
      description,
      priority,
      category: effectiveness.category,
      suggestions: [...suggestions],
      metrics: { ...metrics },
      createdAt: this.now(),
    };
  }
}

export function createImprovementGenerator(options: ImprovementGeneratorOptions = {}): RuleImprovementGenerator {
  return new RuleImprovementGenerator(options);
}
