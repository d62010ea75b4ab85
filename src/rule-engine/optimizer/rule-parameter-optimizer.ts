/**
 * Rule Parameter Optimizer
 *
 * Grid-searches every numeric parameter whose name has a range in the
 * parameter range table, scores each candidate against the rule's recorded
 * effectiveness under the chosen strategy, and reports the candidates that
 * beat the current value. Reported results are appended to a per-rule history
 * that is persisted one record per rule id.
 */

import { getNumericParameters, type ValidationRule } from '../../shared/types/rule.js';
import { OPTIMIZER_MAX_GRID_STEPS } from '../../shared/config.js';
import type { RuleEffectiveness } from '../effectiveness/types.js';
import { KeyedMutex } from '../effectiveness/keyed-mutex.js';
import { RuleEngineLogger } from '../rule-engine-logger.js';
import type { RecordStore } from '../storage/types.js';
import { MemoryRecordStore } from '../storage/memory-store.js';
import {
  PARAMETER_RANGE_RULES,
  findParameterRangeRule,
  getParameterRange,
  gridValues,
  type ParameterRangeRule,
} from './parameter-ranges.js';
import {
  buildScoringContext,
  projectOutcome,
  relaxation,
  scoreOutcome,
  toParameterMetrics,
} from './parameter-scoring.js';
import {
  OptimizationStrategy,
  type OptimizationHistoryRecord,
  type OptimizationResult,
  type OptimizationSummary,
  type ParameterMetrics,
  type ParameterRange,
} from './types.js';

/**
 * Improvements at or below this are floating-point noise
 */
const MIN_IMPROVEMENT = 1e-9;

type OptimizableRule = Pick<ValidationRule, 'id' | 'parameters'>;

export interface RuleParameterOptimizerOptions {
  /** Durable history store (defaults to an in-memory store) */
  store?: RecordStore<OptimizationHistoryRecord>;
  /** Upper bound on grid increments per parameter */
  maxGridSteps?: number;
  /** Range table (defaults to PARAMETER_RANGE_RULES) */
  rangeRules?: readonly ParameterRangeRule[];
  now?: () => Date;
}

function copyResult(result: OptimizationResult): OptimizationResult {
  return { ...result, metrics: { ...result.metrics }, createdAt: new Date(result.createdAt) };
}

export class RuleParameterOptimizer {
  private history: Map<string, OptimizationResult[]> = new Map();
  private readonly mutex = new KeyedMutex();
  private readonly store: RecordStore<OptimizationHistoryRecord>;
  private readonly maxGridSteps: number;
  private readonly rangeRules: readonly ParameterRangeRule[];
  private readonly now: () => Date;

  constructor(options: RuleParameterOptimizerOptions = {}) {
    this.store = options.store ?? new MemoryRecordStore<OptimizationHistoryRecord>('optimization-history');
    this.maxGridSteps = options.maxGridSteps ?? OPTIMIZER_MAX_GRID_STEPS;
    this.rangeRules = options.rangeRules ?? PARAMETER_RANGE_RULES;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted optimization history
   */
  async initialize(): Promise<void> {
    const stored = await this.store.loadAll();
    this.history.clear();
    for (const [ruleId, record] of stored) {
      this.history.set(ruleId, record.optimizations.map(copyResult));
    }
  }

  getParameterRange(name: string, currentValue: number): ParameterRange | null {
    return getParameterRange(name, currentValue, this.rangeRules);
  }

  /**
   * Score (0..1) of giving `parameterName` the value `value`
   *
   * Parameters that are absent, non-numeric or unrecognized score as if unchanged.
   */
  evaluateParameter(
    rule: OptimizableRule,
    parameterName: string,
    value: number,
    effectiveness: RuleEffectiveness,
    strategy: OptimizationStrategy
  ): number {
    const context = buildScoringContext(effectiveness);
    const r = this.relaxationFor(rule, parameterName, value);
    return scoreOutcome(strategy, context, projectOutcome(context, r), r);
  }

  /**
   * Projected failure rate, pass rate, average severity and feedback score
   */
  calculateMetrics(
    rule: OptimizableRule,
    parameterName: string,
    value: number,
    effectiveness: RuleEffectiveness
  ): ParameterMetrics {
    const context = buildScoringContext(effectiveness);
    const r = this.relaxationFor(rule, parameterName, value);
    return toParameterMetrics(projectOutcome(context, r));
  }

  /**
   * Candidates that beat the current values, best first. Pure: nothing is recorded.
   */
  searchParameters(
    rule: OptimizableRule,
    effectiveness: RuleEffectiveness,
    strategy: OptimizationStrategy = OptimizationStrategy.MINIMIZE_FAILURES
  ): OptimizationResult[] {
    const context = buildScoringContext(effectiveness);
    const createdAt = this.now();
    const results: OptimizationResult[] = [];

    for (const [name, currentValue] of getNumericParameters(rule)) {
      const rangeRule = findParameterRangeRule(name, this.rangeRules);
      const range = this.getParameterRange(name, currentValue);
      if (!rangeRule || !range) continue;

      RuleEngineLogger.debug(
        `range rule="${rule.id}" ${name}=${currentValue} [${range.minValue}, ${range.maxValue}] step=${range.step}`
      );

      const baseline = scoreOutcome(strategy, context, projectOutcome(context, 0), 0);

      for (const candidate of gridValues(range, this.maxGridSteps)) {
        if (candidate === currentValue) continue;

        const r = relaxation(rangeRule, currentValue, candidate);
        const projected = projectOutcome(context, r);
        const score = scoreOutcome(strategy, context, projected, r);
        const improvement = score - baseline;
        if (improvement <= MIN_IMPROVEMENT) continue;

        results.push({
          ruleId: rule.id,
          parameterName: name,
          originalValue: currentValue,
          optimizedValue: candidate,
          improvement,
          strategy,
          metrics: { ...toParameterMetrics(projected), score, baseline_score: baseline },
          createdAt: new Date(createdAt),
        });
      }
    }

    // Array.prototype.sort is stable: ties keep parameter then grid order
    return results.sort((a, b) => b.improvement - a.improvement);
  }

  /**
   * Search, append the results to the rule's history and persist it
   *
   * A rule without recognized numeric parameters yields [] (not an error).
   */
  async optimizeParameters(
    rule: OptimizableRule,
    effectiveness: RuleEffectiveness,
    strategy: OptimizationStrategy = OptimizationStrategy.MINIMIZE_FAILURES
  ): Promise<OptimizationResult[]> {
    const results = this.searchParameters(rule, effectiveness, strategy);

    RuleEngineLogger.optimizationRun(rule.id, strategy, results.length, results[0]?.improvement ?? 0);

    if (results.length > 0) {
      await this.updateHistory(rule.id, (existing) => [...existing, ...results.map(copyResult)]);
    }

    return results.map(copyResult);
  }

  getOptimizationHistory(ruleId: string): OptimizationResult[] {
    return (this.history.get(ruleId) ?? []).map(copyResult);
  }

  /**
   * History entry with the largest improvement (earliest wins a tie)
   */
  getBestOptimization(ruleId: string): OptimizationResult | null {
    const history = this.history.get(ruleId) ?? [];
    let best: OptimizationResult | null = null;
    for (const result of history) {
      if (!best || result.improvement > best.improvement) {
        best = result;
      }
    }
    return best ? copyResult(best) : null;
  }

  getOptimizationSummary(ruleId: string): OptimizationSummary {
    const history = this.history.get(ruleId) ?? [];
    if (history.length === 0) {
      return {
        totalOptimizations: 0,
        averageImprovement: 0,
        bestImprovement: 0,
        optimizedParameters: [],
      };
    }

    let total = 0;
    let best = Number.NEGATIVE_INFINITY;
    for (const result of history) {
      total += result.improvement;
      if (result.improvement > best) best = result.improvement;
    }

    return {
      totalOptimizations: history.length,
      averageImprovement: total / history.length,
      bestImprovement: best,
      optimizedParameters: Array.from(new Set(history.map((result) => result.parameterName))),
    };
  }

  /**
   * Replace a rule's history (used by history import)
   */
  async replaceHistory(ruleId: string, results: OptimizationResult[]): Promise<void> {
    await this.updateHistory(ruleId, () => results.map(copyResult));
  }

  /**
   * Keep only the `keep` most recent entries of a rule's history
   */
  async trimHistory(ruleId: string, keep: number): Promise<number> {
    let removed = 0;
    await this.updateHistory(ruleId, (existing) => {
      const retained = keep > 0 ? existing.slice(-keep) : [];
      removed = existing.length - retained.length;
      return retained;
    });
    return removed;
  }

  /**
   * Drop one rule's history, or every history when ruleId is omitted
   */
  async clearHistory(ruleId?: string): Promise<void> {
    if (ruleId === undefined) {
      this.history.clear();
      await this.store.clear();
      return;
    }
    await this.mutex.runExclusive(ruleId, async () => {
      this.history.delete(ruleId);
      await this.store.delete(ruleId);
    });
  }

  private relaxationFor(rule: OptimizableRule, parameterName: string, value: number): number {
    const currentValue = rule.parameters[parameterName];
    const rangeRule = findParameterRangeRule(parameterName, this.rangeRules);
    if (typeof currentValue !== 'number' || !rangeRule) return 0;
    return relaxation(rangeRule, currentValue, value);
  }

  private async updateHistory(
    ruleId: string,
    update: (existing: OptimizationResult[]) => OptimizationResult[]
  ): Promise<void> {
    await this.mutex.runExclusive(ruleId, async () => {
      const next = update(this.history.get(ruleId) ?? []);
      this.history.set(ruleId, next);

      try {
        await this.store.save(ruleId, { ruleId, optimizations: next });
      } catch (error) {
        RuleEngineLogger.error(`Failed to persist optimization history for rule "${ruleId}"`, error);
      }
    });
  }
}

/**
 * Create an optimizer with the given options
 */
export function createRuleParameterOptimizer(
  options: RuleParameterOptimizerOptions = {}
): RuleParameterOptimizer {
  return new RuleParameterOptimizer(options);
}
