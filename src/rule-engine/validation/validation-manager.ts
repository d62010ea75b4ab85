/**
 * Validation Manager
 *
 * Owns the rule registry and orchestrates the feedback loop:
 * - validate() runs enabled rules against arbitrary input and forwards every
 *   outcome to the effectiveness tracker
 * - feedback, improvement and optimization queries delegate to the tracker,
 *   the improvement generator and the parameter optimizer
 * - applyOptimization() writes an accepted optimization back onto a rule
 *
 * Error policy:
 * - registry errors, unknown rule ids and unknown categories throw
 * - a check that throws becomes a failed ERROR result; validate() always returns a summary
 * - applyOptimization() reports an unusable result by returning false
 */

import {
  RuleSeverity,
  isBlockingSeverity,
  isRuleCategory,
  type RuleCategory,
  type RuleCheckResult,
  type ValidationRule,
  type ValidationRulePatch,
} from '../../shared/types/rule.js';
import { OPTIMIZATION_HISTORY_LIMIT } from '../../shared/config.js';
import {
  InvalidCategoryError,
  InvalidParameterError,
  ValidationExecutionError,
} from '../errors.js';
import { RuleEngineLogger } from '../rule-engine-logger.js';
import { createRecordStore, type RecordStoreOptions } from '../storage/index.js';
import {
  RuleEffectivenessTracker,
  createEmptyEffectiveness,
  ruleEffectivenessSchema,
  type EffectivenessPolicy,
  type EffectivenessSummary,
  type MetricsSink,
  type RuleEffectiveness,
} from '../effectiveness/index.js';
import {
  ImprovementPriority,
  RuleImprovementGenerator,
  type ImprovementThresholds,
  type RuleImprovement,
} from '../improvements/index.js';
import {
  OptimizationStrategy,
  RuleParameterOptimizer,
  exportHistory,
  importHistory,
  optimizationHistoryRecordSchema,
  type HistoryExportFormat,
  type OptimizationResult,
  type OptimizationSummary,
} from '../optimizer/index.js';
import { RuleRegistry } from './rule-registry.js';
import type {
  RuleTestCaseResult,
  RuleTestReport,
  RuleValidationResult,
  ValidationSummary,
} from './types.js';

export interface ValidationManagerOptions {
  tracker?: RuleEffectivenessTracker;
  optimizer?: RuleParameterOptimizer;
  improvementGenerator?: RuleImprovementGenerator;
  /** Entries kept per rule after each optimization run (0 = unbounded) */
  historyLimit?: number;
}

export class ValidationManager<TInput = unknown> {
  private readonly registry = new RuleRegistry<TInput>();
  private readonly tracker: RuleEffectivenessTracker;
  private readonly optimizer: RuleParameterOptimizer;
  private readonly improvementGenerator: RuleImprovementGenerator;
  private readonly historyLimit: number;

  constructor(options: ValidationManagerOptions = {}) {
    this.tracker = options.tracker ?? new RuleEffectivenessTracker();
    this.optimizer = options.optimizer ?? new RuleParameterOptimizer();
    this.improvementGenerator = options.improvementGenerator ?? new RuleImprovementGenerator();
    this.historyLimit = options.historyLimit ?? OPTIMIZATION_HISTORY_LIMIT;
  }

  /**
   * Load persisted effectiveness records and optimization history
   */
  async initialize(): Promise<void> {
    await Promise.all([this.tracker.initialize(), this.optimizer.initialize()]);
    RuleEngineLogger.info(`Validation manager ready: ${this.tracker.getAllEffectiveness().length} tracked rules`);
  }

  // ==========================================================================
  // Registry
  // ==========================================================================

  addRule(rule: ValidationRule<TInput>): void {
    this.registry.add(rule);
    RuleEngineLogger.ruleRegistered(rule.id, rule.category);
  }

  removeRule(ruleId: string): void {
    this.registry.remove(ruleId);
    RuleEngineLogger.ruleRemoved(ruleId);
  }

  getRule(ruleId: string): ValidationRule<TInput> | null {
    return this.registry.get(ruleId);
  }

  getRules(): ValidationRule<TInput>[] {
    return this.registry.getAll();
  }

  /**
   * Enabled and disabled rules of a category, in registration order
   */
  getRulesByCategory(category: RuleCategory): ValidationRule<TInput>[] {
    return this.registry.getByCategory(category);
  }

  getCategories(): RuleCategory[] {
    return this.registry.getCategories();
  }

  updateRule(ruleId: string, patch: ValidationRulePatch<TInput>): ValidationRule<TInput> {
    return this.registry.update(ruleId, patch);
  }

  enableRule(ruleId: string): void {
    this.registry.update(ruleId, { enabled: true });
  }

  disableRule(ruleId: string): void {
    this.registry.update(ruleId, { enabled: false });
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Run enabled rules (optionally only those in `categories`) against input
   *
   * @throws InvalidCategoryError for a category name that does not exist
   */
  async validate(input: TInput, categories?: readonly (RuleCategory | string)[]): Promise<ValidationSummary> {
    const rules = this.selectRules(categories).filter((rule) => rule.enabled);
    const results: RuleValidationResult[] = [];

    for (const rule of rules) {
      const result = await this.executeRule(rule, input);
      results.push(result);
      await this.tracker.trackValidation(rule, result.passed, result.severity);
    }

    const failures = results.filter((result) => !result.passed);
    const errorCount = failures.filter((result) => isBlockingSeverity(result.severity)).length;
    const warningCount = failures.filter((result) => result.severity === RuleSeverity.WARNING).length;
    const executionFailures = results.filter((result) => result.error !== undefined).length;

    RuleEngineLogger.validationRun(rules.length, errorCount, warningCount, executionFailures);

    return {
      passed: errorCount === 0,
      hasErrors: errorCount > 0,
      hasWarnings: warningCount > 0,
      errorCount,
      warningCount,
      results,
    };
  }

  /**
   * Run every rule's self-test cases. Results never reach the effectiveness tracker.
   */
  async runTests(categories?: readonly (RuleCategory | string)[]): Promise<RuleTestReport> {
    const report: RuleTestReport = {};

    for (const rule of this.selectRules(categories)) {
      if (rule.testCases.length === 0) continue;

      const caseResults: RuleTestCaseResult[] = [];
      for (const testCase of rule.testCases) {
        let actualResult: boolean | null = null;
        let error: string | undefined;
        try {
          actualResult = (await this.runCheck(rule, testCase.input)).passed;
        } catch (cause) {
          error = cause instanceof Error ? cause.message : String(cause);
        }

        caseResults.push({
          name: testCase.name,
          ...(testCase.description !== undefined && { description: testCase.description }),
          expectedResult: testCase.expectedResult,
          actualResult,
          passed: actualResult === testCase.expectedResult,
          ...(error !== undefined && { error }),
        });
      }

      const byRule = report[rule.category] ?? {};
      byRule[rule.name] = caseResults;
      report[rule.category] = byRule;
    }

    return report;
  }

  // ==========================================================================
  // Feedback & Effectiveness
  // ==========================================================================

  /**
   * @throws RuleNotFoundError when the rule is not registered
   */
  async addRuleFeedback(ruleId: string, isPositive: boolean, feedbackText?: string): Promise<RuleEffectiveness> {
    const rule = this.registry.require(ruleId, 'feedback');
    const updated = await this.tracker.addFeedback(ruleId, isPositive, rule);
    RuleEngineLogger.feedbackReceived(ruleId, isPositive, feedbackText);
    return updated;
  }

  getRuleEffectiveness(ruleId: string): RuleEffectiveness | null {
    return this.tracker.getRuleEffectiveness(ruleId);
  }

  getEffectiveRules(): RuleEffectiveness[] {
    return this.tracker.getEffectiveRules();
  }

  getIneffectiveRules(): RuleEffectiveness[] {
    return this.tracker.getIneffectiveRules();
  }

  getRulesNeedingImprovement(): RuleEffectiveness[] {
    return this.tracker.getRulesNeedingImprovement();
  }

  getEffectivenessSummary(): EffectivenessSummary {
    return this.tracker.getEffectivenessSummary();
  }

  /**
   * Administrative wipe of every effectiveness record
   */
  async resetEffectiveness(): Promise<void> {
    await this.tracker.reset();
  }

  // ==========================================================================
  // Improvements
  // ==========================================================================

  /**
   * @throws RuleNotFoundError when the rule is not registered
   */
  getRuleImprovements(ruleId: string): RuleImprovement[] {
    return this.improvementsFor(this.registry.require(ruleId, 'improvements'));
  }

  /**
   * HIGH priority improvements across all registered rules
   */
  getHighPriorityImprovements(): RuleImprovement[] {
    return this.registry
      .getAll()
      .flatMap((rule) => this.improvementsFor(rule))
      .filter((improvement) => improvement.priority === ImprovementPriority.HIGH);
  }

  getImprovementsByCategory(category: RuleCategory): RuleImprovement[] {
    return this.registry.getByCategory(category).flatMap((rule) => this.improvementsFor(rule));
  }

  // ==========================================================================
  // Optimization
  // ==========================================================================

  /**
   * @throws RuleNotFoundError when the rule is not registered
   */
  async optimizeRuleParameters(
    ruleId: string,
    strategy: OptimizationStrategy = OptimizationStrategy.MINIMIZE_FAILURES
  ): Promise<OptimizationResult[]> {
    const rule = this.registry.require(ruleId, 'optimization');
    const results = await this.optimizer.optimizeParameters(rule, this.snapshotFor(rule), strategy);

    if (this.historyLimit > 0) {
      await this.optimizer.trimHistory(ruleId, this.historyLimit);
    }
    return results;
  }

  getOptimizationHistory(ruleId: string): OptimizationResult[] {
    return this.optimizer.getOptimizationHistory(ruleId);
  }

  getBestOptimization(ruleId: string): OptimizationResult | null {
    return this.optimizer.getBestOptimization(ruleId);
  }

  getOptimizationSummary(ruleId: string): OptimizationSummary {
    return this.optimizer.getOptimizationSummary(ruleId);
  }

  /**
   * Keep the `keep` most recent history entries of a rule; returns how many were dropped
   */
  async trimOptimizationHistory(ruleId: string, keep: number): Promise<number> {
    return this.optimizer.trimHistory(ruleId, keep);
  }

  /**
   * Overwrite one parameter with the result's optimized value
   *
   * Returns false, leaving the rule untouched, when the result belongs to
   * another rule or names a parameter the rule has no numeric value for.
   *
   * @throws RuleNotFoundError when the rule is not registered
   */
  applyOptimization(ruleId: string, result: OptimizationResult): boolean {
    const rule = this.registry.require(ruleId, 'apply optimization');

    if (result.ruleId !== ruleId) {
      RuleEngineLogger.optimizationRejected(ruleId, `result belongs to rule "${result.ruleId}"`);
      return false;
    }

    const currentValue = rule.parameters[result.parameterName];
    if (typeof currentValue !== 'number') {
      const error = new InvalidParameterError(ruleId, result.parameterName);
      RuleEngineLogger.optimizationRejected(ruleId, error.message);
      return false;
    }

    rule.parameters = { ...rule.parameters, [result.parameterName]: result.optimizedValue };
    RuleEngineLogger.optimizationApplied(ruleId, result.parameterName, currentValue, result.optimizedValue);
    return true;
  }

  /**
   * Serialize a rule's optimization history ('table' = CSV, 'document' = JSON)
   */
  exportOptimizationHistory(ruleId: string, format: HistoryExportFormat): string {
    return exportHistory(ruleId, this.optimizer.getOptimizationHistory(ruleId), format);
  }

  /**
   * Replace a rule's optimization history with an exported one
   *
   * @throws HistoryImportError when the content is malformed or belongs to another rule
   */
  async importOptimizationHistory(
    ruleId: string,
    content: string,
    format: HistoryExportFormat
  ): Promise<OptimizationResult[]> {
    const optimizations = importHistory(ruleId, content, format);
    await this.optimizer.replaceHistory(ruleId, optimizations);
    return this.optimizer.getOptimizationHistory(ruleId);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private selectRules(categories?: readonly (RuleCategory | string)[]): ValidationRule<TInput>[] {
    if (categories === undefined) {
      return this.registry.getAll();
    }

    const selected = new Set<RuleCategory>();
    for (const category of categories) {
      if (!isRuleCategory(category)) {
        throw new InvalidCategoryError(category);
      }
      selected.add(category);
    }
    return this.registry.getAll().filter((rule) => selected.has(rule.category));
  }

  private async runCheck(rule: ValidationRule<TInput>, input: TInput): Promise<RuleCheckResult> {
    const outcome = await rule.check(input, rule);
    return typeof outcome === 'boolean' ? { passed: outcome } : outcome;
  }

  private async executeRule(rule: ValidationRule<TInput>, input: TInput): Promise<RuleValidationResult> {
    try {
      const outcome = await this.runCheck(rule, input);
      return {
        ruleId: rule.id,
        ruleName: rule.name,
        category: rule.category,
        passed: outcome.passed,
        severity: outcome.severity ?? rule.severity,
        message: outcome.message ?? `${rule.name} ${outcome.passed ? 'passed' : 'failed'}`,
      };
    } catch (cause) {
      const error = new ValidationExecutionError(rule.id, cause);
      RuleEngineLogger.error(error.message, cause);
      return {
        ruleId: rule.id,
        ruleName: rule.name,
        category: rule.category,
        passed: false,
        severity: RuleSeverity.ERROR,
        message: error.message,
        error,
      };
    }
  }

  private snapshotFor(rule: ValidationRule<TInput>): RuleEffectiveness {
    return this.tracker.getRuleEffectiveness(rule.id) ?? createEmptyEffectiveness(rule);
  }

  private improvementsFor(rule: ValidationRule<TInput>): RuleImprovement[] {
    return this.improvementGenerator.generateImprovements(this.snapshotFor(rule), rule, {
      knownRuleIds: this.registry.getIds(),
    });
  }
}

export interface CreateValidationManagerOptions extends RecordStoreOptions {
  metricsSink?: MetricsSink;
  policy?: Partial<EffectivenessPolicy>;
  thresholds?: Partial<ImprovementThresholds>;
  maxGridSteps?: number;
  historyLimit?: number;
}

/**
 * Create a manager whose tracker and optimizer persist to the configured backend
 *
 * Call initialize() before use to load persisted state.
 */
export function createValidationManager<TInput = unknown>(
  options: CreateValidationManagerOptions = {}
): ValidationManager<TInput> {
  const storeOptions: RecordStoreOptions = { backend: options.backend, dataDir: options.dataDir };

  return new ValidationManager<TInput>({
    tracker: new RuleEffectivenessTracker({
      store: createRecordStore('effectiveness', ruleEffectivenessSchema, storeOptions),
      metricsSink: options.metricsSink,
      policy: options.policy,
    }),
    optimizer: new RuleParameterOptimizer({
      store: createRecordStore('optimization-history', optimizationHistoryRecordSchema, storeOptions),
      maxGridSteps: options.maxGridSteps,
    }),
    improvementGenerator: new RuleImprovementGenerator({ thresholds: options.thresholds }),
    historyLimit: options.historyLimit,
  });
}
