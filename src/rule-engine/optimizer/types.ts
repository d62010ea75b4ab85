/**
 * Rule Parameter Optimization - Core Types
 */

// ============================================================================
// Strategies
// ============================================================================

/**
 * Scoring objective used when searching a rule's parameter space
 */
export enum OptimizationStrategy {
  MINIMIZE_FAILURES = 'minimize_failures',
  MAXIMIZE_PASS_RATE = 'maximize_pass_rate',
  BALANCE_SEVERITY = 'balance_severity',
  OPTIMIZE_FEEDBACK = 'optimize_feedback',
}

// ============================================================================
// Search Space
// ============================================================================

/**
 * Heuristic search window derived from a parameter's name and current value
 */
export interface ParameterRange {
  name: string;
  minValue: number;
  maxValue: number;
  step: number;
  currentValue: number;
}

/**
 * Metrics every optimization result carries (snake_case: these keys end up in reports)
 */
export interface ParameterMetrics {
  failure_rate: number;
  pass_rate: number;
  average_severity: number;
  feedback_score: number;
}

// ============================================================================
// Results
// ============================================================================

export interface OptimizationResult {
  ruleId: string;
  parameterName: string;
  originalValue: number;
  optimizedValue: number;
  /** Score delta against the current value under `strategy` (always > 0 when reported) */
  improvement: number;
  strategy: OptimizationStrategy;
  metrics: Record<string, number>;
  createdAt: Date;
}

/**
 * Persisted optimization history of one rule
 */
export interface OptimizationHistoryRecord {
  ruleId: string;
  optimizations: OptimizationResult[];
}

export interface OptimizationSummary {
  totalOptimizations: number;
  averageImprovement: number;
  bestImprovement: number;
  /** Distinct parameter names, in first-seen order */
  optimizedParameters: string[];
}
