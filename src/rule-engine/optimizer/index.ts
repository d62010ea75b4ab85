/**
 * Rule parameter optimization
 */

export {
  OptimizationStrategy,
  type ParameterRange,
  type ParameterMetrics,
  type OptimizationResult,
  type OptimizationHistoryRecord,
  type OptimizationSummary,
} from './types.js';

export {
  PARAMETER_RANGE_RULES,
  findParameterRangeRule,
  getParameterRange,
  gridValues,
  roundValue,
  type ParameterRangeRule,
} from './parameter-ranges.js';

export {
  SCORING_WEIGHTS,
  buildScoringContext,
  projectOutcome,
  relaxation,
  scoreOutcome,
  toParameterMetrics,
  type ScoringContext,
  type ProjectedOutcome,
} from './parameter-scoring.js';

export { optimizationResultSchema, optimizationHistoryRecordSchema } from './schemas.js';

export {
  HISTORY_TABLE_COLUMNS,
  HISTORY_DOCUMENT_FORMAT,
  HISTORY_DOCUMENT_VERSION,
  exportHistory,
  importHistory,
  type HistoryExportFormat,
} from './history-export.js';

export {
  RuleParameterOptimizer,
  createRuleParameterOptimizer,
  type RuleParameterOptimizerOptions,
} from './rule-parameter-optimizer.js';
