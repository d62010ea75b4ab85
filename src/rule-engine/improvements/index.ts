/**
 * Improvement suggestions for underperforming rules
 */

export {
  ImprovementPriority,
  type RuleImprovement,
  type ImprovementThresholds,
  type ImprovableRule,
  type ImprovementContext,
  type ImprovementFinding,
  type ImprovementPattern,
  type GenerateImprovementsOptions,
} from './types.js';

export { DEFAULT_IMPROVEMENT_THRESHOLDS, IMPROVEMENT_PATTERNS } from './improvement-patterns.js';

export {
  RuleImprovementGenerator,
  createImprovementGenerator,
  type ImprovementGeneratorOptions,
} from './improvement-generator.js';
