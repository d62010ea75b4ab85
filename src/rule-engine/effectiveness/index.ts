/**
 * Effectiveness tracking: per-rule counters, status classification, metrics sinks
 */

export {
  EffectivenessStatus,
  type TrackedRule,
  type EffectivenessCounters,
  type RuleEffectiveness,
  type EffectivenessSummary,
  type RuleMetricsSnapshot,
  type MetricsSink,
} from './types.js';

export {
  DEFAULT_EFFECTIVENESS_POLICY,
  classifyEffectiveness,
  isInconsistent,
  resolvePolicy,
  type EffectivenessPolicy,
} from './policy.js';

export { KeyedMutex } from './keyed-mutex.js';
export { InMemoryMetricsSink, NullMetricsSink, type AggregatedRuleMetrics } from './metrics-sink.js';
export { ruleEffectivenessSchema } from './schemas.js';
export {
  RuleEffectivenessTracker,
  createEffectivenessTracker,
  createEmptyEffectiveness,
  type EffectivenessTrackerOptions,
} from './effectiveness-tracker.js';
