/**
 * Metrics Sinks
 *
 * The tracker pushes a snapshot after every tracked validation.
 */

import type { MetricsSink, RuleMetricsSnapshot } from './types.js';

/**
 * Aggregated rule metrics as seen by a sink
 */
export interface AggregatedRuleMetrics {
  totalValidations: number;
  passedValidations: number;
  failedValidations: number;
  rules: number;
}

/**
 * Keeps the latest snapshot per rule and aggregates across rules
 */
export class InMemoryMetricsSink implements MetricsSink {
  private latest: Map<string, RuleMetricsSnapshot> = new Map();

  reportRuleEffectiveness(snapshot: RuleMetricsSnapshot): void {
    this.latest.set(snapshot.ruleId, { ...snapshot, timestamp: new Date(snapshot.timestamp) });
  }

  getRuleSnapshot(ruleId: string): RuleMetricsSnapshot | null {
    return this.latest.get(ruleId) ?? null;
  }

  getAggregatedMetrics(): AggregatedRuleMetrics {
    const aggregate: AggregatedRuleMetrics = {
      totalValidations: 0,
      passedValidations: 0,
      failedValidations: 0,
      rules: this.latest.size,
    };

    for (const snapshot of this.latest.values()) {
      aggregate.totalValidations += snapshot.totalValidations;
      aggregate.passedValidations += snapshot.passedValidations;
      aggregate.failedValidations += snapshot.failedValidations;
    }

    return aggregate;
  }

  clear(): void {
    this.latest.clear();
  }
}

/**
 * Drops every snapshot
 */
export class NullMetricsSink implements MetricsSink {
  reportRuleEffectiveness(_snapshot: RuleMetricsSnapshot): void {
    // no-op
  }
}
