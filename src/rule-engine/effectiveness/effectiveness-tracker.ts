/**
 * Rule Effectiveness Tracker
 *
 * Consumes validation outcomes and user feedback per rule and derives a status.
 *
 * Every mutation of a rule's record (trackValidation / addFeedback) is one
 * read-modify-write-and-persist unit, serialized per rule id. Updates for
 * different rule ids never wait on each other.
 *
 * Persistence and metrics push are best-effort: failures are logged and the
 * in-memory record stays authoritative.
 */

import { RuleSeverity, SEVERITY_WEIGHT } from '../../shared/types/rule.js';
import { RuleNotFoundError } from '../errors.js';
import { RuleEngineLogger } from '../rule-engine-logger.js';
import type { RecordStore } from '../storage/types.js';
import { MemoryRecordStore } from '../storage/memory-store.js';
import { KeyedMutex } from './keyed-mutex.js';
import { NullMetricsSink } from './metrics-sink.js';
import { classifyEffectiveness, resolvePolicy, type EffectivenessPolicy } from './policy.js';
import {
  EffectivenessStatus,
  type EffectivenessSummary,
  type MetricsSink,
  type RuleEffectiveness,
  type TrackedRule,
} from './types.js';

export interface EffectivenessTrackerOptions {
  /** Durable store (defaults to an in-memory store) */
  store?: RecordStore<RuleEffectiveness>;
  /** Receives a snapshot after every tracked validation */
  metricsSink?: MetricsSink;
  /** Threshold overrides */
  policy?: Partial<EffectivenessPolicy>;
  /** Clock (tests) */
  now?: () => Date;
}

/**
 * Zeroed record for a rule that has never been tracked
 */
export function createEmptyEffectiveness(rule: TrackedRule, now: Date = new Date()): RuleEffectiveness {
  return {
    ruleId: rule.id,
    ruleName: rule.name,
    category: rule.category,
    totalValidations: 0,
    passedValidations: 0,
    failedValidations: 0,
    feedbackCount: 0,
    positiveFeedback: 0,
    negativeFeedback: 0,
    averageSeverity: 0,
    status: EffectivenessStatus.UNKNOWN,
    lastUpdated: now,
  };
}

function copyRecord(record: RuleEffectiveness): RuleEffectiveness {
  return { ...record, lastUpdated: new Date(record.lastUpdated) };
}

export class RuleEffectivenessTracker {
  private records: Map<string, RuleEffectiveness> = new Map();
  private readonly mutex = new KeyedMutex();
  private readonly store: RecordStore<RuleEffectiveness>;
  private readonly metricsSink: MetricsSink;
  private readonly policy: EffectivenessPolicy;
  private readonly now: () => Date;

  constructor(options: EffectivenessTrackerOptions = {}) {
    this.store = options.store ?? new MemoryRecordStore<RuleEffectiveness>('effectiveness');
    this.metricsSink = options.metricsSink ?? new NullMetricsSink();
    this.policy = resolvePolicy(options.policy);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted records
   *
   * Status is re-derived from the stored counters, so a stale stored status
   * can never disagree with the counts.
   */
  async initialize(): Promise<void> {
    const stored = await this.store.loadAll();
    this.records.clear();
    for (const [ruleId, record] of stored) {
      this.records.set(ruleId, {
        ...record,
        ruleId,
        status: classifyEffectiveness(record, this.policy),
      });
    }
  }

  /**
   * Record one validation outcome
   *
   * severity is folded into averageSeverity only when the validation failed.
   */
  async trackValidation(
    rule: TrackedRule,
    passed: boolean,
    severity: RuleSeverity = rule.severity
  ): Promise<RuleEffectiveness> {
    const updated = await this.mutex.runExclusive(rule.id, async () => {
      const current = this.records.get(rule.id) ?? createEmptyEffectiveness(rule, this.now());

      const failedValidations = current.failedValidations + (passed ? 0 : 1);
      const averageSeverity = passed
        ? current.averageSeverity
        : current.averageSeverity + (SEVERITY_WEIGHT[severity] - current.averageSeverity) / failedValidations;

      const next = this.commit(current, {
        ...current,
        ruleName: rule.name,
        category: rule.category,
        totalValidations: current.totalValidations + 1,
        passedValidations: current.passedValidations + (passed ? 1 : 0),
        failedValidations,
        averageSeverity,
      });

      RuleEngineLogger.validationTracked(rule.id, passed, next.status);
      await this.persist(next);
      return next;
    });

    await this.pushMetrics(updated);
    return copyRecord(updated);
  }

  /**
   * Record user feedback on a rule's firing
   *
   * Fails with RuleNotFoundError when the rule has never been tracked, unless
   * the rule itself is supplied so the record can be created lazily.
   */
  async addFeedback(ruleId: string, isPositive: boolean, rule?: TrackedRule): Promise<RuleEffectiveness> {
    const updated = await this.mutex.runExclusive(ruleId, async () => {
      let current = this.records.get(ruleId);
      if (!current) {
        if (!rule) {
          throw new RuleNotFoundError(ruleId, 'feedback for untracked rule');
        }
        current = createEmptyEffectiveness({ ...rule, id: ruleId }, this.now());
      }

      const next = this.commit(current, {
        ...current,
        feedbackCount: current.feedbackCount + 1,
        positiveFeedback: current.positiveFeedback + (isPositive ? 1 : 0),
        negativeFeedback: current.negativeFeedback + (isPositive ? 0 : 1),
      });

      await this.persist(next);
      return next;
    });

    return copyRecord(updated);
  }

  getRuleEffectiveness(ruleId: string): RuleEffectiveness | null {
    const record = this.records.get(ruleId);
    return record ? copyRecord(record) : null;
  }

  getAllEffectiveness(): RuleEffectiveness[] {
    return Array.from(this.records.values()).map(copyRecord);
  }

  getEffectiveRules(): RuleEffectiveness[] {
    return this.getByStatus(EffectivenessStatus.EFFECTIVE);
  }

  getIneffectiveRules(): RuleEffectiveness[] {
    return this.getByStatus(EffectivenessStatus.INEFFECTIVE);
  }

  getRulesNeedingImprovement(): RuleEffectiveness[] {
    return this.getByStatus(EffectivenessStatus.NEEDS_IMPROVEMENT);
  }

  getEffectivenessSummary(): EffectivenessSummary {
    const records = Array.from(this.records.values());
    const totalRules = records.length;
    const effectiveRules = records.filter((r) => r.status === EffectivenessStatus.EFFECTIVE).length;

    return {
      totalRules,
      effectiveRules,
      ineffectiveRules: records.filter((r) => r.status === EffectivenessStatus.INEFFECTIVE).length,
      rulesNeedingImprovement: records.filter((r) => r.status === EffectivenessStatus.NEEDS_IMPROVEMENT).length,
      effectivenessRate: totalRules > 0 ? effectiveRules / totalRules : 0,
    };
  }

  getPolicy(): EffectivenessPolicy {
    return { ...this.policy };
  }

  /**
   * Administrative reset: drop every record, in memory and in the store
   */
  async reset(): Promise<void> {
    this.records.clear();
    await this.store.clear();
  }

  private getByStatus(status: EffectivenessStatus): RuleEffectiveness[] {
    return Array.from(this.records.values())
      .filter((record) => record.status === status)
      .map(copyRecord);
  }

  /**
   * Recompute status from the new counters and store the record in memory
   */
  private commit(previous: RuleEffectiveness, candidate: RuleEffectiveness): RuleEffectiveness {
    const next: RuleEffectiveness = {
      ...candidate,
      status: classifyEffectiveness(candidate, this.policy),
      lastUpdated: this.now(),
    };

    if (next.status !== previous.status) {
      RuleEngineLogger.statusChanged(next.ruleId, previous.status, next.status);
    }

    this.records.set(next.ruleId, next);
    return next;
  }

  private async persist(record: RuleEffectiveness): Promise<void> {
    try {
      await this.store.save(record.ruleId, record);
    } catch (error) {
      RuleEngineLogger.error(`Failed to persist effectiveness for rule "${record.ruleId}"`, error);
    }
  }

  private async pushMetrics(record: RuleEffectiveness): Promise<void> {
    try {
      await this.metricsSink.reportRuleEffectiveness({
        ruleId: record.ruleId,
        totalValidations: record.totalValidations,
        passedValidations: record.passedValidations,
        failedValidations: record.failedValidations,
        averageSeverity: record.averageSeverity,
        status: record.status,
        timestamp: new Date(record.lastUpdated),
      });
    } catch (error) {
      RuleEngineLogger.error(`Failed to push metrics for rule "${record.ruleId}"`, error);
    }
  }
}

/**
 * Create a tracker with the given options
 */
export function createEffectivenessTracker(options: EffectivenessTrackerOptions = {}): RuleEffectivenessTracker {
  return new RuleEffectivenessTracker(options);
}
