/**
 * Improvement Patterns
 *
 * Ordered list of independent checks. Statistics patterns look only at the
 * effectiveness snapshot; rule patterns also need the rule definition.
 * New checks are added by appending to IMPROVEMENT_PATTERNS.
 */

import { getNumericParameters } from '../../shared/types/rule.js';
import { isInconsistent } from '../effectiveness/policy.js';
import { getParameterRange } from '../optimizer/parameter-ranges.js';
import {
  ImprovementPriority,
  type ImprovementFinding,
  type ImprovementPattern,
  type ImprovementThresholds,
} from './types.js';

// TUNABLE
export const DEFAULT_IMPROVEMENT_THRESHOLDS: Readonly<ImprovementThresholds> = Object.freeze({
  highFailureRate: 0.5,
  highSeverity: 3,
  highNegativeFeedbackRatio: 0.5,
  minValidations: 10,
  inconsistencyBand: 0.2,
  minFeedback: 5,
  minDescriptionLength: 20,
});

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

// ============================================================================
// Statistics Patterns
// ============================================================================

const highFailureRatePattern: ImprovementPattern = {
  id: 'high_failure_rate',
  title: 'High Failure Rate',
  priority: ImprovementPriority.HIGH,
  requiresRule: false,

  detect({ effectiveness, thresholds }) {
    const { totalValidations, failedValidations } = effectiveness;
    if (totalValidations === 0) return [];

    const failureRate = failedValidations / totalValidations;
    if (failureRate <= thresholds.highFailureRate) return [];

    return [
      {
        description: `Rule fails ${percent(failureRate)} of validations (failure rate above ${percent(thresholds.highFailureRate)})`,
        suggestions: [
          'Review the rule parameters; the limits may be stricter than typical designs need',
          'Check whether the rule applies to every board it is run against',
          'Run the parameter optimizer with the minimize_failures strategy',
        ],
        metrics: {
          failure_rate: failureRate,
          failed_validations: failedValidations,
          total_validations: totalValidations,
        },
      },
    ];
  },
};

const highSeverityPattern: ImprovementPattern = {
  id: 'high_severity',
  title: 'High Severity Failures',
  priority: ImprovementPriority.HIGH,
  requiresRule: false,

  detect({ effectiveness, thresholds }) {
    if (effectiveness.failedValidations === 0) return [];
    if (effectiveness.averageSeverity < thresholds.highSeverity) return [];

    return [
      {
        description: `Failures average severity ${effectiveness.averageSeverity.toFixed(2)} (error level or above)`,
        suggestions: [
          'Confirm that every failure really blocks the design',
          'Split the rule into a blocking check and an advisory check',
          'Run the parameter optimizer with the balance_severity strategy',
        ],
        metrics: {
          average_severity: effectiveness.averageSeverity,
          failed_validations: effectiveness.failedValidations,
        },
      },
    ];
  },
};

const highNegativeFeedbackPattern: ImprovementPattern = {
  id: 'high_negative_feedback',
  title: 'High Negative Feedback',
  priority: ImprovementPriority.HIGH,
  requiresRule: false,

  detect({ effectiveness, thresholds }) {
    const { feedbackCount, negativeFeedback } = effectiveness;
    if (feedbackCount === 0) return [];

    const negativeRate = negativeFeedback / feedbackCount;
    if (negativeRate <= thresholds.highNegativeFeedbackRatio) return [];

    return [
      {
        description: `Users rated ${percent(negativeRate)} of this rule's results as unhelpful (negative feedback)`,
        suggestions: [
          'Read the feedback comments to find the false positives',
          'Improve the failure message so the fix is obvious',
          'Run the parameter optimizer with the optimize_feedback strategy',
        ],
        metrics: {
          negative_feedback_rate: negativeRate,
          negative_feedback: negativeFeedback,
          feedback_count: feedbackCount,
        },
      },
    ];
  },
};

const inconsistentResultsPattern: ImprovementPattern = {
  id: 'inconsistent_results',
  title: 'Inconsistent Results',
  priority: ImprovementPriority.MEDIUM,
  requiresRule: false,

  detect({ effectiveness, thresholds }) {
    const { totalValidations, passedValidations, failedValidations } = effectiveness;
    if (totalValidations < thresholds.minValidations) return [];
    if (!isInconsistent(passedValidations, failedValidations, thresholds.inconsistencyBand)) return [];

    return [
      {
        description: `Pass and fail counts are nearly balanced (${passedValidations} passed, ${failedValidations} failed); results look inconsistent`,
        suggestions: [
          'Check whether the rule depends on input the boards do not always provide',
          'Narrow the rule to the board types where it is meaningful',
        ],
        metrics: {
          pass_rate: passedValidations / totalValidations,
          failure_rate: failedValidations / totalValidations,
          total_validations: totalValidations,
        },
      },
    ];
  },
};

const lowFeedbackPattern: ImprovementPattern = {
  id: 'low_feedback',
  title: 'Low User Feedback',
  priority: ImprovementPriority.MEDIUM,
  requiresRule: false,

  detect({ effectiveness, thresholds }) {
    const { totalValidations, feedbackCount } = effectiveness;
    if (totalValidations < thresholds.minValidations) return [];
    if (feedbackCount >= thresholds.minFeedback) return [];

    return [
      {
        description: `Only ${feedbackCount} feedback entries after ${totalValidations} validations; not enough feedback to judge the rule`,
        suggestions: [
          'Ask users to rate the results of this rule',
          'Show a feedback prompt next to the rule message',
        ],
        metrics: {
          feedback_count: feedbackCount,
          total_validations: totalValidations,
        },
      },
    ];
  },
};

// ============================================================================
// Rule Patterns
// ============================================================================

const extremeParameterPattern: ImprovementPattern = {
  id: 'extreme_parameter',
  title: 'Extreme Parameter Value',
  priority: ImprovementPriority.MEDIUM,
  requiresRule: true,

  detect({ rule }) {
    if (!rule) return [];

    const findings: ImprovementFinding[] = [];
    for (const [name, value] of getNumericParameters(rule)) {
      const range = getParameterRange(name, value);
      if (!range) continue;
      if (value > range.minValue && value < range.maxValue) continue;

      findings.push({
        description: `Parameter '${name}' = ${value} sits at the edge of its search range [${range.minValue}, ${range.maxValue}]`,
        suggestions: [
          `Check that '${name}' is set in the intended unit`,
          `Pick a non-zero starting value for '${name}' so the optimizer can search around it`,
        ],
        metrics: {
          value,
          range_min: range.minValue,
          range_max: range.maxValue,
        },
      });
    }
    return findings;
  },
};

const missingDependenciesPattern: ImprovementPattern = {
  id: 'missing_dependencies',
  title: 'Missing Dependencies',
  priority: ImprovementPriority.MEDIUM,
  requiresRule: true,

  detect({ rule, knownRuleIds }) {
    if (!rule || !knownRuleIds) return [];

    const missing = rule.dependencies.filter((id) => !knownRuleIds.has(id));
    if (missing.length === 0) return [];

    return [
      {
        description: `Declared dependencies are not registered: ${missing.join(', ')}`,
        suggestions: [
          'Register the missing rules before this one',
          'Remove dependencies that are no longer needed',
        ],
        metrics: {
          missing_dependencies: missing.length,
          declared_dependencies: rule.dependencies.length,
        },
      },
    ];
  },
};

const minimalDocumentationPattern: ImprovementPattern = {
  id: 'minimal_documentation',
  title: 'Minimal Documentation',
  priority: ImprovementPriority.LOW,
  requiresRule: true,

  detect({ rule, thresholds }) {
    if (!rule) return [];

    const length = rule.description.trim().length;
    if (length >= thresholds.minDescriptionLength) return [];

    return [
      {
        description: `Description has ${length} characters; users cannot tell what the rule checks`,
        suggestions: [
          'Describe what the rule checks and why it matters',
          'Document each parameter and its unit',
        ],
        metrics: {
          description_length: length,
          min_description_length: thresholds.minDescriptionLength,
        },
      },
    ];
  },
};

export const IMPROVEMENT_PATTERNS: readonly ImprovementPattern[] = [
  highFailureRatePattern,
  highSeverityPattern,
  highNegativeFeedbackPattern,
  inconsistentResultsPattern,
  lowFeedbackPattern,
  extremeParameterPattern,
  missingDependenciesPattern,
  minimalDocumentationPattern,
];
