/**
 * Validation Rule Model
 *
 * A rule is a named, parameterized design check with a category and severity.
 * Rules are authored by callers, registered with the ValidationManager, and
 * mutated afterwards only through the manager (updateRule / applyOptimization).
 */

/**
 * Rule categories (used for category-scoped validation and reporting)
 */
export enum RuleCategory {
  DESIGN = 'design',
  SAFETY = 'safety',
  MANUFACTURING = 'manufacturing',
  POWER = 'power',
  AUDIO = 'audio',
  GROUND = 'ground',
  SIGNAL = 'signal',
  ROUTING = 'routing',
  COMPONENT_PLACEMENT = 'component_placement',
}

/**
 * Rule severity levels
 */
export enum RuleSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

/**
 * Numeric encoding of severities, used for averageSeverity
 */
export const SEVERITY_WEIGHT: Record<RuleSeverity, number> = {
  [RuleSeverity.INFO]: 1,
  [RuleSeverity.WARNING]: 2,
  [RuleSeverity.ERROR]: 3,
  [RuleSeverity.CRITICAL]: 4,
};

export const MAX_SEVERITY_WEIGHT = SEVERITY_WEIGHT[RuleSeverity.CRITICAL];

/**
 * Whether a severity blocks a validation run (ERROR and above)
 */
export function isBlockingSeverity(severity: RuleSeverity): boolean {
  return SEVERITY_WEIGHT[severity] >= SEVERITY_WEIGHT[RuleSeverity.ERROR];
}

export function isRuleCategory(value: unknown): value is RuleCategory {
  return Object.values(RuleCategory).some((category) => category === value);
}

/**
 * Parameter values a rule can carry. Only numbers take part in optimization.
 */
export type RuleParameterValue = number | string | boolean;

export type RuleParameters = Record<string, RuleParameterValue>;

/**
 * Detailed outcome of a rule check
 */
export interface RuleCheckResult {
  passed: boolean;
  message?: string;
  /** Overrides the rule's severity for this failure */
  severity?: RuleSeverity;
}

export type RuleCheckOutcome = boolean | RuleCheckResult;

/**
 * Check function executed against arbitrary structured input
 */
export type RuleCheck<TInput = unknown> = (
  input: TInput,
  rule: ValidationRule<TInput>
) => RuleCheckOutcome | Promise<RuleCheckOutcome>;

/**
 * Self-test case carried by a rule
 */
export interface RuleTestCase<TInput = unknown> {
  name: string;
  description?: string;
  input: TInput;
  expectedResult: boolean;
}

/**
 * Registered validation rule
 */
export interface ValidationRule<TInput = unknown> {
  id: string;
  name: string;
  description: string;
  category: RuleCategory;
  severity: RuleSeverity;
  parameters: RuleParameters;
  /** Ids of rules this rule builds on */
  dependencies: string[];
  enabled: boolean;
  check: RuleCheck<TInput>;
  testCases: RuleTestCase<TInput>[];
}

/**
 * Rule definition as written by a rule author (defaults filled by createValidationRule)
 */
export interface ValidationRuleDefinition<TInput = unknown> {
  id: string;
  name: string;
  description?: string;
  category: RuleCategory;
  severity?: RuleSeverity;
  parameters?: RuleParameters;
  dependencies?: Iterable<string>;
  enabled?: boolean;
  check: RuleCheck<TInput>;
  testCases?: RuleTestCase<TInput>[];
}

/**
 * Fields that may be changed after registration
 */
export type ValidationRulePatch<TInput = unknown> = Partial<
  Omit<ValidationRule<TInput>, 'id' | 'dependencies'>
> & {
  dependencies?: Iterable<string>;
};

/**
 * Create a rule with defaults applied
 *
 * Dependencies are de-duplicated (they form a set) and a rule may not depend on itself.
 *
 * @example
 * const rule = createValidationRule({
 *   id: 'min-trace-width',
 *   name: 'Minimum Trace Width',
 *   category: RuleCategory.MANUFACTURING,
 *   parameters: { min_width: 0.2 },
 *   check: (board: { traceWidth: number }, r) => board.traceWidth >= Number(r.parameters.min_width),
 * });
 */
export function createValidationRule<TInput = unknown>(
  definition: ValidationRuleDefinition<TInput>
): ValidationRule<TInput> {
  if (!definition.id.trim()) {
    throw new Error('Rule id must not be empty');
  }

  return {
    id: definition.id,
    name: definition.name,
    description: definition.description ?? '',
    category: definition.category,
    severity: definition.severity ?? RuleSeverity.WARNING,
    parameters: { ...(definition.parameters ?? {}) },
    dependencies: normalizeDependencies(definition.id, definition.dependencies ?? []),
    enabled: definition.enabled ?? true,
    check: definition.check,
    testCases: [...(definition.testCases ?? [])],
  };
}

/**
 * De-duplicate dependency ids, preserving declaration order
 */
export function normalizeDependencies(ruleId: string, dependencies: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const dependency of dependencies) {
    if (dependency === ruleId) {
      throw new Error(`Rule '${ruleId}' cannot depend on itself`);
    }
    unique.add(dependency);
  }
  return Array.from(unique);
}

/**
 * Numeric parameters only (non-finite numbers excluded)
 */
export function getNumericParameters(rule: Pick<ValidationRule, 'parameters'>): Array<[string, number]> {
  const numeric: Array<[string, number]> = [];
  for (const [name, value] of Object.entries(rule.parameters)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      numeric.push([name, value]);
    }
  }
  return numeric;
}
