/**
 * Rule Engine Error Types
 *
 * Registry, feedback and import errors are thrown to the caller.
 * Rule execution failures are wrapped in ValidationExecutionError and reported
 * as a failed ERROR result instead of being thrown.
 */

/**
 * Thrown when registering a rule whose id is already registered
 */
export class DuplicateRuleError extends Error {
  constructor(public readonly ruleId: string) {
    super(`Rule '${ruleId}' is already registered`);
    this.name = 'DuplicateRuleError';
  }
}

/**
 * Thrown when removing a rule that other registered rules depend on
 */
export class DependencyError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly dependents: string[]
  ) {
    super(`Rule '${ruleId}' is still required by: ${dependents.join(', ')}`);
    this.name = 'DependencyError';
  }
}

/**
 * Thrown when an operation references a rule id that is not known
 */
export class RuleNotFoundError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly context: string
  ) {
    super(`Rule '${ruleId}' not found (${context})`);
    this.name = 'RuleNotFoundError';
  }
}

/**
 * Raised when an optimization names a parameter the rule does not have
 * (or one that is not numeric). applyOptimization logs it and returns false.
 */
export class InvalidParameterError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly parameterName: string
  ) {
    super(`Rule '${ruleId}' has no numeric parameter '${parameterName}'`);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Wraps an exception thrown by a rule's check during validate()
 */
export class ValidationExecutionError extends Error {
  constructor(
    public readonly ruleId: string,
    public readonly cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Rule '${ruleId}' failed to execute: ${reason}`);
    this.name = 'ValidationExecutionError';
  }
}

/**
 * Thrown when validate() is asked for a category that does not exist
 */
export class InvalidCategoryError extends Error {
  constructor(public readonly category: string) {
    super(`Unknown rule category '${category}'`);
    this.name = 'InvalidCategoryError';
  }
}

/**
 * Thrown when an optimization history export cannot be imported
 */
export class HistoryImportError extends Error {
  constructor(public readonly reason: string) {
    super(`Cannot import optimization history: ${reason}`);
    this.name = 'HistoryImportError';
  }
}
