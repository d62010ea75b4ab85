/**
 * Rule Engine Logger
 *
 * Centralized logging for rule validation, feedback and optimization.
 * Appends timestamped lines to LOG_PATH.
 */

import * as fs from 'fs';
import { LOG_PATH, SUPPRESS_TEST_LOGS, LOG_LEVEL } from '../shared/config.js';

/**
 * Log levels for rule engine operations
 */
export enum RuleEngineLogLevel {
  INFO = 'INFO',
  DEBUG = 'DEBUG',
  TRACK = 'TRACK',
  FEEDBACK = 'FEEDBACK',
  OPTIMIZE = 'OPTIMIZE',
  STORE = 'STORE',
  ERROR = 'ERROR',
}

/**
 * Rule engine logger utility
 */
export class RuleEngineLogger {
  private static enabled = true;
  private static logPath = LOG_PATH;
  private static writeFailureReported = false;

  /**
   * Log a message with timestamp and category
   */
  private static log(level: RuleEngineLogLevel, message: string): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const logMsg = `[${timestamp}] [RuleEngine:${level}] ${message}`;

    try {
      fs.appendFileSync(this.logPath, logMsg + '\n');
    } catch (error) {
      // Logging never fails the caller; report the first failure on stderr
      if (!this.writeFailureReported) {
        this.writeFailureReported = true;
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[RuleEngine] cannot write log file ${this.logPath}: ${reason}`);
      }
    }
  }

  /**
   * Log rule registration
   */
  static ruleRegistered(ruleId: string, category: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(RuleEngineLogLevel.INFO, `➕ RULE registered "${ruleId}" [${category}]`);
  }

  /**
   * Log rule removal
   */
  static ruleRemoved(ruleId: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(RuleEngineLogLevel.INFO, `➖ RULE removed "${ruleId}"`);
  }

  /**
   * Log a single tracked validation outcome
   */
  static validationTracked(ruleId: string, passed: boolean, status: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    const outcome = passed ? '✅ PASS' : '❌ FAIL';
    this.log(RuleEngineLogLevel.TRACK, `${outcome} rule="${ruleId}" status=${status}`);
  }

  /**
   * Log a validation run summary
   */
  static validationRun(
    ruleCount: number,
    errorCount: number,
    warningCount: number,
    executionFailures: number
  ): void {
    this.log(
      RuleEngineLogLevel.TRACK,
      `📋 VALIDATION ${ruleCount} rules: ${errorCount} errors, ${warningCount} warnings, ${executionFailures} execution failures`
    );
  }

  /**
   * Log user feedback
   */
  static feedbackReceived(ruleId: string, isPositive: boolean, feedbackText?: string): void {
    const verdict = isPositive ? '👍 positive' : '👎 negative';
    const text = feedbackText ? ` text="${feedbackText.substring(0, 80)}"` : '';
    this.log(RuleEngineLogLevel.FEEDBACK, `${verdict} rule="${ruleId}"${text}`);
  }

  /**
   * Log status transition
   */
  static statusChanged(ruleId: string, from: string, to: string): void {
    this.log(RuleEngineLogLevel.TRACK, `🔄 STATUS rule="${ruleId}" ${from} → ${to}`);
  }

  /**
   * Log optimization run
   */
  static optimizationRun(ruleId: string, strategy: string, resultCount: number, bestImprovement: number): void {
    this.log(
      RuleEngineLogLevel.OPTIMIZE,
      `🔍 OPTIMIZE rule="${ruleId}" strategy=${strategy} candidates=${resultCount} best=${bestImprovement.toFixed(4)}`
    );
  }

  /**
   * Log applied or rejected optimization
   */
  static optimizationApplied(ruleId: string, parameterName: string, from: number, to: number): void {
    this.log(
      RuleEngineLogLevel.OPTIMIZE,
      `✏️ APPLIED rule="${ruleId}" ${parameterName}: ${from} → ${to}`
    );
  }

  static optimizationRejected(ruleId: string, reason: string): void {
    this.log(RuleEngineLogLevel.OPTIMIZE, `⛔ REJECTED rule="${ruleId}" ${reason}`);
  }

  /**
   * Log store activity
   */
  static storeLoaded(namespace: string, count: number, backend: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(RuleEngineLogLevel.STORE, `📂 LOADED ${count} records [${backend}] namespace="${namespace}"`);
  }

  static storeCleared(namespace: string, backend: string): void {
    this.log(RuleEngineLogLevel.STORE, `🧹 CLEARED [${backend}] namespace="${namespace}"`);
  }

  /**
   * Log error
   */
  static error(message: string, error?: unknown): void {
    this.log(RuleEngineLogLevel.ERROR, `⚠️ ${message}`);
    if (error instanceof Error) {
      this.log(RuleEngineLogLevel.ERROR, `   ${error.message}`);
    } else if (error !== undefined) {
      this.log(RuleEngineLogLevel.ERROR, `   ${String(error)}`);
    }
  }

  /**
   * Log info message
   */
  static info(message: string): void {
    if (SUPPRESS_TEST_LOGS) return;
    this.log(RuleEngineLogLevel.INFO, message);
  }

  /**
   * Log debug message
   */
  static debug(message: string): void {
    if (LOG_LEVEL !== 'DEBUG') return;
    this.log(RuleEngineLogLevel.DEBUG, message);
  }

  /**
   * Enable/disable logging
   */
  static setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * Redirect output (defaults to LOG_PATH)
   */
  static setLogPath(logPath: string): void {
    this.logPath = logPath;
    this.writeFailureReported = false;
  }
}
