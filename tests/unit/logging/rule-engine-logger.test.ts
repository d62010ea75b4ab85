/**
 * Rule Engine Logger Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RuleEngineLogger } from '../../../src/rule-engine/rule-engine-logger.js';
import { LOG_PATH } from '../../../src/shared/config.js';
import { createTempDir, removeTempDir } from '../../setup.js';

const TIME = '\\[\\d{2}:\\d{2}:\\d{2}\\]';

describe('RuleEngineLogger', () => {
  let dir: string;
  let logFile: string;

  beforeEach(async () => {
    dir = await createTempDir('rule-engine-log-');
    logFile = path.join(dir, 'rule-engine.log');
    RuleEngineLogger.setLogPath(logFile);
    RuleEngineLogger.setEnabled(true);
  });

  afterEach(async () => {
    RuleEngineLogger.setEnabled(false);
    RuleEngineLogger.setLogPath(LOG_PATH);
    await removeTempDir(dir);
  });

  async function readLines(): Promise<string[]> {
    const content = await fs.readFile(logFile, 'utf-8');
    return content.trimEnd().split('\n');
  }

  it('writes a timestamped line per event', async () => {
    RuleEngineLogger.optimizationApplied('r1', 'threshold', 1000, 1500);

    const [line] = await readLines();
    expect(line).toMatch(new RegExp(`^${TIME} \\[RuleEngine:OPTIMIZE\\] ✏️ APPLIED rule="r1" threshold: 1000 → 1500$`));
  });

  it('logs the cause of an error on its own line', async () => {
    RuleEngineLogger.error('Failed to persist effectiveness for rule "r1"', new Error('disk full'));

    const lines = await readLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[RuleEngine:ERROR\] ⚠️ Failed to persist effectiveness for rule "r1"$/);
    expect(lines[1]).toMatch(/\[RuleEngine:ERROR\]    disk full$/);
  });

  it('truncates feedback text', async () => {
    RuleEngineLogger.feedbackReceived('r2', false, 'x'.repeat(100));

    const [line] = await readLines();
    expect(line).toMatch(new RegExp(`👎 negative rule="r2" text="${'x'.repeat(80)}"$`));
  });

  it('reports an unwritable log file once on stderr instead of throwing', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      // A directory cannot be appended to
      RuleEngineLogger.setLogPath(dir);

      expect(() => RuleEngineLogger.error('first', new Error('disk full'))).not.toThrow();
      expect(() => RuleEngineLogger.optimizationApplied('r1', 'threshold', 1000, 1500)).not.toThrow();

      expect(stderr).toHaveBeenCalledTimes(1);
      expect(stderr.mock.calls[0]?.[0]).toContain(`cannot write log file ${dir}`);

      RuleEngineLogger.setLogPath(logFile);
      RuleEngineLogger.optimizationApplied('r1', 'threshold', 1000, 1500);
      expect(stderr).toHaveBeenCalledTimes(1);
    } finally {
      stderr.mockRestore();
    }
  });

  it('writes nothing while disabled', async () => {
    RuleEngineLogger.setEnabled(false);
    RuleEngineLogger.optimizationRejected('r1', 'result belongs to rule "r2"');

    await expect(fs.access(logFile)).rejects.toThrow();
  });
});
