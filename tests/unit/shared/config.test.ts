/**
 * Unit tests for environment configuration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('unit: Config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    delete process.env.RULE_ENGINE_BACKEND;
    delete process.env.RULE_ENGINE_DATA_DIR;
    delete process.env.LOG_LEVEL;
    delete process.env.OPTIMIZER_MAX_GRID_STEPS;
    delete process.env.OPTIMIZATION_HISTORY_LIMIT;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use defaults when nothing is set', async () => {
    const config = await import('../../../src/shared/config.js');

    expect(config.RULE_ENGINE_BACKEND).toBe('file');
    expect(config.OPTIMIZER_MAX_GRID_STEPS).toBe(200);
    expect(config.OPTIMIZATION_HISTORY_LIMIT).toBe(0);
    expect(config.LOG_LEVEL).toBe('INFO');
    expect(config.validateConfig()).toEqual({ valid: true, errors: [] });
  });

  it('should read values from the environment', async () => {
    process.env.RULE_ENGINE_BACKEND = 'memory';
    process.env.RULE_ENGINE_DATA_DIR = '/var/lib/rules';
    process.env.LOG_LEVEL = 'debug';
    process.env.OPTIMIZATION_HISTORY_LIMIT = '50';

    const config = await import('../../../src/shared/config.js');

    expect(config.RULE_ENGINE_BACKEND).toBe('memory');
    expect(config.RULE_ENGINE_DATA_DIR).toBe('/var/lib/rules');
    expect(config.LOG_LEVEL).toBe('DEBUG');
    expect(config.OPTIMIZATION_HISTORY_LIMIT).toBe(50);
    expect(config.validateConfig().valid).toBe(true);
  });

  it('should report an unknown backend and fall back to file', async () => {
    process.env.RULE_ENGINE_BACKEND = 'cloud';

    const config = await import('../../../src/shared/config.js');

    expect(config.RULE_ENGINE_BACKEND).toBe('file');
    expect(config.validateConfig()).toEqual({
      valid: false,
      errors: ["RULE_ENGINE_BACKEND must be 'file', 'memory', or 'disabled', got 'cloud'"],
    });
  });

  it('should report invalid optimizer limits', async () => {
    process.env.OPTIMIZER_MAX_GRID_STEPS = '0';
    process.env.OPTIMIZATION_HISTORY_LIMIT = 'many';

    const { validateConfig } = await import('../../../src/shared/config.js');

    expect(validateConfig().errors).toEqual([
      'OPTIMIZER_MAX_GRID_STEPS must be >= 1, got 0',
      'OPTIMIZATION_HISTORY_LIMIT must be >= 0, got NaN',
    ]);
  });
});
