/**
 * Parameter Range Table
 *
 * Maps a parameter NAME pattern to a search window relative to the current
 * value. Ordered: the first matching entry wins. Parameters matching no entry
 * are not optimized.
 *
 * | pattern     | min          | max          | step          |
 * |-------------|--------------|--------------|---------------|
 * | threshold   | 0.5x current | 1.5x current | 0.1x current  |
 * | min_*       | 0            | 2x current   | 0.1x current  |
 * | max_*       | 0.5x current | 2x current   | 0.1x current  |
 * | tolerance   | 0            | 2x current   | 0.05x current |
 *
 * relaxDirection says which way the parameter loosens the rule: +1 when a
 * larger value lets more designs pass, -1 when a smaller one does.
 */

import type { ParameterRange } from './types.js';

export interface ParameterRangeRule {
  id: string;
  matches: (name: string) => boolean;
  minFactor: number;
  maxFactor: number;
  stepFactor: number;
  relaxDirection: 1 | -1;
}

export const PARAMETER_RANGE_RULES: readonly ParameterRangeRule[] = [
  {
    id: 'threshold',
    matches: (name) => name === 'threshold' || name.endsWith('_threshold'),
    minFactor: 0.5,
    maxFactor: 1.5,
    stepFactor: 0.1,
    relaxDirection: 1,
  },
  {
    id: 'min',
    matches: (name) => name.startsWith('min_'),
    minFactor: 0,
    maxFactor: 2,
    stepFactor: 0.1,
    relaxDirection: -1,
  },
  {
    id: 'max',
    matches: (name) => name.startsWith('max_'),
    minFactor: 0.5,
    maxFactor: 2,
    stepFactor: 0.1,
    relaxDirection: 1,
  },
  {
    id: 'tolerance',
    matches: (name) => name === 'tolerance' || name.endsWith('_tolerance'),
    minFactor: 0,
    maxFactor: 2,
    stepFactor: 0.05,
    relaxDirection: 1,
  },
];

export function findParameterRangeRule(
  name: string,
  rules: readonly ParameterRangeRule[] = PARAMETER_RANGE_RULES
): ParameterRangeRule | null {
  return rules.find((rule) => rule.matches(name)) ?? null;
}

/**
 * Search window for a parameter, or null when its name is not recognized
 *
 * Negative values produce a mirrored window (bounds swapped, step positive).
 * A zero value yields a zero-width window with step 0, which the grid skips.
 */
export function getParameterRange(
  name: string,
  currentValue: number,
  rules: readonly ParameterRangeRule[] = PARAMETER_RANGE_RULES
): ParameterRange | null {
  const rule = findParameterRangeRule(name, rules);
  if (!rule || !Number.isFinite(currentValue)) return null;

  const a = currentValue * rule.minFactor;
  const b = currentValue * rule.maxFactor;

  return {
    name,
    minValue: Math.min(a, b),
    maxValue: Math.max(a, b),
    step: Math.abs(currentValue * rule.stepFactor),
    currentValue,
  };
}

/**
 * Candidate values from minValue to maxValue in step increments
 *
 * Returns [] for a non-positive or non-finite step. When the window holds more
 * than maxSteps increments the step is widened so the grid still spans it.
 */
export function gridValues(range: ParameterRange, maxSteps: number): number[] {
  if (!Number.isFinite(range.step) || range.step <= 0 || maxSteps < 1) return [];

  const span = range.maxValue - range.minValue;
  let step = range.step;
  let steps = Math.floor(span / step + 1e-9);
  if (steps > maxSteps) {
    steps = maxSteps;
    step = span / maxSteps;
  }

  const values: number[] = [];
  for (let i = 0; i <= steps; i++) {
    values.push(roundValue(range.minValue + i * step));
  }
  return values;
}

/**
 * Strip floating-point noise from grid arithmetic (0.25 + 0.05 => 0.3)
 */
export function roundValue(value: number): number {
  return Number(value.toPrecision(12));
}
