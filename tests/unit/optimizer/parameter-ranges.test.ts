import { describe, it, expect } from 'vitest';
import {
  findParameterRangeRule,
  getParameterRange,
  gridValues,
  roundValue,
} from '../../../src/rule-engine/optimizer/parameter-ranges.js';

describe('getParameterRange', () => {
  it('maps threshold to 0.5x..1.5x in 0.1x steps', () => {
    expect(getParameterRange('threshold', 1000)).toEqual({
      name: 'threshold',
      minValue: 500,
      maxValue: 1500,
      step: 100,
      currentValue: 1000,
    });
  });

  it('maps min_* to 0..2x in 0.1x steps', () => {
    expect(getParameterRange('min_width', 100)).toMatchObject({ minValue: 0, maxValue: 200, step: 10 });
  });

  it('maps max_* to 0.5x..2x in 0.1x steps', () => {
    expect(getParameterRange('max_current', 2000)).toMatchObject({ minValue: 1000, maxValue: 4000, step: 200 });
  });

  it('maps tolerance to 0..2x in 0.05x steps', () => {
    expect(getParameterRange('tolerance', 100)).toMatchObject({ minValue: 0, maxValue: 200, step: 5 });
  });

  it('matches suffixed threshold and tolerance names', () => {
    expect(findParameterRangeRule('noise_threshold')?.id).toBe('threshold');
    expect(findParameterRangeRule('impedance_tolerance')?.id).toBe('tolerance');
  });

  it('returns null for unrecognized names', () => {
    expect(getParameterRange('spacing', 0.2)).toBeNull();
    expect(getParameterRange('minimum', 3)).toBeNull();
  });

  it('mirrors the window for negative values', () => {
    expect(getParameterRange('threshold', -10)).toMatchObject({ minValue: -15, maxValue: -5, step: 1 });
  });
});

describe('gridValues', () => {
  it('walks from min to max in step increments', () => {
    const range = getParameterRange('threshold', 1000);
    expect(range).not.toBeNull();
    if (!range) return;

    expect(gridValues(range, 200)).toEqual([500, 600, 700, 800, 900, 1000, 1100, 1200, 1300, 1400, 1500]);
  });

  it('returns no candidates for a zero step', () => {
    const range = getParameterRange('threshold', 0);
    expect(range).not.toBeNull();
    if (!range) return;

    expect(range.step).toBe(0);
    expect(gridValues(range, 200)).toEqual([]);
  });

  it('widens the step when the window holds too many increments', () => {
    const range = { name: 'tolerance', minValue: 0, maxValue: 200, step: 5, currentValue: 100 };
    expect(gridValues(range, 10)).toEqual([0, 20, 40, 60, 80, 100, 120, 140, 160, 180, 200]);
  });
});

describe('roundValue', () => {
  it('strips floating-point noise', () => {
    expect(roundValue(0.1 + 0.2)).toBe(0.3);
  });
});
