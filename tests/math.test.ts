/**
 * Tests for rounding helpers
 */

import { describe, it, expect } from '@jest/globals';
import { applyPrecision, PRECISION_NONE, roundHalfAwayFromZero } from '../src/utils/math.js';

describe('roundHalfAwayFromZero', () => {
  it('should round ties away from zero', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(-0.4)).toBe(0);
  });

  it('should round decimal ties that are inexact in binary', () => {
    expect(roundHalfAwayFromZero(1.005, 2)).toBe(1.01);
    expect(roundHalfAwayFromZero(-1.005, 2)).toBe(-1.01);
    expect(roundHalfAwayFromZero(1.0049, 2)).toBe(1);
  });
});

describe('applyPrecision', () => {
  it('should leave values untouched without a precision', () => {
    expect(applyPrecision(1.23456, PRECISION_NONE)).toBe(1.23456);
    expect(applyPrecision(1.23456, 3)).toBe(1.235);
  });
});
