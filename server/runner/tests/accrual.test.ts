import { describe, expect, it } from 'vitest';
import { computeReward } from '../accrual';
import { MAX_REWARD_RATE } from '../constants';
import { ArithmeticError, ValidationError } from '../errors';
import { DAY, START } from './harness';

describe('computeReward', () => {
  it('accrues 12% per year on a full year', () => {
    expect(computeReward(10_000, START, START + 365 * DAY, 1_200)).toBe(1_200);
  });

  it('floors partial units', () => {
    // 1000 * 1200 * 2_592_000 / 315_360_000_000 = 9.86
    expect(computeReward(1_000, START, START + 30 * DAY, 1_200)).toBe(9);
    expect(computeReward(1, START, START + 1, 1)).toBe(0);
  });

  it('returns 0 for an empty balance without looking at the window', () => {
    expect(computeReward(0, START, START - 10, 1_200)).toBe(0);
  });

  it('returns 0 when no time has passed', () => {
    expect(computeReward(5_000, START, START, 1_200)).toBe(0);
  });

  it('rejects a window that ends before it starts', () => {
    expect(() => computeReward(1_000, START, START - 1, 1_200)).toThrow(ValidationError);
  });

  it('is non-decreasing in elapsed time and in balance', () => {
    let previous = 0;
    for (let days = 0; days <= 400; days += 25) {
      const reward = computeReward(7_777, START, START + days * DAY, 950);
      expect(reward).toBeGreaterThanOrEqual(previous);
      previous = reward;
    }

    previous = 0;
    for (let balance = 0; balance <= 50_000; balance += 2_500) {
      const reward = computeReward(balance, START, START + 90 * DAY, 950);
      expect(reward).toBeGreaterThanOrEqual(previous);
      previous = reward;
    }
  });

  it('fails instead of losing precision on huge results', () => {
    expect(() =>
      computeReward(Number.MAX_SAFE_INTEGER, 0, 100 * 365 * DAY, MAX_REWARD_RATE),
    ).toThrow(ArithmeticError);
  });

  it('rejects non-integer inputs', () => {
    expect(() => computeReward(10.5, START, START + DAY, 1_200)).toThrow(ValidationError);
    expect(() => computeReward(10, START, START + DAY, -1)).toThrow(ValidationError);
  });
});
