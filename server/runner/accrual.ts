import { assertNonNegativeInteger, narrow } from './arithmetic';
import { BPS_DENOMINATOR, SECONDS_PER_YEAR } from './constants';
import { ValidationError } from './errors';

const REWARD_DENOMINATOR = BigInt(BPS_DENOMINATOR) * BigInt(SECONDS_PER_YEAR);

/**
 * Reward accrued by `balance` between `stakedAt` and `now` at `rate` basis
 * points per year:
 *
 *   floor(balance * rate * (now - stakedAt) / (10_000 * 31_536_000))
 *
 * The product is taken in bigint; sub-unit remainders are dropped, not carried.
 */
export function computeReward(balance: number, stakedAt: number, now: number, rate: number): number {
  assertNonNegativeInteger(balance, 'balance');
  if (balance === 0) {
    return 0;
  }

  assertNonNegativeInteger(stakedAt, 'staked_at');
  assertNonNegativeInteger(now, 'now');
  assertNonNegativeInteger(rate, 'reward_rate');
  if (now < stakedAt) {
    throw new ValidationError('accrual window ends before it starts', { staked_at: stakedAt, now });
  }

  const elapsed = now - stakedAt;
  if (elapsed === 0 || rate === 0) {
    return 0;
  }

  const numerator = BigInt(balance) * BigInt(rate) * BigInt(elapsed);
  return narrow(numerator / REWARD_DENOMINATOR, 'reward');
}
