import { StakeInput, StakeOutcome, StakePosition, UnstakeOutcome } from '../../shared/schema';
import { computeReward } from './accrual';
import { assertPositiveAmount, assertUserPrincipal, checkedAdd } from './arithmetic';
import { requireConfig } from './config';
import { CUSTODY_ACCOUNT_ID } from './constants';
import { EngineDependencies, OperationContext } from './context';
import { StateError, ValidationError } from './errors';

/**
 * Single-account settlement. Each call reads the account's position once and
 * writes it (or removes it) once; accrued reward is folded in before the
 * balance changes and the accrual window restarts at `now`.
 */
export class StakingEngine {
  constructor(private deps: EngineDependencies) {}

  stake(input: StakeInput, ctx: OperationContext): StakeOutcome {
    assertUserPrincipal(input.staker, 'staker');
    ctx.auth.requireAuth(input.staker);

    const config = requireConfig(this.deps.state);
    assertPositiveAmount(input.amount, 'stake amount');
    if (input.amount < config.min_stake) {
      throw new ValidationError(`stake amount below minimum of ${config.min_stake}`, {
        amount: input.amount,
        min_stake: config.min_stake,
      });
    }

    const position: StakePosition = this.deps.state.getStake(input.staker) ?? {
      balance: 0,
      staked_at: ctx.now,
    };
    const reward = computeReward(position.balance, position.staked_at, ctx.now, config.reward_rate);
    const total = checkedAdd(checkedAdd(position.balance, reward, 'stake balance'), input.amount, 'stake balance');

    this.deps.tokens.transfer(config.token, input.staker, CUSTODY_ACCOUNT_ID, input.amount);
    this.deps.state.setStake(input.staker, { balance: total, staked_at: ctx.now });

    this.deps.notifier.publish(
      {
        family: 'STAKING',
        operation: 'STAKE',
        payload: { staker: input.staker, amount: input.amount, total, timestamp: ctx.now },
      },
      ctx.now,
    );

    return { staker: input.staker, amount: input.amount, reward, total };
  }

  /**
   * Pays out `amount` of principal plus everything accrued in the current
   * window. A position left at zero is removed rather than stored empty.
   */
  unstake(input: StakeInput, ctx: OperationContext): UnstakeOutcome {
    assertUserPrincipal(input.staker, 'staker');
    ctx.auth.requireAuth(input.staker);

    const config = requireConfig(this.deps.state);
    assertPositiveAmount(input.amount, 'unstake amount');

    const position = this.deps.state.getStake(input.staker);
    if (!position) {
      throw new StateError(`no stake found for ${input.staker}`);
    }

    const reward = computeReward(position.balance, position.staked_at, ctx.now, config.reward_rate);
    const available = checkedAdd(position.balance, reward, 'stake balance');
    const payout = checkedAdd(input.amount, reward, 'unstake payout');
    if (payout > available) {
      throw new ValidationError('unstake amount exceeds available balance', {
        amount: input.amount,
        balance: position.balance,
        reward,
      });
    }

    const remaining = available - payout;
    if (remaining === 0) {
      this.deps.state.removeStake(input.staker);
    } else {
      this.deps.state.setStake(input.staker, { balance: remaining, staked_at: ctx.now });
    }

    this.deps.tokens.transfer(config.token, CUSTODY_ACCOUNT_ID, input.staker, payout);

    this.deps.notifier.publish(
      {
        family: 'STAKING',
        operation: 'UNSTAKE',
        payload: { staker: input.staker, amount: input.amount, reward, remaining, timestamp: ctx.now },
      },
      ctx.now,
    );

    return { staker: input.staker, amount: input.amount, reward, payout, remaining };
  }

  /** Stored principal only; accrual is not computed on reads. */
  getStake(account: string): number {
    return this.deps.state.getStake(account)?.balance ?? 0;
  }
}
