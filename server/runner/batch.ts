import { BatchSettlement, DistributeRewardsInput, SettledAccount, StakePosition } from '../../shared/schema';
import { computeReward } from './accrual';
import { assertNonNegativeInteger, assertPrincipal, assertUserPrincipal, checkedAdd } from './arithmetic';
import { requireConfig } from './config';
import { EngineDependencies, OperationContext } from './context';
import { AuthorizationError, ValidationError } from './errors';

/**
 * Batch settlement. The configuration is read once for the whole batch, each
 * account costs one read and at most one write, and a batch that credits
 * anyone emits a single BATCH_SETTLED notification.
 */
export class BatchSettlementEngine {
  constructor(private deps: EngineDependencies) {}

  distributeRewards(input: DistributeRewardsInput, ctx: OperationContext): BatchSettlement {
    assertPrincipal(input.admin, 'admin');
    ctx.auth.requireAuth(input.admin);

    if (input.stakers.length !== input.bonus_amounts.length) {
      throw new ValidationError('stakers and bonus_amounts must be the same length', {
        stakers: input.stakers.length,
        bonus_amounts: input.bonus_amounts.length,
      });
    }
    if (input.stakers.length === 0) {
      throw new ValidationError('staker list must not be empty');
    }
    input.stakers.forEach((staker, index) => assertUserPrincipal(staker, `stakers[${index}]`));
    input.bonus_amounts.forEach((bonus, index) => assertNonNegativeInteger(bonus, `bonus_amounts[${index}]`));

    const config = requireConfig(this.deps.state);
    if (config.admin !== input.admin) {
      throw new AuthorizationError('caller is not the runner admin');
    }

    const settled: SettledAccount[] = [];
    let totalAmount = 0;

    for (let i = 0; i < input.stakers.length; i += 1) {
      const account = input.stakers[i];
      const bonus = input.bonus_amounts[i];

      const position: StakePosition = this.deps.state.getStake(account) ?? { balance: 0, staked_at: ctx.now };
      if (position.balance === 0 && bonus === 0) {
        continue;
      }

      const reward = computeReward(position.balance, position.staked_at, ctx.now, config.reward_rate);
      const credit = checkedAdd(reward, bonus, 'settlement credit');
      if (credit <= 0) {
        continue;
      }

      const balance = checkedAdd(position.balance, credit, 'stake balance');
      this.deps.state.setStake(account, { balance, staked_at: ctx.now });

      totalAmount = checkedAdd(totalAmount, credit, 'batch total');
      settled.push({ account, reward, bonus, balance });
    }

    if (settled.length > 0) {
      this.deps.notifier.publish(
        {
          family: 'STAKING',
          operation: 'BATCH_SETTLED',
          payload: { recipient_count: settled.length, total_amount: totalAmount, timestamp: ctx.now },
        },
        ctx.now,
      );
    }

    return { recipient_count: settled.length, total_amount: totalAmount, settled };
  }

  /** Reward each account would be credited at `now`, bonus excluded. Never writes. */
  previewRewards(stakers: string[], now: number): number[] {
    stakers.forEach((staker, index) => assertUserPrincipal(staker, `stakers[${index}]`));
    const config = requireConfig(this.deps.state);
    return stakers.map((account) => {
      const position = this.deps.state.getStake(account);
      if (!position || position.balance === 0) {
        return 0;
      }
      return computeReward(position.balance, position.staked_at, now, config.reward_rate);
    });
  }
}
