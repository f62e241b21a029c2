import { EscrowEntry, EscrowLockInput, EscrowReleaseInput } from '../../shared/schema';
import { assertNonNegativeInteger, assertPositiveAmount, assertUserPrincipal } from './arithmetic';
import { requireConfig } from './config';
import { CUSTODY_ACCOUNT_ID } from './constants';
import { EngineDependencies, OperationContext } from './context';
import { StateError, ValidationError } from './errors';

/**
 * Time-locked escrow keyed by (depositor, escrow_id).
 *
 * absent --lock--> held --release--> absent
 *
 * The entry's existence is the "held" state. Release is permissionless since
 * funds can only go to the beneficiary fixed at lock time.
 */
export class EscrowEngine {
  constructor(private deps: EngineDependencies) {}

  lock(input: EscrowLockInput, ctx: OperationContext): EscrowEntry {
    assertUserPrincipal(input.depositor, 'depositor');
    ctx.auth.requireAuth(input.depositor);

    assertUserPrincipal(input.beneficiary, 'beneficiary');
    assertPositiveAmount(input.amount, 'escrow amount');
    assertNonNegativeInteger(input.unlock_ts, 'unlock_ts');
    assertNonNegativeInteger(input.escrow_id, 'escrow_id');
    if (input.unlock_ts <= ctx.now) {
      throw new ValidationError('unlock_ts must be in the future', { unlock_ts: input.unlock_ts, now: ctx.now });
    }

    if (this.deps.state.hasEscrow(input.depositor, input.escrow_id)) {
      throw new ValidationError(`escrow id already in use: ${input.escrow_id}`);
    }

    const config = requireConfig(this.deps.state);
    this.deps.tokens.transfer(config.token, input.depositor, CUSTODY_ACCOUNT_ID, input.amount);

    const entry: EscrowEntry = {
      depositor: input.depositor,
      beneficiary: input.beneficiary,
      amount: input.amount,
      unlock_ts: input.unlock_ts,
    };
    this.deps.state.setEscrow(input.escrow_id, entry);

    this.deps.notifier.publish(
      {
        family: 'ESCROW',
        operation: 'ESCROW_LOCKED',
        payload: { ...entry, timestamp: ctx.now },
      },
      ctx.now,
    );

    return entry;
  }

  release(input: EscrowReleaseInput, ctx: OperationContext): EscrowEntry {
    assertNonNegativeInteger(input.escrow_id, 'escrow_id');

    const entry = this.deps.state.getEscrow(input.depositor, input.escrow_id);
    if (!entry) {
      throw new StateError(`escrow entry not found: ${input.depositor}/${input.escrow_id}`);
    }
    if (ctx.now < entry.unlock_ts) {
      throw new StateError('escrow is still locked', { unlock_ts: entry.unlock_ts, now: ctx.now });
    }

    const config = requireConfig(this.deps.state);

    // committed before funds move
    this.deps.state.removeEscrow(input.depositor, input.escrow_id);
    this.deps.tokens.transfer(config.token, CUSTODY_ACCOUNT_ID, entry.beneficiary, entry.amount);

    this.deps.notifier.publish(
      {
        family: 'ESCROW',
        operation: 'ESCROW_RELEASED',
        payload: { beneficiary: entry.beneficiary, amount: entry.amount, timestamp: ctx.now },
      },
      ctx.now,
    );

    return entry;
  }

  getEscrow(depositor: string, escrowId: number): EscrowEntry | null {
    return this.deps.state.getEscrow(depositor, escrowId) ?? null;
  }
}
