import { beforeEach, describe, expect, it } from 'vitest';
import { grant } from '../auth';
import { CUSTODY_ACCOUNT_ID } from '../constants';
import { ArithmeticError, AuthorizationError, StateError, TransferError, ValidationError } from '../errors';
import { createHarness, createInitializedHarness, DAY, Harness, START, TOKEN } from './harness';

const alice = grant('alice');

describe('staking', () => {
  let h: Harness;

  beforeEach(() => {
    h = createInitializedHarness();
    h.tokens.mint(TOKEN, 'alice', 20_000);
  });

  describe('stake', () => {
    it('moves principal into custody and records the position', () => {
      const result = h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);

      expect(result.value).toEqual({ staker: 'alice', amount: 1_000, reward: 0, total: 1_000 });
      expect(h.kernel.getStake('alice')).toBe(1_000);
      expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(19_000);
      expect(h.tokens.balanceOf(TOKEN, CUSTODY_ACCOUNT_ID)).toBe(1_001_000);
      expect(h.state.getStake('alice')).toEqual({ balance: 1_000, staked_at: START });
    });

    it('reads config and position once and writes once', () => {
      const result = h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      expect(result.cost).toEqual({ reads: 2, writes: 1, removes: 0, has: 0, notifications: 1 });
    });

    it('publishes a STAKE notification', () => {
      const result = h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);

      expect(result.notification?.family).toBe('STAKING');
      expect(result.notification?.operation).toBe('STAKE');
      expect(result.notification?.payload).toEqual({ staker: 'alice', amount: 1_000, total: 1_000, timestamp: START });
    });

    it('folds accrued reward into the balance before adding', () => {
      h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      h.clock.advance(30 * DAY);

      const result = h.kernel.stake({ staker: 'alice', amount: 500 }, alice);

      expect(result.value).toEqual({ staker: 'alice', amount: 500, reward: 9, total: 1_509 });
      expect(h.state.getStake('alice')).toEqual({ balance: 1_509, staked_at: START + 30 * DAY });
    });

    it('fails below the minimum before any write', () => {
      const before = h.ledger.size();

      expect(() => h.kernel.stake({ staker: 'alice', amount: 50 }, alice)).toThrow(
        'stake amount below minimum of 100',
      );
      expect(h.state.getStake('alice')).toBeUndefined();
      expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(20_000);
      expect(h.ledger.size()).toBe(before);
    });

    it('requires the staker to authorize', () => {
      expect(() => h.kernel.stake({ staker: 'alice', amount: 1_000 })).toThrow(AuthorizationError);
      expect(() => h.kernel.stake({ staker: 'alice', amount: 1_000 }, grant('bob'))).toThrow(
        'authorization required for alice',
      );
    });

    it('fails before initialization', () => {
      const fresh = createHarness();
      fresh.tokens.mint(TOKEN, 'alice', 1_000);
      expect(() => fresh.kernel.stake({ staker: 'alice', amount: 1_000 }, alice)).toThrow(StateError);
    });

    it('does not let the custody account stake', () => {
      const custody = grant(CUSTODY_ACCOUNT_ID);

      expect(() => h.kernel.stake({ staker: CUSTODY_ACCOUNT_ID, amount: 1_000 }, custody)).toThrow(
        'staker cannot be the custody account',
      );
      expect(() => h.kernel.unstake({ staker: CUSTODY_ACCOUNT_ID, amount: 1_000 }, custody)).toThrow(ValidationError);
      expect(h.tokens.balanceOf(TOKEN, CUSTODY_ACCOUNT_ID)).toBe(1_000_000);
    });

    it('reports amounts beyond the integer range as arithmetic failures', () => {
      expect(() => h.kernel.stake({ staker: 'alice', amount: 1e17 }, alice)).toThrow(ArithmeticError);
      expect(() => h.kernel.stake({ staker: 'alice', amount: 1e17 }, alice)).toThrow(
        'stake amount exceeds the supported amount range',
      );
      expect(h.kernel.getStake('alice')).toBe(0);
    });

    it('rolls back when the staker cannot pay', () => {
      expect(() => h.kernel.stake({ staker: 'alice', amount: 50_000 }, alice)).toThrow(TransferError);
      expect(h.kernel.getStake('alice')).toBe(0);
    });
  });

  describe('unstake', () => {
    it('pays principal plus reward and removes an emptied position', () => {
      h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      h.clock.advance(30 * DAY);

      const result = h.kernel.unstake({ staker: 'alice', amount: 1_000 }, alice);

      expect(result.value).toEqual({ staker: 'alice', amount: 1_000, reward: 9, payout: 1_009, remaining: 0 });
      expect(h.kernel.getStake('alice')).toBe(0);
      expect(h.state.getStake('alice')).toBeUndefined();
      expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(20_009);
      expect(result.cost.removes).toBe(1);
      expect(result.notification?.payload).toEqual({
        staker: 'alice',
        amount: 1_000,
        reward: 9,
        remaining: 0,
        timestamp: START + 30 * DAY,
      });
    });

    it('accrues about 12% over a year', () => {
      h.kernel.stake({ staker: 'alice', amount: 10_000 }, alice);
      h.clock.advance(365 * DAY);

      const result = h.kernel.unstake({ staker: 'alice', amount: 10_000 }, alice);

      expect(result.value.reward).toBeGreaterThanOrEqual(1_100);
      expect(result.value.reward).toBeLessThanOrEqual(1_300);
      expect(result.value.reward).toBe(1_200);
      expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(21_200);
    });

    it('keeps the rest of a partial unstake with a fresh window', () => {
      h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      h.clock.advance(30 * DAY);

      const result = h.kernel.unstake({ staker: 'alice', amount: 400 }, alice);

      expect(result.value).toEqual({ staker: 'alice', amount: 400, reward: 9, payout: 409, remaining: 600 });
      expect(h.state.getStake('alice')).toEqual({ balance: 600, staked_at: START + 30 * DAY });
    });

    it('rejects more than the staked balance', () => {
      h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      h.clock.advance(30 * DAY);

      expect(() => h.kernel.unstake({ staker: 'alice', amount: 1_001 }, alice)).toThrow(
        'unstake amount exceeds available balance',
      );
      expect(h.kernel.getStake('alice')).toBe(1_000);
    });

    it('fails without a position', () => {
      expect(() => h.kernel.unstake({ staker: 'bob', amount: 1 }, grant('bob'))).toThrow('no stake found for bob');
    });

    it('rejects a zero amount', () => {
      h.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      expect(() => h.kernel.unstake({ staker: 'alice', amount: 0 }, alice)).toThrow(ValidationError);
    });

    it('leaves everything untouched when custody cannot cover the payout', () => {
      const dry = createInitializedHarness(0);
      dry.tokens.mint(TOKEN, 'alice', 1_000);
      dry.kernel.stake({ staker: 'alice', amount: 1_000 }, alice);
      dry.clock.advance(30 * DAY);
      const notifications = dry.ledger.size();

      expect(() => dry.kernel.unstake({ staker: 'alice', amount: 1_000 }, alice)).toThrow(TransferError);
      expect(dry.state.getStake('alice')).toEqual({ balance: 1_000, staked_at: START });
      expect(dry.tokens.balanceOf(TOKEN, CUSTODY_ACCOUNT_ID)).toBe(1_000);
      expect(dry.ledger.size()).toBe(notifications);
    });
  });
});
