import { beforeEach, describe, expect, it } from 'vitest';
import { grant } from '../auth';
import { LARGE_MINT_THRESHOLD, MAX_MINT_BATCH_SIZE } from '../constants';
import { AuthorizationError, ValidationError } from '../errors';
import { ADMIN, createHarness, createInitializedHarness, Harness, START, TOKEN } from './harness';

const admin = grant(ADMIN);

describe('batch mint', () => {
  let h: Harness;

  beforeEach(() => {
    h = createInitializedHarness(0);
  });

  it('mints valid requests and reports invalid ones without failing the batch', () => {
    const result = h.kernel.batchMint(
      {
        admin: ADMIN,
        requests: [
          { recipient: 'alice', amount: 300 },
          { recipient: 'bob', amount: 0 },
          { recipient: '', amount: 50 },
          { recipient: 'carol', amount: 101 },
        ],
      },
      admin,
    );

    expect(result.value.batch_id).toBe(1);
    expect(result.value.token).toBe(TOKEN);
    expect(result.value.results).toEqual([
      { status: 'SUCCESS', recipient: 'alice', amount: 300 },
      { status: 'FAILURE', recipient: 'bob', amount: 0, code: 'INVALID_AMOUNT' },
      { status: 'FAILURE', recipient: '', amount: 50, code: 'INVALID_RECIPIENT' },
      { status: 'SUCCESS', recipient: 'carol', amount: 101 },
    ]);
    expect(result.value.metrics).toEqual({
      total_requests: 4,
      successful_mints: 2,
      failed_mints: 2,
      total_amount_minted: 401,
      avg_mint_amount: 200,
      large_mints: 0,
    });
    expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(300);
    expect(h.tokens.balanceOf(TOKEN, 'carol')).toBe(101);
  });

  it('writes statistics once and emits one notification', () => {
    const result = h.kernel.batchMint(
      { admin: ADMIN, requests: [{ recipient: 'alice', amount: LARGE_MINT_THRESHOLD }] },
      admin,
    );

    expect(result.cost.writes).toBe(1);
    expect(result.cost.notifications).toBe(1);
    expect(result.notification?.payload).toEqual({
      batch_id: 1,
      total_requests: 1,
      successful: 1,
      failed: 0,
      total_amount: LARGE_MINT_THRESHOLD,
      large_mints: 1,
      timestamp: START,
    });
  });

  it('accumulates statistics across batches', () => {
    h.kernel.batchMint({ admin: ADMIN, requests: [{ recipient: 'alice', amount: 10 }] }, admin);
    h.kernel.batchMint({ admin: ADMIN, requests: [{ recipient: 'bob', amount: 15 }] }, admin);

    expect(h.kernel.getMintStats()).toEqual({ total_minted: 25, total_batches_processed: 2, last_batch_id: 2 });
  });

  it('counts a batch where every request failed', () => {
    const result = h.kernel.batchMint({ admin: ADMIN, requests: [{ recipient: 'alice', amount: -1 }] }, admin);

    expect(result.value.successful).toBe(0);
    expect(result.value.metrics.avg_mint_amount).toBe(0);
    expect(h.kernel.getMintStats()).toEqual({ total_minted: 0, total_batches_processed: 1, last_batch_id: 1 });
  });

  it('reports amounts past the integer range separately from invalid ones', () => {
    const result = h.kernel.batchMint(
      {
        admin: ADMIN,
        requests: [
          { recipient: 'alice', amount: 100_000_000_000_000_000 },
          { recipient: 'bob', amount: 2.5 },
          { recipient: 'carol', amount: Number.MAX_SAFE_INTEGER },
        ],
      },
      admin,
    );

    expect(result.value.results).toEqual([
      { status: 'FAILURE', recipient: 'alice', amount: 100_000_000_000_000_000, code: 'AMOUNT_OUT_OF_RANGE' },
      { status: 'FAILURE', recipient: 'bob', amount: 2.5, code: 'INVALID_AMOUNT' },
      { status: 'SUCCESS', recipient: 'carol', amount: Number.MAX_SAFE_INTEGER },
    ]);
    expect(h.tokens.balanceOf(TOKEN, 'alice')).toBe(0);
    expect(h.tokens.balanceOf(TOKEN, 'carol')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('limits the batch size', () => {
    const requests = Array.from({ length: MAX_MINT_BATCH_SIZE + 1 }, () => ({ recipient: 'alice', amount: 1 }));

    expect(() => h.kernel.batchMint({ admin: ADMIN, requests }, admin)).toThrow(ValidationError);
    expect(() => h.kernel.batchMint({ admin: ADMIN, requests: [] }, admin)).toThrow(ValidationError);
    expect(h.kernel.getMintStats().last_batch_id).toBe(0);
  });

  it('is restricted to the configured admin', () => {
    const requests = [{ recipient: 'alice', amount: 1 }];
    expect(() => h.kernel.batchMint({ admin: 'mallory', requests }, grant('mallory'))).toThrow(
      'caller is not the runner admin',
    );
    expect(() => h.kernel.batchMint({ admin: ADMIN, requests })).toThrow(AuthorizationError);
  });

  it('needs an initialized runner', () => {
    const fresh = createHarness();
    expect(() =>
      fresh.kernel.batchMint({ admin: ADMIN, requests: [{ recipient: 'alice', amount: 1 }] }, admin),
    ).toThrow('runner not initialized');
  });
});
