import { describe, expect, it, vi } from 'vitest';
import { grant } from '../auth';
import { silentLogger } from '../logger';
import { RunnerMaintenance } from '../maintenance';
import { createHarness, DAY, START } from './harness';

const USDC = 'USDC';

describe('RunnerMaintenance', () => {
  it('executes due payments and reports the ones that fail', () => {
    const h = createHarness();
    h.tokens.mint(USDC, 'sam', 150);
    const sam = grant('sam');

    h.kernel.createPayment(
      { sender: 'sam', recipient: 'rita', token: USDC, amount: 100, interval: DAY, start_time: START },
      sam,
    );
    h.kernel.createPayment(
      { sender: 'sam', recipient: 'raj', token: USDC, amount: 100, interval: DAY, start_time: START },
      sam,
    );
    h.kernel.createPayment(
      { sender: 'sam', recipient: 'rita', token: USDC, amount: 10, interval: DAY, start_time: START + 5 * DAY },
      sam,
    );
    h.clock.set(START + 2 * DAY + 10);
    const warn = vi.fn();

    const result = new RunnerMaintenance(h.kernel, { ...silentLogger, warn }).run();

    expect(result.due_payments).toBe(2);
    expect(result.executed).toEqual([
      { payment_id: 1, amount: 100, next_execution: START + 3 * DAY, intervals_skipped: 2 },
    ]);
    expect(result.failures).toEqual([
      { payment_id: 2, code: 'TRANSFER_ERROR', error: 'insufficient USDC balance for sam' },
    ]);
    expect(result.events.map((event) => event.operation)).toEqual(['PAYMENT_EXECUTED']);
    expect(h.tokens.balanceOf(USDC, 'rita')).toBe(100);
    expect(h.kernel.getPayment(2).next_execution).toBe(START);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('does nothing when no payment is due', () => {
    const h = createHarness();
    const result = new RunnerMaintenance(h.kernel).run();
    expect(result).toEqual({ due_payments: 0, executed: [], failures: [], events: [] });
  });
});
