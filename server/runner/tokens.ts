import { TransferError, ValidationError } from './errors';

export interface BalanceChange {
  token: string;
  account_id: string;
  delta: number;
}

/** Balances keyed by token, then by account. */
export type TokenBalanceSnapshot = Record<string, Record<string, number>>;

/**
 * The value-transfer primitive the engines call. Each call is atomic: it
 * either moves the whole amount or throws without moving anything.
 */
export interface TransferPrimitive {
  transfer(token: string, fromId: string, toId: string, amount: number): BalanceChange[];
}

export interface TokenLedger extends TransferPrimitive {
  mint(token: string, toId: string, amount: number): BalanceChange;
  balanceOf(token: string, accountId: string): number;
  snapshot(): TokenBalanceSnapshot;
  restore(snapshot: TokenBalanceSnapshot): void;
}

export class InMemoryTokenLedger implements TokenLedger {
  private balances: Map<string, Map<string, number>> = new Map();

  constructor(snapshot?: TokenBalanceSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  balanceOf(token: string, accountId: string): number {
    return this.balances.get(token)?.get(accountId) ?? 0;
  }

  mint(token: string, toId: string, amount: number): BalanceChange {
    this.assertAmount(amount);
    const next = this.balanceOf(token, toId) + amount;
    if (!Number.isSafeInteger(next)) {
      throw new TransferError(`balance overflow for ${toId}`);
    }
    this.setBalance(token, toId, next);
    return { token, account_id: toId, delta: amount };
  }

  transfer(token: string, fromId: string, toId: string, amount: number): BalanceChange[] {
    this.assertAmount(amount);

    const fromBalance = this.balanceOf(token, fromId);
    if (fromBalance < amount) {
      throw new TransferError(`insufficient ${token} balance for ${fromId}`, {
        balance: fromBalance,
        amount,
      });
    }
    if (fromId === toId) {
      return [];
    }

    const toBalance = this.balanceOf(token, toId) + amount;
    if (!Number.isSafeInteger(toBalance)) {
      throw new TransferError(`balance overflow for ${toId}`);
    }

    this.setBalance(token, fromId, fromBalance - amount);
    this.setBalance(token, toId, toBalance);
    return [
      { token, account_id: fromId, delta: -amount },
      { token, account_id: toId, delta: amount },
    ];
  }

  snapshot(): TokenBalanceSnapshot {
    const snapshot: TokenBalanceSnapshot = {};
    for (const [token, accounts] of this.balances.entries()) {
      snapshot[token] = Object.fromEntries(accounts.entries());
    }
    return snapshot;
  }

  restore(snapshot: TokenBalanceSnapshot): void {
    const balances = new Map<string, Map<string, number>>();
    for (const [token, accounts] of Object.entries(snapshot)) {
      balances.set(token, new Map(Object.entries(accounts)));
    }
    this.balances = balances;
  }

  private setBalance(token: string, accountId: string, balance: number): void {
    const accounts = this.balances.get(token) ?? new Map<string, number>();
    if (balance === 0) {
      accounts.delete(accountId);
    } else {
      accounts.set(accountId, balance);
    }
    this.balances.set(token, accounts);
  }

  private assertAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new ValidationError('transfer amount must be a positive integer', { amount });
    }
  }
}
