import { EscrowEntry, MintStats, RecurringPayment, RunnerConfig, StakePosition } from '../../shared/schema';
import { StateError } from './errors';
import {
  configKey,
  encodeKey,
  escrowKey,
  mintStatsKey,
  nonceKey,
  paymentCountKey,
  paymentKey,
  stakeKey,
  StorageKey,
} from './keys';

export interface StateSnapshot {
  config: Record<string, RunnerConfig>;
  stakes: Record<string, StakePosition>;
  escrows: Record<string, EscrowEntry>;
  payments: Record<string, RecurringPayment>;
  counters: Record<string, number>;
  mint_stats: Record<string, MintStats>;
  nonces: Record<string, number>;
}

/** Rollback point for one operation. Excludes the nonce table; nonces registered since the mark are deleted on rollback. */
export type OperationSnapshot = Omit<StateSnapshot, 'nonces'>;

/** Storage operations performed since the last reset. */
export interface StorageMetrics {
  reads: number;
  writes: number;
  removes: number;
  has: number;
}

function cloneRecord<T>(record: Record<string, T> | undefined): Map<string, T> {
  return new Map(Object.entries(structuredClone(record ?? {})));
}

function toRecord<T>(table: Map<string, T>): Record<string, T> {
  const record: Record<string, T> = {};
  for (const [key, value] of table.entries()) {
    record[key] = structuredClone(value);
  }
  return record;
}

export class RunnerState {
  private config: Map<string, RunnerConfig> = new Map();
  private stakes: Map<string, StakePosition> = new Map();
  private escrows: Map<string, EscrowEntry> = new Map();
  private payments: Map<string, RecurringPayment> = new Map();
  private counters: Map<string, number> = new Map();
  private mintStats: Map<string, MintStats> = new Map();
  private nonces: Map<string, number> = new Map();
  private nonceJournal: string[] = [];
  private counts: StorageMetrics = { reads: 0, writes: 0, removes: 0, has: 0 };

  constructor(snapshot?: StateSnapshot) {
    if (snapshot) {
      this.restore(snapshot);
    }
  }

  getConfig(): RunnerConfig | undefined {
    return this.read(this.config, configKey());
  }

  hasConfig(): boolean {
    return this.exists(this.config, configKey());
  }

  setConfig(config: RunnerConfig): void {
    this.write(this.config, configKey(), config);
  }

  getStake(account: string): StakePosition | undefined {
    return this.read(this.stakes, stakeKey(account));
  }

  setStake(account: string, position: StakePosition): void {
    this.write(this.stakes, stakeKey(account), position);
  }

  removeStake(account: string): void {
    this.remove(this.stakes, stakeKey(account));
  }

  getEscrow(depositor: string, escrowId: number): EscrowEntry | undefined {
    return this.read(this.escrows, escrowKey(depositor, escrowId));
  }

  hasEscrow(depositor: string, escrowId: number): boolean {
    return this.exists(this.escrows, escrowKey(depositor, escrowId));
  }

  setEscrow(escrowId: number, entry: EscrowEntry): void {
    this.write(this.escrows, escrowKey(entry.depositor, escrowId), entry);
  }

  removeEscrow(depositor: string, escrowId: number): void {
    this.remove(this.escrows, escrowKey(depositor, escrowId));
  }

  getPayment(paymentId: number): RecurringPayment | undefined {
    return this.read(this.payments, paymentKey(paymentId));
  }

  setPayment(paymentId: number, payment: RecurringPayment): void {
    this.write(this.payments, paymentKey(paymentId), payment);
  }

  getPaymentCount(): number {
    return this.read(this.counters, paymentCountKey()) ?? 0;
  }

  setPaymentCount(count: number): void {
    this.write(this.counters, paymentCountKey(), count);
  }

  getMintStats(): MintStats | undefined {
    return this.read(this.mintStats, mintStatsKey());
  }

  setMintStats(stats: MintStats): void {
    this.write(this.mintStats, mintStatsKey(), stats);
  }

  registerNonce(signerId: string, nonce: string, now: number): void {
    const key = nonceKey(signerId, nonce);
    if (this.exists(this.nonces, key)) {
      throw new StateError(`nonce already used for signer: ${signerId}`);
    }
    this.write(this.nonces, key, now);
    this.nonceJournal.push(encodeKey(key));
  }

  nonceCount(): number {
    return this.nonces.size;
  }

  metrics(): StorageMetrics {
    return { ...this.counts };
  }

  resetMetrics(): void {
    this.counts = { reads: 0, writes: 0, removes: 0, has: 0 };
  }

  snapshot(): StateSnapshot {
    return {
      config: toRecord(this.config),
      stakes: toRecord(this.stakes),
      escrows: toRecord(this.escrows),
      payments: toRecord(this.payments),
      counters: toRecord(this.counters),
      mint_stats: toRecord(this.mintStats),
      nonces: toRecord(this.nonces),
    };
  }

  restore(snapshot: StateSnapshot): void {
    this.restoreTables(snapshot);
    this.nonces = cloneRecord(snapshot.nonces);
    this.nonceJournal = [];
  }

  beginOperation(): OperationSnapshot {
    this.nonceJournal = [];
    return {
      config: toRecord(this.config),
      stakes: toRecord(this.stakes),
      escrows: toRecord(this.escrows),
      payments: toRecord(this.payments),
      counters: toRecord(this.counters),
      mint_stats: toRecord(this.mintStats),
    };
  }

  rollbackOperation(snapshot: OperationSnapshot): void {
    this.restoreTables(snapshot);
    for (const key of this.nonceJournal) {
      this.nonces.delete(key);
    }
    this.nonceJournal = [];
  }

  private restoreTables(snapshot: OperationSnapshot): void {
    this.config = cloneRecord(snapshot.config);
    this.stakes = cloneRecord(snapshot.stakes);
    this.escrows = cloneRecord(snapshot.escrows);
    this.payments = cloneRecord(snapshot.payments);
    this.counters = cloneRecord(snapshot.counters);
    this.mintStats = cloneRecord(snapshot.mint_stats);
  }

  private read<T>(table: Map<string, T>, key: StorageKey): T | undefined {
    this.counts.reads += 1;
    const value = table.get(encodeKey(key));
    return value === undefined ? undefined : structuredClone(value);
  }

  private exists<T>(table: Map<string, T>, key: StorageKey): boolean {
    this.counts.has += 1;
    return table.has(encodeKey(key));
  }

  private write<T>(table: Map<string, T>, key: StorageKey, value: T): void {
    this.counts.writes += 1;
    table.set(encodeKey(key), structuredClone(value));
  }

  private remove<T>(table: Map<string, T>, key: StorageKey): void {
    this.counts.removes += 1;
    table.delete(encodeKey(key));
  }
}
