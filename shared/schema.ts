/**
 * Settlement Runner — Core Type Definitions
 *
 * These types define the fundamental data structures for:
 * - Records (stake positions, escrow entries, recurring payments)
 * - Configuration (set once at initialization)
 * - Operations (the inputs the runner accepts)
 * - Outcomes (what each operation returns to its caller)
 *
 * Amounts are integer token units, timestamps are unix seconds.
 */

// =============================================================================
// RECORDS
// =============================================================================

/**
 * RunnerConfig — process-wide settings, written exactly once
 */
export interface RunnerConfig {
  admin: string;
  token: string;
  reward_rate: number; // basis points per year, 1200 = 12%
  min_stake: number;
  initialized_at: number;
}

/**
 * StakePosition — one per account; absent means zero balance
 */
export interface StakePosition {
  balance: number;
  staked_at: number; // start of the current accrual window
}

/**
 * EscrowEntry — one per (depositor, escrow_id); existence means funds are held
 */
export interface EscrowEntry {
  depositor: string;
  beneficiary: string;
  amount: number;
  unlock_ts: number;
}

/**
 * RecurringPayment — one per payment id
 */
export interface RecurringPayment {
  sender: string;
  recipient: string;
  token: string;
  amount: number;
  interval: number; // seconds
  next_execution: number;
  active: boolean;
}

export interface MintStats {
  total_minted: number;
  total_batches_processed: number;
  last_batch_id: number;
}

// =============================================================================
// OPERATIONS
// =============================================================================

export interface InitializeInput {
  admin: string;
  token: string;
  reward_rate: number;
  min_stake: number;
}

export interface SetAdminInput {
  admin: string;
  new_admin: string;
}

export interface StakeInput {
  staker: string;
  amount: number;
}

export interface DistributeRewardsInput {
  admin: string;
  stakers: string[];
  bonus_amounts: number[];
}

export interface EscrowLockInput {
  depositor: string;
  beneficiary: string;
  amount: number;
  unlock_ts: number;
  escrow_id: number;
}

export interface EscrowReleaseInput {
  depositor: string;
  escrow_id: number;
}

export interface CreatePaymentInput {
  sender: string;
  recipient: string;
  token: string;
  amount: number;
  interval: number;
  start_time: number;
}

export interface PaymentRefInput {
  payment_id: number;
}

export interface MintRequest {
  recipient: string;
  amount: number;
}

export interface BatchMintInput {
  admin: string;
  requests: MintRequest[];
}

export type RunnerOperation =
  | ({ kind: 'INITIALIZE' } & InitializeInput)
  | ({ kind: 'SET_ADMIN' } & SetAdminInput)
  | ({ kind: 'STAKE' } & StakeInput)
  | ({ kind: 'UNSTAKE' } & StakeInput)
  | ({ kind: 'DISTRIBUTE_REWARDS' } & DistributeRewardsInput)
  | ({ kind: 'ESCROW_LOCK' } & EscrowLockInput)
  | ({ kind: 'ESCROW_RELEASE' } & EscrowReleaseInput)
  | ({ kind: 'PAYMENT_CREATE' } & CreatePaymentInput)
  | ({ kind: 'PAYMENT_EXECUTE' } & PaymentRefInput)
  | ({ kind: 'PAYMENT_CANCEL' } & PaymentRefInput)
  | ({ kind: 'BATCH_MINT' } & BatchMintInput);

export type OperationKind = RunnerOperation['kind'];

export interface OperationSignature {
  signer_id: string;
  nonce: string;
  algorithm: 'ED25519';
  signature: string;
}

/**
 * SignedOperation — an operation plus the signatures proving its principals
 */
export interface SignedOperation {
  operation: RunnerOperation;
  signatures: OperationSignature[];
}

// =============================================================================
// OUTCOMES
// =============================================================================

export interface StakeOutcome {
  staker: string;
  amount: number;
  reward: number;
  total: number;
}

export interface UnstakeOutcome {
  staker: string;
  amount: number;
  reward: number;
  payout: number;
  remaining: number;
}

export interface SettledAccount {
  account: string;
  reward: number;
  bonus: number;
  balance: number;
}

export interface BatchSettlement {
  recipient_count: number;
  total_amount: number;
  settled: SettledAccount[];
}

export interface PaymentCreated {
  payment_id: number;
}

export interface PaymentExecution {
  payment_id: number;
  amount: number;
  next_execution: number;
  intervals_skipped: number;
}

export type MintFailureCode = 'INVALID_AMOUNT' | 'AMOUNT_OUT_OF_RANGE' | 'INVALID_RECIPIENT';

export type MintResult =
  | { status: 'SUCCESS'; recipient: string; amount: number }
  | { status: 'FAILURE'; recipient: string; amount: number; code: MintFailureCode };

export interface BatchMintMetrics {
  total_requests: number;
  successful_mints: number;
  failed_mints: number;
  total_amount_minted: number;
  avg_mint_amount: number;
  large_mints: number;
}

export interface BatchMintResult {
  batch_id: number;
  token: string;
  total_requests: number;
  successful: number;
  failed: number;
  results: MintResult[];
  metrics: BatchMintMetrics;
}

export type OperationOutput =
  | RunnerConfig
  | StakeOutcome
  | UnstakeOutcome
  | BatchSettlement
  | EscrowEntry
  | PaymentCreated
  | PaymentExecution
  | RecurringPayment
  | BatchMintResult;
