/**
 * Notification payload schemas
 *
 * Every notification is published under a two-level topic
 * `{ family, operation }` and carries only primitive fields. The schemas
 * below are checked right before a notification is appended; a payload that
 * fails them aborts the operation that produced it.
 */

import { z } from 'zod';

const amount = z.number().int().positive().lte(Number.MAX_SAFE_INTEGER);
const nonNegativeAmount = z.number().int().nonnegative().lte(Number.MAX_SAFE_INTEGER);
const timestamp = z.number().int().nonnegative();
const principal = z.string().min(1);

// =============================================================================
// STAKING
// =============================================================================

export const InitializeEventSchema = z.object({
  admin: principal,
  reward_rate: z.number().int().positive(),
  min_stake: amount,
  timestamp,
}).strict();

export const AdminChangedEventSchema = z.object({
  previous_admin: principal,
  new_admin: principal,
  timestamp,
}).strict();

export const StakeEventSchema = z
  .object({
    staker: principal,
    amount,
    total: amount,
    timestamp,
  }).strict()
  .refine((data) => data.total >= data.amount, {
    message: 'total cannot be less than amount',
    path: ['total'],
  });

export const UnstakeEventSchema = z.object({
  staker: principal,
  amount,
  reward: nonNegativeAmount,
  remaining: nonNegativeAmount,
  timestamp,
}).strict();

export const BatchSettledEventSchema = z.object({
  recipient_count: z.number().int().positive(),
  total_amount: amount,
  timestamp,
}).strict();

// =============================================================================
// ESCROW
// =============================================================================

export const EscrowLockedEventSchema = z
  .object({
    depositor: principal,
    beneficiary: principal,
    amount,
    unlock_ts: timestamp,
    timestamp,
  }).strict()
  .refine((data) => data.unlock_ts > data.timestamp, {
    message: 'unlock_ts must be in the future',
    path: ['unlock_ts'],
  });

export const EscrowReleasedEventSchema = z.object({
  beneficiary: principal,
  amount,
  timestamp,
}).strict();

// =============================================================================
// RECURRING PAYMENTS
// =============================================================================

const paymentId = z.number().int().positive();

export const PaymentCreatedEventSchema = z.object({
  payment_id: paymentId,
  sender: principal,
  recipient: principal,
  amount,
  interval: z.number().int().positive(),
  next_execution: timestamp,
  timestamp,
}).strict();

export const PaymentExecutedEventSchema = z
  .object({
    payment_id: paymentId,
    amount,
    next_execution: timestamp,
    timestamp,
  }).strict()
  .refine((data) => data.next_execution > data.timestamp, {
    message: 'next_execution must be after the execution time',
    path: ['next_execution'],
  });

export const PaymentCanceledEventSchema = z.object({
  payment_id: paymentId,
  sender: principal,
  timestamp,
}).strict();

// =============================================================================
// MINT
// =============================================================================

export const BatchMintedEventSchema = z
  .object({
    batch_id: z.number().int().positive(),
    total_requests: z.number().int().positive(),
    successful: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    total_amount: nonNegativeAmount,
    large_mints: z.number().int().nonnegative(),
    timestamp,
  }).strict()
  .refine((data) => data.successful + data.failed === data.total_requests, {
    message: 'successful + failed must equal total_requests',
    path: ['total_requests'],
  })
  .refine((data) => data.successful > 0 || data.total_amount === 0, {
    message: 'total_amount must be 0 when nothing was minted',
    path: ['total_amount'],
  })
  .refine((data) => data.large_mints <= data.successful, {
    message: 'large_mints cannot exceed successful',
    path: ['large_mints'],
  });

export type InitializeEventData = z.infer<typeof InitializeEventSchema>;
export type AdminChangedEventData = z.infer<typeof AdminChangedEventSchema>;
export type StakeEventData = z.infer<typeof StakeEventSchema>;
export type UnstakeEventData = z.infer<typeof UnstakeEventSchema>;
export type BatchSettledEventData = z.infer<typeof BatchSettledEventSchema>;
export type EscrowLockedEventData = z.infer<typeof EscrowLockedEventSchema>;
export type EscrowReleasedEventData = z.infer<typeof EscrowReleasedEventSchema>;
export type PaymentCreatedEventData = z.infer<typeof PaymentCreatedEventSchema>;
export type PaymentExecutedEventData = z.infer<typeof PaymentExecutedEventSchema>;
export type PaymentCanceledEventData = z.infer<typeof PaymentCanceledEventSchema>;
export type BatchMintedEventData = z.infer<typeof BatchMintedEventSchema>;

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export type NotificationBody =
  | { family: 'STAKING'; operation: 'INITIALIZE'; payload: InitializeEventData }
  | { family: 'STAKING'; operation: 'ADMIN_CHANGED'; payload: AdminChangedEventData }
  | { family: 'STAKING'; operation: 'STAKE'; payload: StakeEventData }
  | { family: 'STAKING'; operation: 'UNSTAKE'; payload: UnstakeEventData }
  | { family: 'STAKING'; operation: 'BATCH_SETTLED'; payload: BatchSettledEventData }
  | { family: 'ESCROW'; operation: 'ESCROW_LOCKED'; payload: EscrowLockedEventData }
  | { family: 'ESCROW'; operation: 'ESCROW_RELEASED'; payload: EscrowReleasedEventData }
  | { family: 'RECURRING'; operation: 'PAYMENT_CREATED'; payload: PaymentCreatedEventData }
  | { family: 'RECURRING'; operation: 'PAYMENT_EXECUTED'; payload: PaymentExecutedEventData }
  | { family: 'RECURRING'; operation: 'PAYMENT_CANCELED'; payload: PaymentCanceledEventData }
  | { family: 'MINT'; operation: 'BATCH_MINTED'; payload: BatchMintedEventData };

export type NotificationFamily = NotificationBody['family'];
export type NotificationOperation = NotificationBody['operation'];

export interface NotificationMeta {
  id: string;
  sequence: number;
  timestamp: number;
  prev_hash: string;
  event_hash: string;
}

/**
 * Notification — an appended, hash-chained record of a completed change
 */
export type Notification = NotificationBody & NotificationMeta;
