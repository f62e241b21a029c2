import { readFile } from 'fs/promises';
import { z } from 'zod';
import { RunnerOperation, SignedOperation } from '../../shared/schema';
import { ValidationError } from './errors';

const principal = z.string().min(1);
const integer = z.number().int();

const stakeFields = { staker: principal, amount: integer };
const paymentRef = { payment_id: integer };

export const RunnerOperationSchema = z.discriminatedUnion('kind', [
  z
    .object({ kind: z.literal('INITIALIZE'), admin: principal, token: principal, reward_rate: integer, min_stake: integer })
    .strict(),
  z.object({ kind: z.literal('SET_ADMIN'), admin: principal, new_admin: principal }).strict(),
  z.object({ kind: z.literal('STAKE'), ...stakeFields }).strict(),
  z.object({ kind: z.literal('UNSTAKE'), ...stakeFields }).strict(),
  z
    .object({
      kind: z.literal('DISTRIBUTE_REWARDS'),
      admin: principal,
      stakers: z.array(principal),
      bonus_amounts: z.array(integer),
    })
    .strict(),
  z
    .object({
      kind: z.literal('ESCROW_LOCK'),
      depositor: principal,
      beneficiary: principal,
      amount: integer,
      unlock_ts: integer,
      escrow_id: integer,
    })
    .strict(),
  z.object({ kind: z.literal('ESCROW_RELEASE'), depositor: principal, escrow_id: integer }).strict(),
  z
    .object({
      kind: z.literal('PAYMENT_CREATE'),
      sender: principal,
      recipient: principal,
      token: principal,
      amount: integer,
      interval: integer,
      start_time: integer,
    })
    .strict(),
  z.object({ kind: z.literal('PAYMENT_EXECUTE'), ...paymentRef }).strict(),
  z.object({ kind: z.literal('PAYMENT_CANCEL'), ...paymentRef }).strict(),
  z
    .object({
      kind: z.literal('BATCH_MINT'),
      admin: principal,
      // per-request problems are reported by the mint engine, not rejected here
      requests: z.array(z.object({ recipient: z.string(), amount: z.number() }).strict()),
    })
    .strict(),
]);

export const OperationSignatureSchema = z
  .object({
    signer_id: principal,
    nonce: z.string(),
    algorithm: z.literal('ED25519'),
    signature: z.string().min(1),
  })
  .strict();

export const SignedOperationSchema = z
  .object({
    operation: RunnerOperationSchema,
    signatures: z.array(OperationSignatureSchema),
  })
  .strict();

export type LoadedOperation =
  | { kind: 'BARE'; operation: RunnerOperation }
  | { kind: 'SIGNED'; signed: SignedOperation };

function isEnvelope(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'operation' in raw;
}

export function parseOperation(raw: unknown): LoadedOperation {
  if (isEnvelope(raw)) {
    const result = SignedOperationSchema.safeParse(raw);
    if (!result.success) {
      throw new ValidationError('invalid signed operation', result.error.issues);
    }
    return { kind: 'SIGNED', signed: result.data };
  }

  const result = RunnerOperationSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('invalid operation', result.error.issues);
  }
  return { kind: 'BARE', operation: result.data };
}

export async function loadOperationFile(filePath: string): Promise<LoadedOperation> {
  const raw: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  return parseOperation(raw);
}
