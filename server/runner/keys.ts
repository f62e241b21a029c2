import { stableStringify } from './hash';

export type StorageKey =
  | { kind: 'Config' }
  | { kind: 'StakeEntry'; account: string }
  | { kind: 'EscrowEntry'; depositor: string; escrow_id: number }
  | { kind: 'Payment'; payment_id: number }
  | { kind: 'PaymentCount' }
  | { kind: 'MintStats' }
  | { kind: 'Nonce'; signer_id: string; nonce: string };

export type StorageKeyKind = StorageKey['kind'];

export const configKey = (): StorageKey => ({ kind: 'Config' });

export const stakeKey = (account: string): StorageKey => ({ kind: 'StakeEntry', account });

export const escrowKey = (depositor: string, escrowId: number): StorageKey => ({
  kind: 'EscrowEntry',
  depositor,
  escrow_id: escrowId,
});

export const paymentKey = (paymentId: number): StorageKey => ({ kind: 'Payment', payment_id: paymentId });

export const paymentCountKey = (): StorageKey => ({ kind: 'PaymentCount' });

export const mintStatsKey = (): StorageKey => ({ kind: 'MintStats' });

export const nonceKey = (signerId: string, nonce: string): StorageKey => ({
  kind: 'Nonce',
  signer_id: signerId,
  nonce,
});

export function encodeKey(key: StorageKey): string {
  return stableStringify(key);
}
