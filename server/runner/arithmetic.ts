import { CUSTODY_ACCOUNT_ID } from './constants';
import { ArithmeticError, ValidationError } from './errors';

export function assertPositiveAmount(value: number, label: string): void {
  if (Number.isInteger(value) && value > Number.MAX_SAFE_INTEGER) {
    throw new ArithmeticError(`${label} exceeds the supported amount range`, { value, max: Number.MAX_SAFE_INTEGER });
  }
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${label} must be a positive integer`, { value });
  }
}

export function assertNonNegativeInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${label} must be a non-negative integer`, { value });
  }
}

export function assertPrincipal(value: string, label: string): void {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${label} is required`);
  }
}

/** A principal that can own funds; the custody account is reserved for the runner itself. */
export function assertUserPrincipal(value: string, label: string): void {
  assertPrincipal(value, label);
  if (value === CUSTODY_ACCOUNT_ID) {
    throw new ValidationError(`${label} cannot be the custody account`);
  }
}

export function checkedAdd(a: number, b: number, label: string): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new ArithmeticError(`${label} overflow`, { a, b });
  }
  return sum;
}

export function checkedMul(a: number, b: number, label: string): number {
  const product = BigInt(a) * BigInt(b);
  return narrow(product, label);
}

/** Converts a wide intermediate back to a safe integer, failing instead of losing precision. */
export function narrow(value: bigint, label: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new ArithmeticError(`${label} overflow`, { value: value.toString() });
  }
  return Number(value);
}
