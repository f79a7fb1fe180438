import algosdk from 'algosdk';
import { MAX_UINT64 } from './constants';
import { InvalidAmountError, VaultError } from './errors';

type VaultErrorType = new (message: string) => VaultError;

/**
 * Contract-style guard: throws `new ErrorType(message)` when the condition fails.
 */
export function assert(condition: unknown, ErrorType: VaultErrorType, message: string): asserts condition {
  if (!condition) {
    throw new ErrorType(message);
  }
}

export function assertUint64(value: bigint, label: string): void {
  assert(value >= 0n && value <= MAX_UINT64, InvalidAmountError, `${label} must be a uint64`);
}

export function assertAddress(value: string, label: string): void {
  assert(algosdk.isValidAddress(value), InvalidAmountError, `${label} is not a valid address`);
}

/**
 * Returns floor(n1 * n2 / d); the result must still fit a uint64
 */
export function mulDivFloor(n1: bigint, n2: bigint, d: bigint): bigint {
  assert(d > 0n, InvalidAmountError, 'Division by zero in mulDivFloor');
  const q = (n1 * n2) / d;
  assert(q <= MAX_UINT64, InvalidAmountError, 'Multiplication overflow in mulDivFloor');
  return q;
}
