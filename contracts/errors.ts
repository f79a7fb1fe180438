// Every vault failure surfaces as a VaultError subclass with a stable code.
// Nothing in the vault catches these: the atomic scope rolls state back and rethrows.

export type VaultErrorCode =
  | 'CONFIGURATION'
  | 'DEPOSITS_DISABLED'
  | 'TRANSFER_FAILED'
  | 'INSUFFICIENT_STAKE'
  | 'INSUFFICIENT_RESCUE'
  | 'BELOW_THRESHOLD'
  | 'SLIPPAGE'
  | 'PERMISSION_DENIED'
  | 'REENTRANT_CALL'
  | 'ZERO_AMOUNT'
  | 'INSUFFICIENT_SHARES'
  | 'UNBACKED_SHARES'
  | 'INVALID_AMOUNT'
  | 'INVALID_PERMIT';

export class VaultError extends Error {
  readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends VaultError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class DepositsDisabledError extends VaultError {
  constructor(message = 'Deposits are disabled') {
    super('DEPOSITS_DISABLED', message);
  }
}

export class TransferError extends VaultError {
  constructor(message: string) {
    super('TRANSFER_FAILED', message);
  }
}

export class InsufficientStakeError extends VaultError {
  constructor(message: string) {
    super('INSUFFICIENT_STAKE', message);
  }
}

export class InsufficientRescueError extends VaultError {
  constructor(message: string) {
    super('INSUFFICIENT_RESCUE', message);
  }
}

export class BelowThresholdError extends VaultError {
  constructor(message = 'Reward below minimum reinvest threshold') {
    super('BELOW_THRESHOLD', message);
  }
}

export class SlippageError extends VaultError {
  constructor(message = 'Swap output below minimum') {
    super('SLIPPAGE', message);
  }
}

export class PermissionError extends VaultError {
  constructor(message: string, code: 'PERMISSION_DENIED' | 'REENTRANT_CALL' = 'PERMISSION_DENIED') {
    super(code, message);
  }
}

export class ZeroAmountError extends VaultError {
  constructor(message: string) {
    super('ZERO_AMOUNT', message);
  }
}

export class InsufficientSharesError extends VaultError {
  constructor(message = 'Insufficient shares') {
    super('INSUFFICIENT_SHARES', message);
  }
}

export class UnbackedSharesError extends VaultError {
  constructor(message = 'Outstanding shares have no staked deposits behind them') {
    super('UNBACKED_SHARES', message);
  }
}

export class InvalidAmountError extends VaultError {
  constructor(message: string) {
    super('INVALID_AMOUNT', message);
  }
}

export class PermitError extends VaultError {
  constructor(message: string) {
    super('INVALID_PERMIT', message);
  }
}
