import type algosdk from 'algosdk';
import type { FeeSchedule } from './FeeSchedule';
import type { RewardConverter } from './RewardConverter';
import type { StakingAdapter } from './StakingAdapter';

/**
 * Fungible asset ledger the vault moves deposit and reward assets through.
 * `transfer` and `transferFrom` report failure by returning false.
 */
export interface AssetLedger {
  readonly id: bigint;
  readonly name: string;
  balanceOf(owner: string): bigint;
  allowance(owner: string, spender: string): bigint;
  approve(owner: string, spender: string, amount: bigint): void;
  transfer(from: string, to: string, amount: bigint): boolean;
  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
  nonces(owner: string): bigint;
  /** Signed approval: sets `allowance(owner, spender)` to `amount` once the signature checks out */
  permit(owner: string, spender: string, amount: bigint, deadline: bigint, signature: Uint8Array): void;
}

/** Share balances; the vault only mints, burns and reads */
export interface ShareLedger {
  totalSupply(): bigint;
  balanceOf(account: string): bigint;
  mint(account: string, amount: bigint): void;
  burn(account: string, amount: bigint): void;
  transfer(from: string, to: string, amount: bigint): void;
}

/**
 * Who is calling. `callerAppId` is 0 for a call signed directly by an account and
 * the calling application's ID when the call arrives through another contract.
 */
export interface CallContext {
  sender: string;
  callerAppId: bigint;
}

export function callFrom(sender: string | algosdk.Address, callerAppId: bigint = 0n): CallContext {
  return { sender: sender.toString(), callerAppId };
}

export type VaultEvent =
  | { name: 'Deposit'; account: string; amount: bigint }
  | { name: 'Withdraw'; account: string; amount: bigint }
  | { name: 'Reinvest'; newTotalDeposits: bigint; newTotalSupply: bigint }
  | { name: 'UpdateAdminFee'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateDevFee'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateReinvestReward'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateMinTokensToReinvest'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateMaxTokensToDepositWithoutReinvest'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateMaxSlippage'; oldValue: bigint; newValue: bigint }
  | { name: 'UpdateDevAddr'; oldValue: string; newValue: string }
  | { name: 'DepositsEnabled'; newValue: boolean }
  | { name: 'OwnershipTransferred'; previousOwner: string; newOwner: string }
  | { name: 'Recovered'; assetId: bigint; amount: bigint };

/**
 * What the reinvestment engine and share accounting read from the vault they serve
 */
export interface VaultContext {
  readonly address: string;
  readonly poolId: bigint;
  readonly depositAsset: AssetLedger;
  readonly rewardAsset: AssetLedger;
  readonly poolRewardAsset: AssetLedger;
  readonly stakingAdapter: StakingAdapter;
  readonly rewardConverter: RewardConverter;
  readonly shares: ShareLedger;
  readonly fees: FeeSchedule;
  readonly owner: string;
  readonly devAddr: string;
  readonly depositsEnabled: boolean;
  readonly maxTokensToDepositWithoutReinvest: bigint;
  readonly maxSlippageBips: bigint;
  totalDeposits(): bigint;
  emit(event: VaultEvent): void;
}
