/**
 * Capability set the vault needs from an underlying staking pool.
 *
 * One implementation exists per pool family; each is bound to the account it
 * stakes for, so `stake` and `unstake` move that account's funds. Fee rates are
 * expressed against `feeDenominator()`.
 */
export interface StakingAdapter {
  /** Account that must hold an allowance on the deposit asset for `stake` to pull funds */
  readonly spender: string;

  stake(poolId: bigint, amount: bigint): void;

  /** Throws InsufficientStakeError when `amount` exceeds the staked position */
  unstake(poolId: bigint, amount: bigint): void;

  /** Best-effort full exit; pending rewards may be forfeited */
  emergencyUnstake(poolId: bigint): void;

  harvestRewards(poolId: bigint): void;

  pendingRewardEstimate(poolId: bigint, holder: string): bigint;

  stakedBalance(poolId: bigint, holder: string): bigint;

  depositFeeBips(poolId: bigint): bigint;

  withdrawFeeBips(poolId: bigint): bigint;

  feeDenominator(): bigint;
}
