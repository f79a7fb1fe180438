// MasterChefAdapter.ts - StakingAdapter for MasterChef-style staking pools
// Pools are addressed by pid. Staking is deposit(pid, amount) with the pool pulling
// funds through an allowance; deposit(pid, 0) harvests. Entry and exit fees are
// charged by the pool in basis points of 10_000.

import { BIPS_DIVISOR } from '../constants';
import { InsufficientStakeError } from '../errors';
import { assert } from '../math';
import type { StakingAdapter } from '../StakingAdapter';

export interface MasterChefPoolInfo {
  depositFeeBips: bigint;
  withdrawFeeBips: bigint;
}

/**
 * The surface of a MasterChef staking contract. `sender` is the account acting.
 */
export interface MasterChefPool {
  readonly address: string;
  poolInfo(pid: bigint): MasterChefPoolInfo;
  userAmount(pid: bigint, user: string): bigint;
  pendingReward(pid: bigint, user: string): bigint;
  deposit(sender: string, pid: bigint, amount: bigint): void;
  withdraw(sender: string, pid: bigint, amount: bigint): void;
  emergencyWithdraw(sender: string, pid: bigint): void;
}

export class MasterChefAdapter implements StakingAdapter {
  constructor(
    private readonly chef: MasterChefPool,
    private readonly account: string,
  ) {}

  get spender(): string {
    return this.chef.address;
  }

  stake(poolId: bigint, amount: bigint): void {
    this.chef.deposit(this.account, poolId, amount);
  }

  unstake(poolId: bigint, amount: bigint): void {
    const position = this.chef.userAmount(poolId, this.account);
    assert(amount <= position, InsufficientStakeError, `Unstake of ${amount} exceeds staked position ${position}`);
    this.chef.withdraw(this.account, poolId, amount);
  }

  emergencyUnstake(poolId: bigint): void {
    this.chef.emergencyWithdraw(this.account, poolId);
  }

  harvestRewards(poolId: bigint): void {
    this.chef.deposit(this.account, poolId, 0n);
  }

  pendingRewardEstimate(poolId: bigint, holder: string): bigint {
    return this.chef.pendingReward(poolId, holder);
  }

  stakedBalance(poolId: bigint, holder: string): bigint {
    return this.chef.userAmount(poolId, holder);
  }

  depositFeeBips(poolId: bigint): bigint {
    return this.chef.poolInfo(poolId).depositFeeBips;
  }

  withdrawFeeBips(poolId: bigint): bigint {
    return this.chef.poolInfo(poolId).withdrawFeeBips;
  }

  feeDenominator(): bigint {
    return BIPS_DIVISOR;
  }
}
