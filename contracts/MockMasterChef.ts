// MockMasterChef.ts - Mock MasterChef staking contract for testing
// Holds one position per (pid, user), charges deposit and withdraw fees, and mints
// reward tokens on harvest. Rewards accrue only when a test calls accrueReward,
// which stands in for block emissions.

import type { AtomicRuntime, Journaled } from './AtomicRuntime';
import { BIPS_DIVISOR } from './constants';
import { ConfigurationError, InsufficientStakeError } from './errors';
import { assert, assertAddress, mulDivFloor } from './math';
import type { MockAsset } from './MockAsset';
import { safeTransfer, safeTransferFrom } from './transfers';
import type { MasterChefPool, MasterChefPoolInfo } from './adapters/MasterChefAdapter';
import type { AssetLedger } from './types';

interface ChefPool extends MasterChefPoolInfo {
  depositAsset: AssetLedger;
  emergencyPenaltyBips: bigint;
  frozen: boolean;
}

interface MockMasterChefState {
  pools: ChefPool[];
  positions: Map<string, bigint>;
  pending: Map<string, bigint>;
}

export class MockMasterChef implements MasterChefPool, Journaled<MockMasterChefState> {
  private pools: ChefPool[] = [];
  private positions = new Map<string, bigint>();
  private pending = new Map<string, bigint>();

  constructor(
    runtime: AtomicRuntime,
    readonly address: string,
    readonly rewardAsset: MockAsset,
    readonly feeRecipient: string,
  ) {
    assertAddress(address, 'Chef address');
    assertAddress(feeRecipient, 'Fee recipient');
    runtime.register(this);
  }

  /** @returns the new pool's pid */
  addPool(depositAsset: AssetLedger, depositFeeBips = 0n, withdrawFeeBips = 0n): bigint {
    assert(depositFeeBips <= BIPS_DIVISOR, ConfigurationError, 'Deposit fee too high');
    assert(withdrawFeeBips <= BIPS_DIVISOR, ConfigurationError, 'Withdraw fee too high');
    this.pools.push({ depositAsset, depositFeeBips, withdrawFeeBips, emergencyPenaltyBips: 0n, frozen: false });
    return BigInt(this.pools.length - 1);
  }

  poolInfo(pid: bigint): MasterChefPoolInfo {
    const { depositFeeBips, withdrawFeeBips } = this.pool(pid);
    return { depositFeeBips, withdrawFeeBips };
  }

  userAmount(pid: bigint, user: string): bigint {
    return this.positions.get(positionKey(pid, user)) ?? 0n;
  }

  pendingReward(pid: bigint, user: string): bigint {
    return this.pending.get(positionKey(pid, user)) ?? 0n;
  }

  /**
   * Test helper: credit `amount` of unclaimed reward to a position
   */
  accrueReward(pid: bigint, user: string, amount: bigint): void {
    this.pool(pid);
    const key = positionKey(pid, user);
    this.pending.set(key, this.pendingReward(pid, user) + amount);
  }

  /** Test helper: block deposits and withdrawals, leaving only emergencyWithdraw */
  setFrozen(pid: bigint, frozen: boolean): void {
    this.pool(pid).frozen = frozen;
  }

  /** Test helper: share of a position kept by the pool on emergencyWithdraw */
  setEmergencyPenalty(pid: bigint, penaltyBips: bigint): void {
    assert(penaltyBips <= BIPS_DIVISOR, ConfigurationError, 'Penalty too high');
    this.pool(pid).emergencyPenaltyBips = penaltyBips;
  }

  setFees(pid: bigint, depositFeeBips: bigint, withdrawFeeBips: bigint): void {
    const pool = this.pool(pid);
    pool.depositFeeBips = depositFeeBips;
    pool.withdrawFeeBips = withdrawFeeBips;
  }

  /**
   * Harvests pending reward, then stakes `amount` (0 = harvest only).
   * The position is credited with what actually arrived, minus the deposit fee.
   */
  deposit(sender: string, pid: bigint, amount: bigint): void {
    const pool = this.pool(pid);
    assert(!pool.frozen, ConfigurationError, 'Pool is frozen');

    this.harvest(pid, sender);
    if (amount === 0n) {
      return;
    }

    const balanceBefore = pool.depositAsset.balanceOf(this.address);
    safeTransferFrom(pool.depositAsset, this.address, sender, this.address, amount);
    const received = pool.depositAsset.balanceOf(this.address) - balanceBefore;

    const fee = mulDivFloor(received, pool.depositFeeBips, BIPS_DIVISOR);
    if (fee > 0n) {
      safeTransfer(pool.depositAsset, this.address, this.feeRecipient, fee);
    }

    const key = positionKey(pid, sender);
    this.positions.set(key, this.userAmount(pid, sender) + received - fee);
  }

  withdraw(sender: string, pid: bigint, amount: bigint): void {
    const pool = this.pool(pid);
    assert(!pool.frozen, ConfigurationError, 'Pool is frozen');

    const position = this.userAmount(pid, sender);
    assert(amount <= position, InsufficientStakeError, 'Withdraw exceeds position');

    this.harvest(pid, sender);
    this.positions.set(positionKey(pid, sender), position - amount);

    const fee = mulDivFloor(amount, pool.withdrawFeeBips, BIPS_DIVISOR);
    if (fee > 0n) {
      safeTransfer(pool.depositAsset, this.address, this.feeRecipient, fee);
    }
    safeTransfer(pool.depositAsset, this.address, sender, amount - fee);
  }

  /**
   * Returns the whole position without rewards, less any emergency penalty.
   * Works even while the pool is frozen.
   */
  emergencyWithdraw(sender: string, pid: bigint): void {
    const pool = this.pool(pid);
    const key = positionKey(pid, sender);
    const position = this.userAmount(pid, sender);

    this.positions.set(key, 0n);
    this.pending.delete(key);

    const penalty = mulDivFloor(position, pool.emergencyPenaltyBips, BIPS_DIVISOR);
    if (position - penalty > 0n) {
      safeTransfer(pool.depositAsset, this.address, sender, position - penalty);
    }
  }

  snapshot(): MockMasterChefState {
    return {
      pools: this.pools.map((pool) => ({ ...pool })),
      positions: new Map(this.positions),
      pending: new Map(this.pending),
    };
  }

  restore(state: MockMasterChefState): void {
    this.pools = state.pools.map((pool) => ({ ...pool }));
    this.positions = new Map(state.positions);
    this.pending = new Map(state.pending);
  }

  private pool(pid: bigint): ChefPool {
    const pool = this.pools[Number(pid)];
    assert(pool !== undefined, ConfigurationError, `Unknown pool ${pid}`);
    return pool;
  }

  private harvest(pid: bigint, user: string): void {
    const reward = this.pendingReward(pid, user);
    if (reward > 0n) {
      this.pending.delete(positionKey(pid, user));
      this.rewardAsset.mint(user, reward);
    }
  }
}

function positionKey(pid: bigint, user: string): string {
  return `${pid}:${user}`;
}
