// CompoundingVault.ts - Auto-compounding staking vault
// Users deposit an asset that is staked with an external pool; pool rewards are
// periodically harvested, swapped back into the deposit asset and staked again.
// Uses share-based accounting: compounded rewards raise the value of every share,
// and a withdrawal returns the holder's proportion of the staked position.

import algosdk from 'algosdk';
import type { AtomicRuntime, Journaled } from './AtomicRuntime';
import { DEFAULT_SLIPPAGE_BPS, MAX_SLIPPAGE_BPS, MAX_UINT64, SCALE } from './constants';
import {
  BelowThresholdError,
  ConfigurationError,
  InsufficientRescueError,
  PermissionError,
  ZeroAmountError,
} from './errors';
import { FeeSchedule, type FeeRates } from './FeeSchedule';
import { assert, assertAddress, assertUint64, mulDivFloor } from './math';
import { ReinvestmentEngine } from './ReinvestmentEngine';
import type { RewardConverter } from './RewardConverter';
import { ShareAccounting } from './ShareAccounting';
import type { StakingAdapter } from './StakingAdapter';
import { safeTransfer } from './transfers';
import type { AssetLedger, CallContext, ShareLedger, VaultContext, VaultEvent } from './types';

export interface CreateVaultParams {
  runtime: AtomicRuntime;
  appId: bigint;
  creator: string;
  devAddr: string;
  depositAsset: AssetLedger;
  rewardAsset: AssetLedger;
  poolRewardAsset: AssetLedger;
  poolId: bigint;
  /** Builds the pool adapter bound to the vault's own address */
  stakingAdapter: (vaultAddress: string) => StakingAdapter;
  /** Builds the converter bound to the vault's own address */
  rewardConverter: (vaultAddress: string) => RewardConverter;
  shares: ShareLedger;
  fees: FeeRates;
  minTokensToReinvest: bigint;
  maxTokensToDepositWithoutReinvest?: bigint;
  maxSlippageBips?: bigint;
  depositsEnabled?: boolean;
}

export interface VaultStats {
  totalShares: bigint;
  totalDeposits: bigint;
  estimatedTotalReward: bigint;
  sharePrice: bigint; // scaled by SCALE
}

interface VaultState {
  owner: string;
  devAddr: string;
  fees: FeeRates;
  minTokensToReinvest: bigint;
  maxTokensToDepositWithoutReinvest: bigint;
  maxSlippageBips: bigint;
  depositsEnabled: boolean;
  eventCount: number;
}

export class CompoundingVault implements VaultContext, Journaled<VaultState> {
  readonly appId: bigint;
  readonly address: string;
  readonly poolId: bigint;
  readonly depositAsset: AssetLedger;
  readonly rewardAsset: AssetLedger;
  readonly poolRewardAsset: AssetLedger;
  readonly stakingAdapter: StakingAdapter;
  readonly rewardConverter: RewardConverter;
  readonly shares: ShareLedger;
  readonly fees: FeeSchedule;

  private _owner: string;
  private _devAddr: string;
  private _minTokensToReinvest: bigint;
  private _maxTokensToDepositWithoutReinvest: bigint;
  private _maxSlippageBips: bigint;
  private _depositsEnabled: boolean;
  private events: VaultEvent[] = [];
  private locked = false;

  private readonly runtime: AtomicRuntime;
  private readonly engine: ReinvestmentEngine;
  private readonly accounting: ShareAccounting;

  /**
   * Create and initialize the vault. Validates the configuration, approves the pool and
   * swap venue, and records a zero-valued Reinvest event as the baseline.
   */
  constructor(params: CreateVaultParams) {
    const maxTokensToDepositWithoutReinvest = params.maxTokensToDepositWithoutReinvest ?? 0n;
    const maxSlippageBips = params.maxSlippageBips ?? DEFAULT_SLIPPAGE_BPS;

    assertAddress(params.creator, 'Creator');
    assertAddress(params.devAddr, 'Dev address');
    assert(params.appId > 0n, ConfigurationError, 'Invalid app ID');
    assertUint64(params.minTokensToReinvest, 'Minimum tokens to reinvest');
    assertUint64(maxTokensToDepositWithoutReinvest, 'Maximum tokens to deposit without reinvest');
    assert(maxSlippageBips >= 0n && maxSlippageBips <= MAX_SLIPPAGE_BPS, ConfigurationError, 'Slippage too high (max 10%)');
    assert(params.depositAsset.id !== params.poolRewardAsset.id, ConfigurationError, 'Deposit and pool reward assets must be different');

    this.runtime = params.runtime;
    this.appId = params.appId;
    this.address = algosdk.getApplicationAddress(params.appId).toString();
    this.poolId = params.poolId;
    this.depositAsset = params.depositAsset;
    this.rewardAsset = params.rewardAsset;
    this.poolRewardAsset = params.poolRewardAsset;
    this.stakingAdapter = params.stakingAdapter(this.address);
    this.rewardConverter = params.rewardConverter(this.address);
    this.shares = params.shares;
    this.fees = new FeeSchedule(params.fees);

    for (const [from, to] of this.conversionRoutes()) {
      assert(
        this.rewardConverter.supportsPair(from.id, to.id),
        ConfigurationError,
        `Swap venue does not support ${from.name} to ${to.name}`,
      );
    }

    this._owner = params.creator;
    this._devAddr = params.devAddr;
    this._minTokensToReinvest = params.minTokensToReinvest;
    this._maxTokensToDepositWithoutReinvest = maxTokensToDepositWithoutReinvest;
    this._maxSlippageBips = maxSlippageBips;
    this._depositsEnabled = params.depositsEnabled ?? true;

    this.engine = new ReinvestmentEngine(this);
    this.accounting = new ShareAccounting(this, this.engine);

    this.runtime.register(this);
    this.approveAll(MAX_UINT64);
    this.emit({ name: 'Reinvest', newTotalDeposits: 0n, newTotalSupply: 0n });
  }

  // ============================================
  // STATE ACCESSORS
  // ============================================

  get owner(): string {
    return this._owner;
  }

  get devAddr(): string {
    return this._devAddr;
  }

  get minTokensToReinvest(): bigint {
    return this._minTokensToReinvest;
  }

  get maxTokensToDepositWithoutReinvest(): bigint {
    return this._maxTokensToDepositWithoutReinvest;
  }

  get maxSlippageBips(): bigint {
    return this._maxSlippageBips;
  }

  get depositsEnabled(): boolean {
    return this._depositsEnabled;
  }

  emit(event: VaultEvent): void {
    this.events.push(event);
  }

  getEvents(): readonly VaultEvent[] {
    return [...this.events];
  }

  // ============================================
  // DEPOSIT / WITHDRAW
  // ============================================

  deposit(ctx: CallContext, amount: bigint): void {
    this.depositFor(ctx, ctx.sender, amount);
  }

  /**
   * Pulls `amount` from the caller and mints the shares to `account`
   */
  depositFor(ctx: CallContext, account: string, amount: bigint): void {
    this.execute(() => {
      assertAddress(account, 'Deposit account');
      assertUint64(amount, 'Deposit amount');
      this.accounting.deposit(ctx.sender, account, amount);
    });
  }

  /**
   * Deposit authorised by a signed permit instead of a prior approval
   */
  depositWithPermit(ctx: CallContext, amount: bigint, deadline: bigint, signature: Uint8Array): void {
    this.execute(() => {
      assertUint64(amount, 'Deposit amount');
      this.depositAsset.permit(ctx.sender, this.address, amount, deadline, signature);
      this.accounting.deposit(ctx.sender, ctx.sender, amount);
    });
  }

  withdraw(ctx: CallContext, shareAmount: bigint): void {
    this.execute(() => {
      assertUint64(shareAmount, 'Share amount');
      this.accounting.withdraw(ctx.sender, shareAmount);
    });
  }

  // ============================================
  // REINVEST
  // ============================================

  /**
   * Compounds pending rewards. Only accounts calling directly may reinvest; the caller
   * earns the reinvest reward.
   */
  reinvest(ctx: CallContext): void {
    this.execute(() => {
      assert(ctx.callerAppId === 0n, PermissionError, 'Reinvest must be called directly by an account');
      const estimatedTotalReward = this.engine.checkReward();
      assert(
        estimatedTotalReward >= this._minTokensToReinvest,
        BelowThresholdError,
        `Reward ${estimatedTotalReward} below minimum ${this._minTokensToReinvest}`,
      );
      this.engine.reinvest(ctx.sender);
    });
  }

  // ============================================
  // READ-ONLY METHODS
  // ============================================

  checkReward(): bigint {
    return this.engine.checkReward();
  }

  totalDeposits(): bigint {
    return this.stakingAdapter.stakedBalance(this.poolId, this.address);
  }

  totalShares(): bigint {
    return this.shares.totalSupply();
  }

  balanceOf(account: string): bigint {
    return this.shares.balanceOf(account);
  }

  /**
   * Deposit assets the vault would get back if it left the pool now, net of the exit fee
   */
  estimateDeployedBalance(): bigint {
    const depositBalance = this.totalDeposits();
    const withdrawFee = mulDivFloor(
      depositBalance,
      this.stakingAdapter.withdrawFeeBips(this.poolId),
      this.stakingAdapter.feeDenominator(),
    );
    return depositBalance - withdrawFee;
  }

  sharesForAssets(assetAmount: bigint): bigint {
    return this.accounting.sharesForAssets(assetAmount);
  }

  assetsForShares(shareAmount: bigint): bigint {
    return this.accounting.assetsForShares(shareAmount);
  }

  getVaultStats(): VaultStats {
    const totalShares = this.totalShares();
    const totalDeposits = this.totalDeposits();
    return {
      totalShares,
      totalDeposits,
      estimatedTotalReward: this.checkReward(),
      sharePrice: totalShares === 0n ? SCALE : mulDivFloor(totalDeposits, SCALE, totalShares),
    };
  }

  // ============================================
  // ADMIN METHODS
  // ============================================

  updateMinTokensToReinvest(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      assertUint64(newValue, 'Minimum tokens to reinvest');
      this.emit({ name: 'UpdateMinTokensToReinvest', oldValue: this._minTokensToReinvest, newValue });
      this._minTokensToReinvest = newValue;
    });
  }

  /** 0 disables the reinvest that deposits otherwise trigger */
  updateMaxTokensToDepositWithoutReinvest(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      assertUint64(newValue, 'Maximum tokens to deposit without reinvest');
      this.emit({
        name: 'UpdateMaxTokensToDepositWithoutReinvest',
        oldValue: this._maxTokensToDepositWithoutReinvest,
        newValue,
      });
      this._maxTokensToDepositWithoutReinvest = newValue;
    });
  }

  updateAdminFee(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      const oldValue = this.fees.updateAdminFee(newValue);
      this.emit({ name: 'UpdateAdminFee', oldValue, newValue });
    });
  }

  updateDevFee(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      const oldValue = this.fees.updateDevFee(newValue);
      this.emit({ name: 'UpdateDevFee', oldValue, newValue });
    });
  }

  updateReinvestReward(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      const oldValue = this.fees.updateReinvestReward(newValue);
      this.emit({ name: 'UpdateReinvestReward', oldValue, newValue });
    });
  }

  updateMaxSlippage(ctx: CallContext, newValue: bigint): void {
    this.adminExecute(ctx, () => {
      assert(newValue >= 0n && newValue <= MAX_SLIPPAGE_BPS, ConfigurationError, 'Slippage too high (max 10%)');
      this.emit({ name: 'UpdateMaxSlippage', oldValue: this._maxSlippageBips, newValue });
      this._maxSlippageBips = newValue;
    });
  }

  updateDepositsEnabled(ctx: CallContext, newValue: boolean): void {
    this.adminExecute(ctx, () => this.setDepositsEnabled(newValue));
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.adminExecute(ctx, () => {
      assertAddress(newOwner, 'New owner');
      this.emit({ name: 'OwnershipTransferred', previousOwner: this._owner, newOwner });
      this._owner = newOwner;
    });
  }

  /**
   * Only the current dev address may hand its role on
   */
  updateDevAddr(ctx: CallContext, newValue: string): void {
    this.execute(() => {
      assert(ctx.sender === this._devAddr, PermissionError, 'Only dev can update dev address');
      assertAddress(newValue, 'Dev address');
      this.emit({ name: 'UpdateDevAddr', oldValue: this._devAddr, newValue });
      this._devAddr = newValue;
    });
  }

  setAllowances(ctx: CallContext): void {
    this.adminExecute(ctx, () => this.approveAll(MAX_UINT64));
  }

  revokeAllowance(ctx: CallContext, asset: AssetLedger, spender: string): void {
    this.adminExecute(ctx, () => asset.approve(this.address, spender, 0n));
  }

  // ============================================
  // RECOVERY
  // ============================================

  /**
   * Circuit breaker for a compromised or frozen pool: exits the pool with
   * emergencyUnstake and keeps the recovered deposit asset in the vault.
   */
  rescueDeployedFunds(ctx: CallContext, minReturnAmountAccepted: bigint, disableDeposits: boolean): void {
    this.adminExecute(ctx, () => {
      assertUint64(minReturnAmountAccepted, 'Minimum return amount');
      const balanceBefore = this.depositAsset.balanceOf(this.address);
      this.stakingAdapter.emergencyUnstake(this.poolId);
      const recovered = this.depositAsset.balanceOf(this.address) - balanceBefore;
      assert(
        recovered >= minReturnAmountAccepted,
        InsufficientRescueError,
        `Recovered ${recovered}, below accepted minimum ${minReturnAmountAccepted}`,
      );

      this.emit({ name: 'Reinvest', newTotalDeposits: this.totalDeposits(), newTotalSupply: this.totalShares() });
      if (this._depositsEnabled && disableDeposits) {
        this.setDepositsEnabled(false);
      }
    });
  }

  /**
   * Sends a balance the vault holds to the owner
   */
  recoverAsset(ctx: CallContext, asset: AssetLedger, amount: bigint): void {
    this.adminExecute(ctx, () => {
      assertUint64(amount, 'Recover amount');
      assert(amount > 0n, ZeroAmountError, 'Recover amount is zero');
      safeTransfer(asset, this.address, this._owner, amount);
      this.emit({ name: 'Recovered', assetId: asset.id, amount });
    });
  }

  // ============================================
  // ATOMIC STATE
  // ============================================

  snapshot(): VaultState {
    return {
      owner: this._owner,
      devAddr: this._devAddr,
      fees: this.fees.snapshot(),
      minTokensToReinvest: this._minTokensToReinvest,
      maxTokensToDepositWithoutReinvest: this._maxTokensToDepositWithoutReinvest,
      maxSlippageBips: this._maxSlippageBips,
      depositsEnabled: this._depositsEnabled,
      eventCount: this.events.length,
    };
  }

  restore(state: VaultState): void {
    this._owner = state.owner;
    this._devAddr = state.devAddr;
    this.fees.restore(state.fees);
    this._minTokensToReinvest = state.minTokensToReinvest;
    this._maxTokensToDepositWithoutReinvest = state.maxTokensToDepositWithoutReinvest;
    this._maxSlippageBips = state.maxSlippageBips;
    this._depositsEnabled = state.depositsEnabled;
    this.events = this.events.slice(0, state.eventCount);
  }

  // ============================================
  // HELPERS
  // ============================================

  /**
   * Runs an entry point atomically under the re-entrancy lock
   */
  private execute(fn: () => void): void {
    if (this.locked) {
      throw new PermissionError('Reentrant call', 'REENTRANT_CALL');
    }
    this.locked = true;
    try {
      this.runtime.atomic(fn);
    } finally {
      this.locked = false;
    }
  }

  private adminExecute(ctx: CallContext, fn: () => void): void {
    this.execute(() => {
      assert(ctx.sender === this._owner, PermissionError, 'Only owner can call this method');
      fn();
    });
  }

  private setDepositsEnabled(newValue: boolean): void {
    assert(this._depositsEnabled !== newValue, ConfigurationError, `Deposits already ${newValue ? 'enabled' : 'disabled'}`);
    this._depositsEnabled = newValue;
    this.emit({ name: 'DepositsEnabled', newValue });
  }

  /** Swaps a reinvest performs: pool reward to reward asset, reward asset to deposit asset */
  private conversionRoutes(): Array<[AssetLedger, AssetLedger]> {
    const routes: Array<[AssetLedger, AssetLedger]> = [];
    if (this.poolRewardAsset.id !== this.rewardAsset.id) {
      routes.push([this.poolRewardAsset, this.rewardAsset]);
    }
    if (this.rewardAsset.id !== this.depositAsset.id) {
      routes.push([this.rewardAsset, this.depositAsset]);
    }
    return routes;
  }

  private approveAll(amount: bigint): void {
    this.depositAsset.approve(this.address, this.stakingAdapter.spender, amount);
    for (const [from, to] of this.conversionRoutes()) {
      from.approve(this.address, this.rewardConverter.spenderFor(from.id, to.id), amount);
    }
  }
}
