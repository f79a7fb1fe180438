// ShareAccounting.ts - Share-based accounting for deposits and withdrawals
// shares = assets * totalShares / totalDeposits on the way in and
// assets = shares * totalDeposits / totalShares on the way out, both rounded down,
// so rounding always favours holders already in the vault.

import { DepositsDisabledError, InsufficientSharesError, UnbackedSharesError, ZeroAmountError } from './errors';
import { assert, mulDivFloor } from './math';
import type { ReinvestmentEngine } from './ReinvestmentEngine';
import { safeTransfer, safeTransferFrom } from './transfers';
import type { VaultContext } from './types';

export class ShareAccounting {
  constructor(
    private readonly vault: VaultContext,
    private readonly engine: ReinvestmentEngine,
  ) {}

  /**
   * First depositor sets a 1:1 price. Shares outstanding with nothing staked
   * (after a rescue) cannot be priced and quote zero.
   */
  sharesForAssets(assetAmount: bigint): bigint {
    const totalShares = this.vault.shares.totalSupply();
    const totalDeposits = this.vault.totalDeposits();
    if (totalShares === 0n) {
      return assetAmount;
    }
    if (totalDeposits === 0n) {
      return 0n;
    }
    return mulDivFloor(assetAmount, totalShares, totalDeposits);
  }

  assetsForShares(shareAmount: bigint): bigint {
    const totalShares = this.vault.shares.totalSupply();
    if (totalShares === 0n) {
      return 0n;
    }
    return mulDivFloor(shareAmount, this.vault.totalDeposits(), totalShares);
  }

  /**
   * Pulls `amount` of the deposit asset from `payer` and mints shares to `account`.
   *
   * Pending rewards above the force-reinvest threshold are compounded first, so the
   * new shares are priced after the harvest. Shares are priced on the pre-stake
   * total and cover the smaller of the amount net of the pool's entry fee and the
   * amount the pool actually credited.
   */
  deposit(payer: string, account: string, amount: bigint): void {
    const { depositAsset, stakingAdapter, poolId } = this.vault;
    assert(this.vault.depositsEnabled, DepositsDisabledError, 'Deposits are disabled');

    assert(
      this.vault.shares.totalSupply() === 0n || this.vault.totalDeposits() > 0n,
      UnbackedSharesError,
      'Cannot deposit while outstanding shares have no staked deposits',
    );

    const threshold = this.vault.maxTokensToDepositWithoutReinvest;
    if (threshold > 0n && this.engine.checkReward() > threshold) {
      this.engine.reinvest(payer);
    }

    const balanceBefore = depositAsset.balanceOf(this.vault.address);
    safeTransferFrom(depositAsset, this.vault.address, payer, this.vault.address, amount);
    const received = depositAsset.balanceOf(this.vault.address) - balanceBefore;

    const depositFee = mulDivFloor(received, stakingAdapter.depositFeeBips(poolId), stakingAdapter.feeDenominator());
    const totalSharesBefore = this.vault.shares.totalSupply();
    const totalDepositsBefore = this.vault.totalDeposits();

    stakingAdapter.stake(poolId, received);
    const credited = this.vault.totalDeposits() - totalDepositsBefore;
    const shareBasis = credited < received - depositFee ? credited : received - depositFee;

    const sharesToMint =
      totalSharesBefore === 0n ? shareBasis : mulDivFloor(shareBasis, totalSharesBefore, totalDepositsBefore);
    assert(sharesToMint > 0n, ZeroAmountError, 'Shares to mint is zero');

    this.vault.shares.mint(account, sharesToMint);
    this.vault.emit({ name: 'Deposit', account, amount: received });
  }

  /**
   * Burns `shareAmount` and sends the underlying, net of the pool's exit fee, to `holder`.
   * The payout is what the pool actually returned, never more than the fee-adjusted claim.
   * A redemption worth zero assets is a no-op.
   */
  withdraw(holder: string, shareAmount: bigint): void {
    const { depositAsset, stakingAdapter, poolId } = this.vault;
    assert(shareAmount <= this.vault.shares.balanceOf(holder), InsufficientSharesError, 'Insufficient shares');

    const depositTokenAmount = this.assetsForShares(shareAmount);
    if (depositTokenAmount === 0n) {
      return;
    }

    this.vault.shares.burn(holder, shareAmount);
    const balanceBefore = depositAsset.balanceOf(this.vault.address);
    stakingAdapter.unstake(poolId, depositTokenAmount);
    const returned = depositAsset.balanceOf(this.vault.address) - balanceBefore;

    const withdrawFee = mulDivFloor(
      depositTokenAmount,
      stakingAdapter.withdrawFeeBips(poolId),
      stakingAdapter.feeDenominator(),
    );
    const claim = depositTokenAmount - withdrawFee;
    const payout = returned < claim ? returned : claim;
    if (payout > 0n) {
      safeTransfer(depositAsset, this.vault.address, holder, payout);
    }
    this.vault.emit({ name: 'Withdraw', account: holder, amount: depositTokenAmount });
  }
}
