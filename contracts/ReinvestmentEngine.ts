// ReinvestmentEngine.ts - Harvest, fee disbursement and re-staking
// Rewards are claimed from the staking pool, swapped into the reward asset, split
// into dev, admin and caller fees, and the remainder is swapped into the deposit
// asset and staked again. totalShares never changes here, so every holder's
// share price rises by the compounded amount.

import { BIPS_DIVISOR } from './constants';
import { SlippageError } from './errors';
import { assert, mulDivFloor } from './math';
import { safeTransfer } from './transfers';
import type { AssetLedger, VaultContext } from './types';

export class ReinvestmentEngine {
  constructor(private readonly vault: VaultContext) {}

  /**
   * Pure read of everything a reinvest would compound right now, in reward-asset terms
   */
  checkReward(): bigint {
    const { poolRewardAsset, rewardAsset, stakingAdapter, rewardConverter } = this.vault;
    const pendingReward = stakingAdapter.pendingRewardEstimate(this.vault.poolId, this.vault.address);
    const poolTokenAmount = poolRewardAsset.balanceOf(this.vault.address) + pendingReward;

    if (poolRewardAsset.id === rewardAsset.id) {
      return poolTokenAmount;
    }
    return this.heldRewardBalance() + rewardConverter.estimateConversion(poolTokenAmount, poolRewardAsset.id, rewardAsset.id);
  }

  /**
   * Compounds every reward the vault holds or is owed. The caller is responsible for
   * threshold and caller checks; `feeRecipient` receives the reinvest reward.
   */
  reinvest(feeRecipient: string): void {
    const { depositAsset, rewardAsset, poolRewardAsset, stakingAdapter, fees } = this.vault;
    const vaultAddr = this.vault.address;

    stakingAdapter.harvestRewards(this.vault.poolId);

    const held = this.heldRewardBalance();
    const converted =
      poolRewardAsset.id === rewardAsset.id
        ? 0n
        : this.convert(poolRewardAsset.balanceOf(vaultAddr), poolRewardAsset, rewardAsset);
    const amount = held + converted;
    const { devFee, adminFee, reinvestFee, net } = fees.split(amount);

    if (devFee > 0n) {
      safeTransfer(rewardAsset, vaultAddr, this.vault.devAddr, devFee);
    }
    if (adminFee > 0n) {
      safeTransfer(rewardAsset, vaultAddr, this.vault.owner, adminFee);
    }
    if (reinvestFee > 0n) {
      safeTransfer(rewardAsset, vaultAddr, feeRecipient, reinvestFee);
    }

    const depositTokenAmount =
      rewardAsset.id === depositAsset.id ? net : this.convert(net, rewardAsset, depositAsset);
    if (depositTokenAmount > 0n) {
      stakingAdapter.stake(this.vault.poolId, depositTokenAmount);
    }

    this.vault.emit({
      name: 'Reinvest',
      newTotalDeposits: this.vault.totalDeposits(),
      newTotalSupply: this.vault.shares.totalSupply(),
    });
  }

  /**
   * Reward asset the vault already holds. When the reward asset is the deposit asset,
   * anything held is principal (such as funds returned by a rescue) and counts as zero.
   */
  private heldRewardBalance(): bigint {
    const { rewardAsset, depositAsset } = this.vault;
    return rewardAsset.id === depositAsset.id ? 0n : rewardAsset.balanceOf(this.vault.address);
  }

  /**
   * Swaps `amount` and returns what actually arrived, measured on the vault's balance.
   * Fails when that falls short of the quote less the vault's slippage tolerance.
   */
  convert(amount: bigint, from: AssetLedger, to: AssetLedger): bigint {
    if (amount === 0n) {
      return 0n;
    }
    const { rewardConverter, maxSlippageBips } = this.vault;
    const expectedOutput = rewardConverter.estimateConversion(amount, from.id, to.id);
    const minAmountOut = mulDivFloor(expectedOutput, BIPS_DIVISOR - maxSlippageBips, BIPS_DIVISOR);

    const balanceBefore = to.balanceOf(this.vault.address);
    rewardConverter.swap(amount, from.id, to.id, minAmountOut);
    const received = to.balanceOf(this.vault.address) - balanceBefore;

    assert(received >= minAmountOut, SlippageError, `Swap of ${from.name} to ${to.name} returned ${received}, below minimum ${minAmountOut}`);
    return received;
  }
}
