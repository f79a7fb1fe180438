// MockSwapPool.ts - Mock constant-product pool for testing reward conversion
// Simulates a two-asset AMM: fixed-input swaps with a fee in basis points,
// reserves tracked in pool state the way a converter reads them.

import type { AtomicRuntime, Journaled } from './AtomicRuntime';
import { BIPS_DIVISOR } from './constants';
import { ConfigurationError, SlippageError } from './errors';
import { assert, assertAddress } from './math';
import { safeTransfer, safeTransferFrom } from './transfers';
import { getExpectedSwapOutput, type ConstantProductPool, type PoolState } from './adapters/AmmRewardConverter';
import type { AssetLedger } from './types';

const DEFAULT_FEE_BPS = 30n; // 0.3%

export class MockSwapPool implements ConstantProductPool, Journaled<PoolState> {
  private state: PoolState;

  constructor(
    runtime: AtomicRuntime,
    readonly address: string,
    private readonly asset1: AssetLedger,
    private readonly asset2: AssetLedger,
    feeBps: bigint = DEFAULT_FEE_BPS,
  ) {
    assertAddress(address, 'Pool address');
    assert(asset1.id !== asset2.id, ConfigurationError, 'Pool assets must be different');
    assert(feeBps < BIPS_DIVISOR, ConfigurationError, 'Pool fee too high');
    this.state = { asset1Id: asset1.id, asset1Reserves: 0n, asset2Reserves: 0n, totalFeeShare: feeBps };
    runtime.register(this);
  }

  get asset1Id(): bigint {
    return this.asset1.id;
  }

  get asset2Id(): bigint {
    return this.asset2.id;
  }

  poolState(): PoolState {
    return { ...this.state };
  }

  /**
   * Moves liquidity from `provider` into the pool and adds it to the reserves
   */
  addLiquidity(provider: string, amount1: bigint, amount2: bigint): void {
    safeTransfer(this.asset1, provider, this.address, amount1);
    safeTransfer(this.asset2, provider, this.address, amount2);
    this.state.asset1Reserves += amount1;
    this.state.asset2Reserves += amount2;
  }

  updateFee(newFeeBps: bigint): void {
    assert(newFeeBps < BIPS_DIVISOR, ConfigurationError, 'Pool fee too high');
    this.state.totalFeeShare = newFeeBps;
  }

  /**
   * Fixed-input swap. Pulls `amountIn` from `sender` (the pool must hold an allowance)
   * and sends the output back to `sender`.
   */
  swap(sender: string, inputAssetId: bigint, amountIn: bigint, minAmountOut: bigint): bigint {
    const isAsset1 = inputAssetId === this.asset1.id;
    assert(isAsset1 || inputAssetId === this.asset2.id, ConfigurationError, 'Unknown asset');
    const [inAsset, outAsset] = isAsset1 ? [this.asset1, this.asset2] : [this.asset2, this.asset1];

    const balanceBefore = inAsset.balanceOf(this.address);
    safeTransferFrom(inAsset, this.address, sender, this.address, amountIn);
    const received = inAsset.balanceOf(this.address) - balanceBefore;

    const outAmount = getExpectedSwapOutput(this.state, inputAssetId, received);
    assert(outAmount >= minAmountOut, SlippageError, 'Slippage exceeded');

    if (isAsset1) {
      this.state.asset1Reserves += received;
      this.state.asset2Reserves -= outAmount;
    } else {
      this.state.asset2Reserves += received;
      this.state.asset1Reserves -= outAmount;
    }

    if (outAmount > 0n) {
      safeTransfer(outAsset, this.address, sender, outAmount);
    }
    return outAmount;
  }

  snapshot(): PoolState {
    return { ...this.state };
  }

  restore(state: PoolState): void {
    this.state = { ...state };
  }
}
