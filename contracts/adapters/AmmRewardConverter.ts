// AmmRewardConverter.ts - RewardConverter over constant-product AMM pools
// Each supported pair maps to one pool. Quotes read the pool's reserves and fee
// and apply the x*y=k output formula; swaps go through the pool itself.

import { BIPS_DIVISOR } from '../constants';
import { ConfigurationError, SlippageError } from '../errors';
import { assert, mulDivFloor } from '../math';
import type { RewardConverter } from '../RewardConverter';

export interface PoolState {
  asset1Id: bigint;
  asset1Reserves: bigint;
  asset2Reserves: bigint;
  totalFeeShare: bigint; // Fee in basis points
}

export interface ConstantProductPool {
  readonly address: string;
  readonly asset1Id: bigint;
  readonly asset2Id: bigint;
  poolState(): PoolState;
  swap(sender: string, inputAssetId: bigint, amountIn: bigint, minAmountOut: bigint): bigint;
}

/**
 * Expected output for a fixed-input swap:
 * netInput = amount * (10000 - fee) / 10000, output = outReserves * netInput / (inReserves + netInput)
 */
export function getExpectedSwapOutput(state: PoolState, inputAssetId: bigint, inputAmount: bigint): bigint {
  const [inputReserves, outputReserves] =
    state.asset1Id === inputAssetId
      ? [state.asset1Reserves, state.asset2Reserves]
      : [state.asset2Reserves, state.asset1Reserves];

  const netInput = mulDivFloor(inputAmount, BIPS_DIVISOR - state.totalFeeShare, BIPS_DIVISOR);
  if (netInput === 0n) {
    return 0n;
  }
  return mulDivFloor(outputReserves, netInput, inputReserves + netInput);
}

export class AmmRewardConverter implements RewardConverter {
  constructor(
    private readonly account: string,
    private readonly pools: readonly ConstantProductPool[],
  ) {}

  supportsPair(fromAssetId: bigint, toAssetId: bigint): boolean {
    return fromAssetId !== toAssetId && this.findPool(fromAssetId, toAssetId) !== undefined;
  }

  spenderFor(fromAssetId: bigint, toAssetId: bigint): string {
    return this.route(fromAssetId, toAssetId).address;
  }

  estimateConversion(amount: bigint, fromAssetId: bigint, toAssetId: bigint): bigint {
    if (amount === 0n) {
      return 0n;
    }
    const pool = this.route(fromAssetId, toAssetId);
    return getExpectedSwapOutput(pool.poolState(), fromAssetId, amount);
  }

  swap(amount: bigint, fromAssetId: bigint, toAssetId: bigint, minAmountOut = 0n): bigint {
    const pool = this.route(fromAssetId, toAssetId);
    const received = pool.swap(this.account, fromAssetId, amount, minAmountOut);
    assert(received >= minAmountOut, SlippageError, 'Swap output below minimum');
    return received;
  }

  private findPool(fromAssetId: bigint, toAssetId: bigint): ConstantProductPool | undefined {
    return this.pools.find(
      (pool) =>
        (pool.asset1Id === fromAssetId && pool.asset2Id === toAssetId) ||
        (pool.asset1Id === toAssetId && pool.asset2Id === fromAssetId),
    );
  }

  private route(fromAssetId: bigint, toAssetId: bigint): ConstantProductPool {
    const pool = this.findPool(fromAssetId, toAssetId);
    assert(pool !== undefined, ConfigurationError, `No pool for pair ${fromAssetId}/${toAssetId}`);
    return pool;
  }
}
