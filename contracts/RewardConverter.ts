/**
 * Converts one asset into another through a liquidity venue, on behalf of the
 * account the converter is bound to.
 */
export interface RewardConverter {
  supportsPair(fromAssetId: bigint, toAssetId: bigint): boolean;

  /** Account that must hold an allowance on `fromAssetId` before `swap` */
  spenderFor(fromAssetId: bigint, toAssetId: bigint): string;

  /** Read-only quote */
  estimateConversion(amount: bigint, fromAssetId: bigint, toAssetId: bigint): bigint;

  /**
   * Executes the conversion and returns the amount received.
   * Throws SlippageError when the output is below `minAmountOut`.
   */
  swap(amount: bigint, fromAssetId: bigint, toAssetId: bigint, minAmountOut?: bigint): bigint;
}
