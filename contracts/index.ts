export { AtomicRuntime, type Journaled } from './AtomicRuntime';
export { CompoundingVault, type CreateVaultParams, type VaultStats } from './CompoundingVault';
export * from './constants';
export * from './errors';
export { FeeSchedule, type FeeRates, type FeeSplit } from './FeeSchedule';
export { mulDivFloor } from './math';
export { permitMessage, signPermit, verifyPermit, type PermitFields } from './permit';
export { ReinvestmentEngine } from './ReinvestmentEngine';
export type { RewardConverter } from './RewardConverter';
export { ShareAccounting } from './ShareAccounting';
export { ShareToken } from './ShareToken';
export type { StakingAdapter } from './StakingAdapter';
export { callFrom, type AssetLedger, type CallContext, type ShareLedger, type VaultContext, type VaultEvent } from './types';
export { MasterChefAdapter, type MasterChefPool, type MasterChefPoolInfo } from './adapters/MasterChefAdapter';
export {
  AmmRewardConverter,
  getExpectedSwapOutput,
  type ConstantProductPool,
  type PoolState,
} from './adapters/AmmRewardConverter';
export { MockAsset, type MockAssetOptions, type TransferHook } from './MockAsset';
export { MockMasterChef } from './MockMasterChef';
export { MockSwapPool } from './MockSwapPool';
