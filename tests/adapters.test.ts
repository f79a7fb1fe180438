import { AmmRewardConverter, getExpectedSwapOutput } from '../contracts/adapters/AmmRewardConverter';
import { MasterChefAdapter } from '../contracts/adapters/MasterChefAdapter';
import { AtomicRuntime } from '../contracts/AtomicRuntime';
import { ConfigurationError, InsufficientStakeError, SlippageError } from '../contracts/errors';
import type { MockAsset } from '../contracts/MockAsset';
import { MockMasterChef } from '../contracts/MockMasterChef';
import { MockSwapPool } from '../contracts/MockSwapPool';
import { createTestAccount, createTestAsset, fundAndApprove, TestAccount } from './utils/assets';

describe('MasterChefAdapter', () => {
  let runtime: AtomicRuntime;
  let stakeAsset: MockAsset;
  let rewardAsset: MockAsset;
  let chef: MockMasterChef;
  let feeRecipient: TestAccount;
  let account: TestAccount;
  let adapter: MasterChefAdapter;
  let pid: bigint;

  beforeEach(() => {
    runtime = new AtomicRuntime();
    stakeAsset = createTestAsset(runtime, 11n, 'Stake-Test');
    rewardAsset = createTestAsset(runtime, 12n, 'Reward-Test');
    feeRecipient = createTestAccount();
    chef = new MockMasterChef(runtime, createTestAccount().addr, rewardAsset, feeRecipient.addr);
    pid = chef.addPool(stakeAsset, 100n, 50n);
    account = createTestAccount();
    fundAndApprove(stakeAsset, account, chef.address, 10_000n);
    adapter = new MasterChefAdapter(chef, account.addr);
  });

  it('should expose the pool as spender and its fees', () => {
    expect(adapter.spender).toBe(chef.address);
    expect(adapter.depositFeeBips(pid)).toBe(100n);
    expect(adapter.withdrawFeeBips(pid)).toBe(50n);
    expect(adapter.feeDenominator()).toBe(10_000n);
  });

  it('should stake net of the deposit fee', () => {
    adapter.stake(pid, 1_000n);

    expect(adapter.stakedBalance(pid, account.addr)).toBe(990n);
    expect(stakeAsset.balanceOf(feeRecipient.addr)).toBe(10n);
  });

  it('should unstake net of the withdraw fee', () => {
    adapter.stake(pid, 1_000n);
    adapter.unstake(pid, 990n);

    expect(adapter.stakedBalance(pid, account.addr)).toBe(0n);
    // 990 less a 0.5% exit fee of 4
    expect(stakeAsset.balanceOf(account.addr)).toBe(9_000n + 986n);
  });

  it('should apply fees changed on the pool after construction', () => {
    chef.setFees(pid, 0n, 200n);
    expect(adapter.depositFeeBips(pid)).toBe(0n);
    expect(adapter.withdrawFeeBips(pid)).toBe(200n);

    adapter.stake(pid, 1_000n);
    expect(adapter.stakedBalance(pid, account.addr)).toBe(1_000n);

    adapter.unstake(pid, 1_000n);
    // 2% exit fee of 20
    expect(stakeAsset.balanceOf(account.addr)).toBe(9_980n);
    expect(stakeAsset.balanceOf(feeRecipient.addr)).toBe(20n);
  });

  it('should refuse to unstake more than the position', () => {
    adapter.stake(pid, 1_000n);
    expect(() => adapter.unstake(pid, 991n)).toThrow(InsufficientStakeError);
  });

  it('should harvest pending rewards', () => {
    adapter.stake(pid, 1_000n);
    chef.accrueReward(pid, account.addr, 250n);
    expect(adapter.pendingRewardEstimate(pid, account.addr)).toBe(250n);

    adapter.harvestRewards(pid);
    expect(rewardAsset.balanceOf(account.addr)).toBe(250n);
    expect(adapter.pendingRewardEstimate(pid, account.addr)).toBe(0n);
  });

  it('should exit a frozen pool with emergencyUnstake and forfeit rewards', () => {
    adapter.stake(pid, 1_000n);
    chef.accrueReward(pid, account.addr, 250n);
    chef.setFrozen(pid, true);

    expect(() => adapter.unstake(pid, 100n)).toThrow('Pool is frozen');
    adapter.emergencyUnstake(pid);

    expect(adapter.stakedBalance(pid, account.addr)).toBe(0n);
    expect(stakeAsset.balanceOf(account.addr)).toBe(9_990n);
    expect(rewardAsset.balanceOf(account.addr)).toBe(0n);
  });
});

describe('AmmRewardConverter', () => {
  describe('getExpectedSwapOutput', () => {
    const state = { asset1Id: 1n, asset1Reserves: 1_000n, asset2Reserves: 2_000n, totalFeeShare: 30n };

    it('should apply the fee before the constant-product formula', () => {
      // net input 99; 2000 * 99 / 1099
      expect(getExpectedSwapOutput(state, 1n, 100n)).toBe(180n);
    });

    it('should quote the reverse direction', () => {
      // net input 99; 1000 * 99 / 2099
      expect(getExpectedSwapOutput(state, 2n, 100n)).toBe(47n);
    });

    it('should return zero when the fee consumes the input', () => {
      expect(getExpectedSwapOutput(state, 1n, 1n)).toBe(0n);
    });
  });

  describe('swaps through a pool', () => {
    let runtime: AtomicRuntime;
    let tokenA: MockAsset;
    let tokenB: MockAsset;
    let pool: MockSwapPool;
    let account: TestAccount;
    let converter: AmmRewardConverter;

    beforeEach(() => {
      runtime = new AtomicRuntime();
      tokenA = createTestAsset(runtime, 1n, 'Token-A');
      tokenB = createTestAsset(runtime, 2n, 'Token-B');
      pool = new MockSwapPool(runtime, createTestAccount().addr, tokenA, tokenB);

      const provider = createTestAccount();
      tokenA.mint(provider.addr, 1_000_000n);
      tokenB.mint(provider.addr, 1_000_000n);
      pool.addLiquidity(provider.addr, 1_000_000n, 1_000_000n);

      account = createTestAccount();
      fundAndApprove(tokenA, account, pool.address, 1_000n);
      converter = new AmmRewardConverter(account.addr, [pool]);
    });

    it('should report supported pairs in both directions', () => {
      expect(converter.supportsPair(1n, 2n)).toBe(true);
      expect(converter.supportsPair(2n, 1n)).toBe(true);
      expect(converter.supportsPair(1n, 1n)).toBe(false);
      expect(converter.supportsPair(1n, 3n)).toBe(false);
      expect(converter.spenderFor(1n, 2n)).toBe(pool.address);
    });

    it('should deliver exactly the quote', () => {
      expect(converter.estimateConversion(1_000n, 1n, 2n)).toBe(996n);

      expect(converter.swap(1_000n, 1n, 2n, 996n)).toBe(996n);
      expect(tokenB.balanceOf(account.addr)).toBe(996n);
      expect(tokenA.balanceOf(account.addr)).toBe(0n);
      expect(pool.poolState()).toEqual({
        asset1Id: 1n,
        asset1Reserves: 1_001_000n,
        asset2Reserves: 999_004n,
        totalFeeShare: 30n,
      });
    });

    it('should reject output below the minimum', () => {
      expect(() => converter.swap(1_000n, 1n, 2n, 997n)).toThrow(SlippageError);
    });

    it('should reject a swap when the pool fee rises after the quote', () => {
      const quoted = converter.estimateConversion(1_000n, 1n, 2n);
      expect(quoted).toBe(996n);

      // net input 990; 1_000_000 * 990 / 1_000_990
      pool.updateFee(100n);
      expect(converter.estimateConversion(1_000n, 1n, 2n)).toBe(989n);
      expect(() => converter.swap(1_000n, 1n, 2n, quoted)).toThrow(SlippageError);
    });

    it('should reject unknown pairs', () => {
      expect(() => converter.estimateConversion(1_000n, 1n, 3n)).toThrow(ConfigurationError);
    });

    it('should quote zero for a zero amount', () => {
      expect(converter.estimateConversion(0n, 1n, 2n)).toBe(0n);
    });
  });
});
