import { AtomicRuntime } from '../contracts/AtomicRuntime';
import { MAX_UINT64 } from '../contracts/constants';
import { createTestAccount, createTestAsset, TestAccount } from './utils/assets';

describe('MockAsset', () => {
  let runtime: AtomicRuntime;
  let alice: TestAccount;
  let bob: TestAccount;

  beforeEach(() => {
    runtime = new AtomicRuntime();
    alice = createTestAccount();
    bob = createTestAccount();
  });

  it('should burn the transfer fee out of the supply', () => {
    const asset = createTestAsset(runtime, 7n, 'Fee-Test', 250n);
    asset.mint(alice.addr, 10_000n);
    expect(asset.totalSupply()).toBe(10_000n);

    expect(asset.transfer(alice.addr, bob.addr, 1_000n)).toBe(true);

    // 2.5% of 1000
    expect(asset.balanceOf(bob.addr)).toBe(975n);
    expect(asset.balanceOf(alice.addr)).toBe(9_000n);
    expect(asset.totalSupply()).toBe(9_975n);
  });

  it('should keep the supply on fee-free transfers', () => {
    const asset = createTestAsset(runtime, 8n, 'Plain-Test');
    asset.mint(alice.addr, 500n);
    asset.approve(alice.addr, bob.addr, MAX_UINT64);

    expect(asset.transferFrom(bob.addr, alice.addr, bob.addr, 200n)).toBe(true);
    expect(asset.balanceOf(bob.addr)).toBe(200n);
    expect(asset.totalSupply()).toBe(500n);
    expect(asset.allowance(alice.addr, bob.addr)).toBe(MAX_UINT64);
  });

  it('should report failure without moving funds', () => {
    const asset = createTestAsset(runtime, 9n, 'Fail-Test');
    asset.mint(alice.addr, 500n);
    asset.failTransfers = true;

    expect(asset.transfer(alice.addr, bob.addr, 100n)).toBe(false);
    expect(asset.balanceOf(alice.addr)).toBe(500n);
    expect(asset.totalSupply()).toBe(500n);
  });
});
