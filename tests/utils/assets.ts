import algosdk from 'algosdk';
import { AtomicRuntime } from '../../contracts/AtomicRuntime';
import { MAX_UINT64 } from '../../contracts/constants';
import { MockAsset } from '../../contracts/MockAsset';

export interface TestAccount {
  addr: string;
  sk: Uint8Array;
}

export function createTestAccount(): TestAccount {
  const { addr, sk } = algosdk.generateAccount();
  return { addr: addr.toString(), sk };
}

export function createTestAsset(runtime: AtomicRuntime, id: bigint, name: string, transferFeeBips?: bigint): MockAsset {
  return new MockAsset(runtime, { id, name, transferFeeBips });
}

export function fundAsset(asset: MockAsset, receiver: string, amount: bigint): void {
  if (amount === 0n) return;
  asset.mint(receiver, amount);
}

/** Mints `amount` to the account and grants `spender` an unlimited allowance */
export function fundAndApprove(asset: MockAsset, account: TestAccount, spender: string, amount: bigint): void {
  fundAsset(asset, account.addr, amount);
  asset.approve(account.addr, spender, MAX_UINT64);
}

export function getAssetBalance(asset: MockAsset, address: string): bigint {
  return asset.balanceOf(address);
}

/**
 * Runs `fn` and returns what it threw; fails the test if nothing was thrown
 */
export function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected call to throw');
}
