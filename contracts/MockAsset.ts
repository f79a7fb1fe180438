// MockAsset.ts - In-process fungible asset for tests and local simulation
// Behaves like a standard asset ledger, with switches for the awkward cases a vault
// must survive: a fee charged on every transfer, transfers that report failure,
// and a hook that runs foreign code in the middle of a transfer.

import type { AtomicRuntime, Journaled } from './AtomicRuntime';
import { BIPS_DIVISOR, MAX_UINT64 } from './constants';
import { ConfigurationError, PermitError } from './errors';
import { assert, assertAddress, assertUint64, mulDivFloor } from './math';
import { verifyPermit } from './permit';
import type { AssetLedger } from './types';

export type TransferHook = (from: string, to: string, amount: bigint) => void;

interface MockAssetState {
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
  nonces: Map<string, bigint>;
  totalSupply: bigint;
}

export interface MockAssetOptions {
  id: bigint;
  name: string;
  transferFeeBips?: bigint;
}

export class MockAsset implements AssetLedger, Journaled<MockAssetState> {
  readonly id: bigint;
  readonly name: string;

  transferFeeBips: bigint;
  failTransfers = false;
  transferHook: TransferHook | undefined;

  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private permitNonces = new Map<string, bigint>();
  private supply = 0n;

  constructor(private readonly runtime: AtomicRuntime, options: MockAssetOptions) {
    assert(options.id !== 0n, ConfigurationError, 'Invalid asset ID');
    this.id = options.id;
    this.name = options.name;
    this.transferFeeBips = options.transferFeeBips ?? 0n;
    runtime.register(this);
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(owner: string): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  nonces(owner: string): bigint {
    return this.permitNonces.get(owner) ?? 0n;
  }

  mint(to: string, amount: bigint): void {
    assertAddress(to, 'Mint recipient');
    assertUint64(amount, 'Mint amount');
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    assertAddress(spender, 'Spender');
    assertUint64(amount, 'Allowance');
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    if (this.failTransfers || amount > this.balanceOf(from) || amount < 0n) {
      return false;
    }
    assertAddress(to, 'Transfer recipient');
    this.transferHook?.(from, to, amount);

    const fee = mulDivFloor(amount, this.transferFeeBips, BIPS_DIVISOR);
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount - fee);
    this.supply -= fee;
    return true;
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const allowed = this.allowance(from, spender);
    if (amount > allowed) {
      return false;
    }
    if (!this.transfer(from, to, amount)) {
      return false;
    }
    if (allowed !== MAX_UINT64) {
      this.allowances.set(allowanceKey(from, spender), allowed - amount);
    }
    return true;
  }

  permit(owner: string, spender: string, amount: bigint, deadline: bigint, signature: Uint8Array): void {
    assert(deadline >= this.runtime.latestTimestamp, PermitError, 'Permit expired');
    assert(signature.length === 64, PermitError, 'Malformed permit signature');

    const nonce = this.nonces(owner);
    const valid = verifyPermit({ assetId: this.id, owner, spender, amount, nonce, deadline }, signature);
    assert(valid, PermitError, 'Invalid permit signature');

    this.permitNonces.set(owner, nonce + 1n);
    this.approve(owner, spender, amount);
  }

  snapshot(): MockAssetState {
    return {
      balances: new Map(this.balances),
      allowances: new Map(this.allowances),
      nonces: new Map(this.permitNonces),
      totalSupply: this.supply,
    };
  }

  restore(state: MockAssetState): void {
    this.balances = new Map(state.balances);
    this.allowances = new Map(state.allowances);
    this.permitNonces = new Map(state.nonces);
    this.supply = state.totalSupply;
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}:${spender}`;
}
