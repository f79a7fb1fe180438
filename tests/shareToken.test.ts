import { AtomicRuntime } from '../contracts/AtomicRuntime';
import { InsufficientSharesError, InvalidAmountError } from '../contracts/errors';
import { ShareToken } from '../contracts/ShareToken';
import { createTestAccount, TestAccount } from './utils/assets';

describe('ShareToken', () => {
  let shares: ShareToken;
  let alice: TestAccount;
  let bob: TestAccount;

  beforeEach(() => {
    shares = new ShareToken(new AtomicRuntime(), 'Compounding Alpha', 'cALPHA');
    alice = createTestAccount();
    bob = createTestAccount();
  });

  it('should mint and burn against the total supply', () => {
    shares.mint(alice.addr, 1_000n);
    shares.mint(bob.addr, 500n);
    shares.burn(alice.addr, 400n);

    expect(shares.balanceOf(alice.addr)).toBe(600n);
    expect(shares.totalSupply()).toBe(1_100n);
  });

  it('should not burn more than the balance', () => {
    shares.mint(alice.addr, 100n);
    expect(() => shares.burn(alice.addr, 101n)).toThrow(InsufficientSharesError);
    expect(shares.totalSupply()).toBe(100n);
  });

  it('should move balances on transfer', () => {
    shares.mint(alice.addr, 100n);
    shares.transfer(alice.addr, bob.addr, 100n);

    expect(shares.balanceOf(bob.addr)).toBe(100n);
    expect(shares.holders()).toEqual([bob.addr]);
    expect(() => shares.transfer(alice.addr, bob.addr, 1n)).toThrow(InsufficientSharesError);
  });

  it('should reject malformed recipients', () => {
    expect(() => shares.mint('nobody', 1n)).toThrow(InvalidAmountError);
  });
});
