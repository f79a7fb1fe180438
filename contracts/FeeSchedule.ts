// FeeSchedule.ts - Reinvest fee rates in basis points
// Dev fee, admin fee and reinvest (caller) reward are taken from every harvest,
// in that order. Their sum can never exceed BIPS_DIVISOR.

import type { Journaled } from './AtomicRuntime';
import { BIPS_DIVISOR } from './constants';
import { ConfigurationError } from './errors';
import { assert, mulDivFloor } from './math';

export interface FeeRates {
  adminFeeBips: bigint;
  devFeeBips: bigint;
  reinvestRewardBips: bigint;
}

export interface FeeSplit {
  devFee: bigint;
  adminFee: bigint;
  reinvestFee: bigint;
  net: bigint;
}

export class FeeSchedule implements Journaled<FeeRates> {
  private rates: FeeRates;

  constructor(rates: FeeRates) {
    FeeSchedule.validate(rates);
    this.rates = { ...rates };
  }

  static validate({ adminFeeBips, devFeeBips, reinvestRewardBips }: FeeRates): void {
    for (const [label, bips] of [
      ['Admin fee', adminFeeBips],
      ['Dev fee', devFeeBips],
      ['Reinvest reward', reinvestRewardBips],
    ] as const) {
      assert(bips >= 0n && bips <= BIPS_DIVISOR, ConfigurationError, `${label} must be between 0 and ${BIPS_DIVISOR} bips`);
    }
    assert(
      adminFeeBips + devFeeBips + reinvestRewardBips <= BIPS_DIVISOR,
      ConfigurationError,
      'Fee rates exceed 100%',
    );
  }

  get adminFeeBips(): bigint {
    return this.rates.adminFeeBips;
  }

  get devFeeBips(): bigint {
    return this.rates.devFeeBips;
  }

  get reinvestRewardBips(): bigint {
    return this.rates.reinvestRewardBips;
  }

  /** @returns the previous rate */
  updateAdminFee(newValue: bigint): bigint {
    return this.update('adminFeeBips', newValue);
  }

  /** @returns the previous rate */
  updateDevFee(newValue: bigint): bigint {
    return this.update('devFeeBips', newValue);
  }

  /** @returns the previous rate */
  updateReinvestReward(newValue: bigint): bigint {
    return this.update('reinvestRewardBips', newValue);
  }

  /**
   * Splits a gross reward. Each fee rounds down; rounding dust stays in `net`.
   */
  split(amount: bigint): FeeSplit {
    const devFee = mulDivFloor(amount, this.rates.devFeeBips, BIPS_DIVISOR);
    const adminFee = mulDivFloor(amount, this.rates.adminFeeBips, BIPS_DIVISOR);
    const reinvestFee = mulDivFloor(amount, this.rates.reinvestRewardBips, BIPS_DIVISOR);
    return { devFee, adminFee, reinvestFee, net: amount - devFee - adminFee - reinvestFee };
  }

  snapshot(): FeeRates {
    return { ...this.rates };
  }

  restore(state: FeeRates): void {
    this.rates = { ...state };
  }

  private update(key: keyof FeeRates, newValue: bigint): bigint {
    const next: FeeRates = { ...this.rates, [key]: newValue };
    FeeSchedule.validate(next);
    const oldValue = this.rates[key];
    this.rates = next;
    return oldValue;
  }
}
