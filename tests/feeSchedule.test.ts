import { ConfigurationError } from '../contracts/errors';
import { FeeSchedule } from '../contracts/FeeSchedule';

describe('FeeSchedule', () => {
  const rates = { devFeeBips: 300n, adminFeeBips: 200n, reinvestRewardBips: 100n };

  it('should split a reward in dev, admin, caller order', () => {
    const fees = new FeeSchedule(rates);
    expect(fees.split(10_000n)).toEqual({ devFee: 300n, adminFee: 200n, reinvestFee: 100n, net: 9_400n });
  });

  it('should round each fee down and leave the dust in net', () => {
    const fees = new FeeSchedule(rates);
    expect(fees.split(10_001n)).toEqual({ devFee: 300n, adminFee: 200n, reinvestFee: 100n, net: 9_401n });
    expect(fees.split(33n)).toEqual({ devFee: 0n, adminFee: 0n, reinvestFee: 0n, net: 33n });
  });

  it('should accept rates that sum to exactly 100%', () => {
    const fees = new FeeSchedule({ devFeeBips: 5_000n, adminFeeBips: 3_000n, reinvestRewardBips: 2_000n });
    expect(fees.split(1_000n).net).toBe(0n);
  });

  it('should reject rates above 100%', () => {
    expect(() => new FeeSchedule({ ...rates, adminFeeBips: 9_601n })).toThrow('Fee rates exceed 100%');
    expect(() => new FeeSchedule({ ...rates, devFeeBips: 10_001n })).toThrow(ConfigurationError);
    expect(() => new FeeSchedule({ ...rates, devFeeBips: -1n })).toThrow(ConfigurationError);
  });

  it('should return the previous rate on update', () => {
    const fees = new FeeSchedule(rates);
    expect(fees.updateDevFee(50n)).toBe(300n);
    expect(fees.updateAdminFee(0n)).toBe(200n);
    expect(fees.updateReinvestReward(9_950n)).toBe(100n);
    expect(fees.snapshot()).toEqual({ devFeeBips: 50n, adminFeeBips: 0n, reinvestRewardBips: 9_950n });
  });

  it('should leave rates unchanged when an update is rejected', () => {
    const fees = new FeeSchedule(rates);
    expect(() => fees.updateReinvestReward(9_501n)).toThrow(ConfigurationError);
    expect(fees.reinvestRewardBips).toBe(100n);
  });
});
