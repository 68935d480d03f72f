import { describe, expect, it } from '@jest/globals';
import { UNLIMITED } from '../../types';
import { decideCoverage, swapsRemaining } from '../coverage.util';
import { percentToRate, round2 } from '../money.util';

const daily = { swaps_included: 4, swaps_per_day: UNLIMITED, extra_swap_price: 35 };
const monthly = { swaps_included: 60, swaps_per_day: 2, extra_swap_price: 35 };
const yearly = { swaps_included: UNLIMITED, swaps_per_day: UNLIMITED, extra_swap_price: 0 };

describe('decideCoverage', () => {
  it('covers swaps while the quota lasts', () => {
    expect(decideCoverage(daily, 0, 0)).toEqual({ covered: true, charge_amount: 0 });
    expect(decideCoverage(daily, 3, 3)).toEqual({ covered: true, charge_amount: 0 });
  });

  it('charges the extra swap price once the quota is used', () => {
    expect(decideCoverage(daily, 4, 4)).toEqual({ covered: false, charge_amount: 35 });
  });

  it('charges when the daily cap is reached even with quota left', () => {
    expect(decideCoverage(monthly, 10, 2)).toEqual({ covered: false, charge_amount: 35 });
    expect(decideCoverage(monthly, 10, 1)).toEqual({ covered: true, charge_amount: 0 });
  });

  it('never charges on an unlimited plan', () => {
    expect(decideCoverage(yearly, 10000, 500)).toEqual({ covered: true, charge_amount: 0 });
  });
});

describe('swapsRemaining', () => {
  it('reports unlimited plans with the sentinel', () => {
    expect(swapsRemaining(yearly, 42)).toBe(UNLIMITED);
  });

  it('never goes below zero', () => {
    expect(swapsRemaining(daily, 3)).toBe(1);
    expect(swapsRemaining(daily, 6)).toBe(0);
  });
});

describe('money helpers', () => {
  it('rounds half away from zero', () => {
    expect(round2(1.005)).toBe(1.01);
    expect(round2(-1.005)).toBe(-1.01);
    expect(round2(6.3)).toBe(6.3);
  });

  it('converts GST percentages to rates', () => {
    expect(percentToRate(18)).toBe(0.18);
  });
});
