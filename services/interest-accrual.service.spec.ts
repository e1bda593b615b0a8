import { describe, expect, test } from 'vitest';
import { SCALE, ratePerSecond } from '../config/lending';
import type { MarketState } from '../types';
import { accrueMarket, availableLiquidity, projectMarket, utilizationOf } from './interest-accrual.service';
import { ONE_YEAR, T0, units } from './testing-utils';

function market(overrides: Partial<MarketState> = {}): MarketState {
  return {
    asset: 'USD',
    active: true,
    totalSupplied: units('2000'),
    totalBorrowed: units('1000'),
    supplyRatePerSecond: ratePerSecond(units('0.04')),
    borrowRatePerSecond: ratePerSecond(units('0.08')),
    reserveFactor: units('0.1'),
    collateralFactor: units('0.8'),
    liquidationThreshold: units('0.85'),
    lastUpdateTime: T0,
    supplyIndex: SCALE,
    borrowIndex: SCALE,
    ...overrides,
  };
}

describe('accrueMarket', () => {
  test('derives per-second rates by truncating division', () => {
    expect(ratePerSecond(units('0.08'))).toBe(2536783358n);
    expect(ratePerSecond(units('0.04'))).toBe(1268391679n);
  });

  test('one year at 8% moves the borrow index to just under 1.08', () => {
    const m = market();
    accrueMarket(m, T0 + ONE_YEAR);

    expect(m.borrowIndex).toBe(1079999999977888000n);
    expect(m.totalBorrowed).toBe(1079999999977888000000n);
    expect(m.supplyIndex).toBe(1039999999988944000n);
    expect(m.totalSupplied).toBe(2079999999977888000000n);
    expect(m.lastUpdateTime).toBe(T0 + ONE_YEAR);
  });

  test('is a no-op at or before the last update', () => {
    const m = market({ lastUpdateTime: T0 + 10 });
    accrueMarket(m, T0 + 10);
    accrueMarket(m, T0);
    expect(m).toEqual(market({ lastUpdateTime: T0 + 10 }));
  });

  test('is idempotent for a fixed timestamp', () => {
    const once = market();
    accrueMarket(once, T0 + 3600);
    const twice = market();
    accrueMarket(twice, T0 + 3600);
    accrueMarket(twice, T0 + 3600);
    expect(twice).toEqual(once);
  });

  test('compounds on current totals across calls', () => {
    const m = market();
    accrueMarket(m, T0 + ONE_YEAR / 2);
    accrueMarket(m, T0 + ONE_YEAR);

    // the index gains rate × elapsed per call, less truncation; totals grow on the grown base
    expect(m.borrowIndex).toBe(1079999999977887999n);
    expect(m.totalBorrowed).toBe(1081599999977003520000n);
  });

  test('indices never decrease over non-decreasing timestamps', () => {
    const m = market();
    let previous = { supply: m.supplyIndex, borrow: m.borrowIndex };
    for (const step of [1, 59, 3600, 0, 86_400, 7 * 86_400]) {
      accrueMarket(m, m.lastUpdateTime + step);
      expect(m.supplyIndex >= previous.supply).toBe(true);
      expect(m.borrowIndex >= previous.borrow).toBe(true);
      previous = { supply: m.supplyIndex, borrow: m.borrowIndex };
    }
  });

  test('an empty market only moves its timestamp', () => {
    const m = market({ totalSupplied: 0n, totalBorrowed: 0n });
    accrueMarket(m, T0 + ONE_YEAR);
    expect(m.supplyIndex).toBe(SCALE);
    expect(m.borrowIndex).toBe(SCALE);
    expect(m.lastUpdateTime).toBe(T0 + ONE_YEAR);
  });
});

describe('projectMarket', () => {
  test('returns the accrued state without touching the input', () => {
    const m = market();
    const projected = projectMarket(m, T0 + ONE_YEAR);
    expect(projected.borrowIndex).toBe(1079999999977888000n);
    expect(m.borrowIndex).toBe(SCALE);
    expect(m.lastUpdateTime).toBe(T0);
  });
});

describe('utilization and liquidity', () => {
  test('utilization is borrowed over supplied', () => {
    expect(utilizationOf(market())).toBe(units('0.5'));
    expect(utilizationOf(market({ totalSupplied: 0n, totalBorrowed: 0n }))).toBe(0n);
  });

  test('available liquidity floors at zero', () => {
    expect(availableLiquidity(market())).toBe(units('1000'));
    expect(availableLiquidity(market({ totalSupplied: 5n, totalBorrowed: 7n }))).toBe(0n);
  });
});
