import { describe, expect, test } from 'vitest';
import { createLedger, units } from '../services/testing-utils';
import { SEED_MARKETS, seedMarkets } from './seed-markets';

describe('seedMarkets', () => {
  test('registers the demo markets once and funds the seed account each run', async () => {
    const ledger = createLedger();

    const first = await seedMarkets(ledger.admin, 'seed-account');
    expect(first.registered).toEqual(['mUSDC', 'mDAI', 'mWETH']);
    expect(first.credited).toEqual(['mUSDC', 'mDAI', 'mWETH']);

    const second = await seedMarkets(ledger.admin, 'seed-account');
    expect(second.registered).toEqual([]);
    expect(second.skipped).toEqual(['mUSDC', 'mDAI', 'mWETH']);

    expect(await ledger.wallets.balanceOf('seed-account', 'mUSDC')).toBe(units('2000'));
    expect(await ledger.wallets.balanceOf('seed-account', 'mWETH')).toBe(units('20'));
    expect(await ledger.store.findPrice('mWETH')).toBe(units('2000'));
  });

  test('markets share one risk profile', () => {
    for (const market of SEED_MARKETS) {
      expect(market.collateralFactor).toBe(units('0.8'));
      expect(market.liquidationThreshold).toBe(units('0.85'));
      expect(market.reserveFactor).toBe(units('0.1'));
    }
  });
});
