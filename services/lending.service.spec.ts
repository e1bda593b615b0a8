import { beforeEach, describe, expect, test, vi } from 'vitest';
import { MAX_HEALTH_FACTOR } from '../config/lending';
import { CUSTODY_ACCOUNT } from './asset-transfer.service';
import {
  AssetNotActiveError,
  InsufficientBalanceError,
  InsufficientCollateralError,
  InsufficientLiquidityError,
  InvalidAmountError,
  NoCollateralOrNoDebtError,
  ProtocolPausedError,
  ReentrantCallError,
  TransferFailedError,
} from '../utils/ledger-error';
import { type Ledger, ONE_YEAR, T0, createLedger, marketParams, units } from './testing-utils';

let ledger: Ledger;

/** alice lends USD; bob posts ETH as collateral. */
async function setup(usd = marketParams('USD')) {
  await ledger.admin.registerMarket(usd);
  await ledger.admin.registerMarket(marketParams('ETH'));
  await ledger.fund('alice', 'USD', '5000');
  await ledger.fund('bob', 'ETH', '5000');
  await ledger.lending.supply('alice', 'USD', units('1000'));
  await ledger.lending.supply('bob', 'ETH', units('1000'));
  await ledger.lending.setCollateral('bob', 'ETH', true);
}

beforeEach(() => {
  ledger = createLedger();
});

describe('supply and withdraw', () => {
  beforeEach(async () => {
    await setup();
  });

  test('supply moves funds into custody and records the position', async () => {
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1000'));
    expect(await ledger.wallets.balanceOf('alice', 'USD')).toBe(units('4000'));
    expect(await ledger.wallets.balanceOf(CUSTODY_ACCOUNT, 'USD')).toBe(units('1000'));
    expect(await ledger.lending.getPositions('alice')).toEqual([
      { asset: 'USD', supplied: units('1000'), borrowed: 0n, isCollateral: false },
    ]);
  });

  test('withdrawing what was supplied returns exactly the same amount', async () => {
    await ledger.lending.supply('alice', 'USD', units('250.5'));
    const remaining = await ledger.lending.withdraw('alice', 'USD', units('250.5'));

    expect(remaining).toBe(units('1000'));
    expect(await ledger.wallets.balanceOf('alice', 'USD')).toBe(units('4000'));
  });

  test('rejects zero amounts and unknown markets', async () => {
    await expect(ledger.lending.supply('alice', 'USD', 0n)).rejects.toBeInstanceOf(InvalidAmountError);
    await expect(ledger.lending.supply('alice', 'BTC', units('1'))).rejects.toBeInstanceOf(AssetNotActiveError);
  });

  test('a supply the wallet cannot cover leaves no trace', async () => {
    const error = await ledger.lending.supply('carol', 'USD', units('10')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransferFailedError);
    expect(error).toHaveProperty('message', 'Transfer failed: Insufficient USD wallet balance for carol');
    expect(await ledger.lending.getPositions('carol')).toEqual([]);
    expect((await ledger.lending.getMarket('USD')).totalSupplied).toBe(units('1000'));
  });

  test('cannot withdraw more than supplied', async () => {
    await expect(ledger.lending.withdraw('alice', 'USD', units('1000.000000000000000001'))).rejects.toBeInstanceOf(
      InsufficientBalanceError
    );
  });

  test('cannot withdraw liquidity that is lent out', async () => {
    await ledger.lending.borrow('bob', 'USD', units('800'));
    await expect(ledger.lending.withdraw('alice', 'USD', units('300'))).rejects.toBeInstanceOf(
      InsufficientLiquidityError
    );
    expect(await ledger.lending.withdraw('alice', 'USD', units('200'))).toBe(units('800'));
  });
});

describe('borrow', () => {
  beforeEach(async () => {
    await setup();
  });

  test('borrows up to the collateral factor', async () => {
    expect(await ledger.lending.borrow('bob', 'USD', units('800'))).toBe(units('800'));
    expect(await ledger.wallets.balanceOf('bob', 'USD')).toBe(units('800'));
    await expect(ledger.lending.borrow('bob', 'USD', 1n)).rejects.toBeInstanceOf(InsufficientCollateralError);
  });

  test('supply that is not enabled as collateral does not count', async () => {
    await ledger.fund('carol', 'ETH', '100');
    await ledger.lending.supply('carol', 'ETH', units('100'));
    await expect(ledger.lending.borrow('carol', 'USD', units('1'))).rejects.toBeInstanceOf(
      InsufficientCollateralError
    );
  });

  test('collateral backing debt cannot be withdrawn or disabled', async () => {
    await ledger.lending.borrow('bob', 'USD', units('400'));

    await expect(ledger.lending.withdraw('bob', 'ETH', units('500.000000000000000002'))).rejects.toBeInstanceOf(
      InsufficientCollateralError
    );
    await expect(ledger.lending.setCollateral('bob', 'ETH', false)).rejects.toBeInstanceOf(
      InsufficientCollateralError
    );
    // 500 ETH left at 0.8 still covers 400 USD
    expect(await ledger.lending.withdraw('bob', 'ETH', units('500'))).toBe(units('500'));
  });

  test('collateral needs a supplied balance', async () => {
    await expect(ledger.lending.setCollateral('carol', 'USD', true)).rejects.toBeInstanceOf(
      NoCollateralOrNoDebtError
    );
  });

  test('reports account liquidity', async () => {
    await ledger.lending.borrow('bob', 'USD', units('500'));
    expect(await ledger.lending.getAccountLiquidity('bob')).toEqual({
      collateralValue: units('800'),
      liquidationValue: units('850'),
      borrowValue: units('500'),
      healthFactor: units('1.7'),
      liquidatable: false,
    });
    expect((await ledger.lending.getAccountLiquidity('alice')).healthFactor).toBe(MAX_HEALTH_FACTOR);
  });
});

describe('repay', () => {
  beforeEach(async () => {
    await setup();
  });

  test('rejects a repayment without debt or amount', async () => {
    await expect(ledger.lending.repay('alice', 'USD', units('1'))).rejects.toBeInstanceOf(NoCollateralOrNoDebtError);
    await ledger.lending.borrow('bob', 'USD', units('100'));
    await expect(ledger.lending.repay('bob', 'USD', 0n)).rejects.toBeInstanceOf(InvalidAmountError);
  });

  test('partial repayment reduces the debt', async () => {
    await ledger.lending.borrow('bob', 'USD', units('500'));
    expect(await ledger.lending.repay('bob', 'USD', units('200'))).toEqual({
      repaid: units('200'),
      remainingDebt: units('300'),
    });
    expect(await ledger.wallets.balanceOf('bob', 'USD')).toBe(units('300'));
  });
});

describe('interest', () => {
  beforeEach(async () => {
    await setup(marketParams('USD', { annualSupplyRate: units('0.04'), annualBorrowRate: units('0.08') }));
    await ledger.lending.borrow('bob', 'USD', units('500'));
    ledger.advance(ONE_YEAR);
  });

  test('balances grow with the indices without writing anything', async () => {
    expect(await ledger.lending.getBorrowBalance('bob', 'USD')).toBe(539999999988944000000n);
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(1039999999988944000000n);

    const stored = await ledger.store.findMarket('USD');
    expect(stored?.lastUpdateTime).toBe(T0);
  });

  test('utilization reflects accrued totals', async () => {
    const view = await ledger.lending.getAssetUtilization('USD');
    expect(view.totalBorrowed).toBe(539999999988944000000n);
    expect(view.totalSupplied).toBe(1039999999988944000000n);
    expect(view.utilization).toBe(519230769225658284n);
  });

  test('accrue persists the indices', async () => {
    const market = await ledger.lending.accrue('USD');
    expect(market.borrowIndex).toBe(1079999999977888000n);

    const stored = await ledger.store.findMarket('USD');
    expect(stored?.borrowIndex).toBe(1079999999977888000n);
    expect(stored?.lastUpdateTime).toBe(T0 + ONE_YEAR);
  });

  test('an overpayment only takes the outstanding debt', async () => {
    await ledger.fund('bob', 'USD', '100');
    const result = await ledger.lending.repay('bob', 'USD', units('1000'));

    expect(result).toEqual({ repaid: 539999999988944000000n, remainingDebt: 0n });
    expect(await ledger.wallets.balanceOf('bob', 'USD')).toBe(60000000011056000000n);
    expect((await ledger.store.findMarket('USD'))?.totalBorrowed).toBe(0n);
  });
});

describe('pause', () => {
  beforeEach(async () => {
    await setup();
    await ledger.admin.setPaused(true);
  });

  test('blocks mutations but not reads', async () => {
    await expect(ledger.lending.supply('alice', 'USD', units('1'))).rejects.toBeInstanceOf(ProtocolPausedError);
    await expect(ledger.lending.borrow('bob', 'USD', units('1'))).rejects.toBeInstanceOf(ProtocolPausedError);
    await expect(ledger.lending.accrue('USD')).rejects.toBeInstanceOf(ProtocolPausedError);
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1000'));
  });

  test('resumes after unpausing', async () => {
    await ledger.admin.setPaused(false);
    expect(await ledger.lending.supply('alice', 'USD', units('1'))).toBe(units('1001'));
  });
});

describe('settlement', () => {
  beforeEach(async () => {
    await setup();
  });

  test('a failed push restores the ledger', async () => {
    ledger.transfer.failNextPushes();
    await expect(ledger.lending.withdraw('alice', 'USD', units('400'))).rejects.toThrow(
      'Transfer failed: push rejected by network'
    );

    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1000'));
    expect((await ledger.lending.getMarket('USD')).totalSupplied).toBe(units('1000'));
    expect(await ledger.wallets.balanceOf('alice', 'USD')).toBe(units('4000'));
  });

  test('a failed push on borrow drops the new debt position', async () => {
    ledger.transfer.failNextPushes();
    await expect(ledger.lending.borrow('bob', 'USD', units('100'))).rejects.toBeInstanceOf(TransferFailedError);

    expect(await ledger.store.findPosition('bob', 'USD')).toBeNull();
    expect(await ledger.store.listTouchedAssets('bob')).toEqual(['ETH']);
  });

  test('a failed pull commits nothing', async () => {
    ledger.transfer.failNextPulls();
    await expect(ledger.lending.supply('alice', 'USD', units('5'))).rejects.toBeInstanceOf(TransferFailedError);
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1000'));
  });

  test('a failed commit returns the pulled funds', async () => {
    vi.spyOn(ledger.store, 'commit').mockRejectedValueOnce(new Error('write conflict'));
    await expect(ledger.lending.supply('alice', 'USD', units('100'))).rejects.toThrow('write conflict');

    expect(await ledger.wallets.balanceOf('alice', 'USD')).toBe(units('4000'));
    expect(await ledger.wallets.balanceOf(CUSTODY_ACCOUNT, 'USD')).toBe(units('1000'));
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1000'));
  });

  test('re-entering from inside a transfer is rejected', async () => {
    let nested: unknown;
    ledger.transfer.onPull = async () => {
      nested = await ledger.lending.supply('alice', 'USD', units('1')).catch((err: unknown) => err);
    };

    await ledger.lending.supply('alice', 'USD', units('10'));

    expect(nested).toBeInstanceOf(ReentrantCallError);
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1010'));
  });

  test('concurrent borrows against the same collateral serialize', async () => {
    const results = await Promise.allSettled([
      ledger.lending.borrow('bob', 'USD', units('500')),
      ledger.lending.borrow('bob', 'USD', units('500')),
    ]);

    expect(results[0].status).toBe('fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InsufficientCollateralError);
    expect(await ledger.lending.getBorrowBalance('bob', 'USD')).toBe(units('500'));
  });

  test('concurrent supplies all land', async () => {
    await Promise.all([1, 2, 3, 4, 5].map(() => ledger.lending.supply('alice', 'USD', units('100'))));
    expect(await ledger.lending.getSupplyBalance('alice', 'USD')).toBe(units('1500'));
    expect((await ledger.lending.getMarket('USD')).totalSupplied).toBe(units('1500'));
  });
});
