import { describe, expect, test } from 'vitest';
import { SCALE } from '../config/lending';
import type { MarketState } from '../types';
import { AssetAlreadyRegisteredError, AssetNotActiveError } from '../utils/ledger-error';
import { emptyPosition, isEmptyChangeSet } from './ledger-store';
import { LedgerTransaction } from './ledger-transaction';
import { MemoryLedgerStore } from './memory-ledger-store';

const NOW = 1_700_000_000;

const usd: MarketState = {
  asset: 'USD',
  active: true,
  totalSupplied: 100n,
  totalBorrowed: 0n,
  supplyRatePerSecond: 0n,
  borrowRatePerSecond: 0n,
  reserveFactor: 0n,
  collateralFactor: SCALE / 2n,
  liquidationThreshold: (SCALE * 3n) / 5n,
  lastUpdateTime: NOW,
  supplyIndex: SCALE,
  borrowIndex: SCALE,
};

async function seededStore() {
  const store = new MemoryLedgerStore();
  await store.insertMarket(usd);
  await store.commit({
    markets: [],
    positions: [{ ...emptyPosition('alice', 'USD'), suppliedAmount: 100n, supplyIndexSnapshot: SCALE }],
    removedPositions: [],
    touched: [{ user: 'alice', asset: 'USD' }],
    untouched: [],
  });
  return store;
}

describe('MemoryLedgerStore', () => {
  test('hands out copies', async () => {
    const store = await seededStore();
    const market = await store.findMarket('USD');
    if (!market) throw new Error('market missing');
    market.totalSupplied = 0n;
    expect((await store.findMarket('USD'))?.totalSupplied).toBe(100n);
  });

  test('rejects duplicate markets', async () => {
    const store = await seededStore();
    await expect(store.insertMarket(usd)).rejects.toBeInstanceOf(AssetAlreadyRegisteredError);
  });
});

describe('LedgerTransaction', () => {
  test('an untouched unit of work produces no changes', async () => {
    const tx = new LedgerTransaction(await seededStore(), NOW);
    await tx.market('USD');
    await tx.position('alice', 'USD');
    await tx.position('bob', 'USD');
    expect(isEmptyChangeSet(tx.changes())).toBe(true);
  });

  test('unknown markets are rejected', async () => {
    const tx = new LedgerTransaction(await seededStore(), NOW);
    await expect(tx.market('BTC')).rejects.toBeInstanceOf(AssetNotActiveError);
  });

  test('working copies stay private until committed', async () => {
    const store = await seededStore();
    const tx = new LedgerTransaction(store, NOW);
    const market = await tx.market('USD');
    market.totalSupplied += 50n;

    expect((await tx.market('USD')).totalSupplied).toBe(150n);
    expect((await store.findMarket('USD'))?.totalSupplied).toBe(100n);

    await store.commit(tx.changes());
    expect((await store.findMarket('USD'))?.totalSupplied).toBe(150n);
  });

  test('revert restores before-images and drops what was created', async () => {
    const store = await seededStore();
    const tx = new LedgerTransaction(store, NOW);
    (await tx.position('alice', 'USD')).suppliedAmount = 40n;
    const bob = await tx.position('bob', 'USD');
    bob.borrowedAmount = 10n;
    bob.borrowIndexSnapshot = SCALE;
    await tx.touch('bob', 'USD');
    await tx.touch('alice', 'USD');

    const forward = tx.changes();
    expect(forward.positions).toHaveLength(2);
    expect(forward.touched).toEqual([{ user: 'bob', asset: 'USD' }]);

    await store.commit(forward);
    expect(await store.listTouchedAssets('bob')).toEqual(['USD']);

    await store.commit(tx.revert());
    expect((await store.findPosition('alice', 'USD'))?.suppliedAmount).toBe(100n);
    expect(await store.findPosition('bob', 'USD')).toBeNull();
    expect(await store.listTouchedAssets('bob')).toEqual([]);
    expect(await store.listTouchedAssets('alice')).toEqual(['USD']);
  });

  test('records transfer intents in order', async () => {
    const tx = new LedgerTransaction(await seededStore(), NOW);
    tx.pull('USD', 'alice', 5n);
    tx.push('USD', 'bob', 3n);
    expect(tx.pulls).toEqual([{ asset: 'USD', account: 'alice', amount: 5n }]);
    expect(tx.pushes).toEqual([{ asset: 'USD', account: 'bob', amount: 3n }]);
  });
});
