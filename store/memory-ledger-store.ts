import type { AssetId, LedgerChangeSet, MarketState, PositionState, UserId } from '../types';
import { AssetAlreadyRegisteredError } from '../utils/ledger-error';
import { type LedgerStore, positionId } from './ledger-store';

/**
 * In-process store. Records are copied on the way in and out so callers never
 * alias stored state.
 */
export class MemoryLedgerStore implements LedgerStore {
  private markets = new Map<AssetId, MarketState>();
  private positions = new Map<string, PositionState>();
  private touched = new Map<UserId, AssetId[]>();
  private prices = new Map<AssetId, bigint>();
  private paused = false;

  async findMarket(asset: AssetId): Promise<MarketState | null> {
    const market = this.markets.get(asset);
    return market ? { ...market } : null;
  }

  async listMarkets(): Promise<MarketState[]> {
    return [...this.markets.values()].map((market) => ({ ...market }));
  }

  async insertMarket(market: MarketState): Promise<void> {
    if (this.markets.has(market.asset)) throw new AssetAlreadyRegisteredError(market.asset);
    this.markets.set(market.asset, { ...market });
  }

  async findPosition(user: UserId, asset: AssetId): Promise<PositionState | null> {
    const position = this.positions.get(positionId({ user, asset }));
    return position ? { ...position } : null;
  }

  async listTouchedAssets(user: UserId): Promise<AssetId[]> {
    return [...(this.touched.get(user) ?? [])];
  }

  async findPrice(asset: AssetId): Promise<bigint | null> {
    return this.prices.get(asset) ?? null;
  }

  async savePrice(asset: AssetId, price: bigint): Promise<void> {
    this.prices.set(asset, price);
  }

  async isPaused(): Promise<boolean> {
    return this.paused;
  }

  async setPaused(paused: boolean): Promise<void> {
    this.paused = paused;
  }

  async commit(changes: LedgerChangeSet): Promise<void> {
    for (const market of changes.markets) this.markets.set(market.asset, { ...market });
    for (const position of changes.positions) this.positions.set(positionId(position), { ...position });
    for (const key of changes.removedPositions) this.positions.delete(positionId(key));
    for (const { user, asset } of changes.touched) {
      const assets = this.touched.get(user) ?? [];
      if (!assets.includes(asset)) this.touched.set(user, [...assets, asset]);
    }
    for (const { user, asset } of changes.untouched) {
      const assets = this.touched.get(user);
      if (assets) this.touched.set(user, assets.filter((a) => a !== asset));
    }
  }
}
