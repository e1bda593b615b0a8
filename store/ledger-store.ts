import type { AssetId, LedgerChangeSet, MarketState, PositionKey, PositionState, UserId } from '../types';

/**
 * Persistence boundary of the ledger: markets keyed by asset, positions keyed by
 * (user, asset), the per-user touched-asset index, prices and the pause flag.
 */
export interface LedgerStore {
  findMarket(asset: AssetId): Promise<MarketState | null>;
  listMarkets(): Promise<MarketState[]>;
  /** Rejects with AssetAlreadyRegistered when the asset exists. */
  insertMarket(market: MarketState): Promise<void>;
  findPosition(user: UserId, asset: AssetId): Promise<PositionState | null>;
  /** Assets the user ever supplied or borrowed, in first-touch order. */
  listTouchedAssets(user: UserId): Promise<AssetId[]>;
  findPrice(asset: AssetId): Promise<bigint | null>;
  savePrice(asset: AssetId, price: bigint): Promise<void>;
  isPaused(): Promise<boolean>;
  setPaused(paused: boolean): Promise<void>;
  /** Applies the whole change set or nothing. */
  commit(changes: LedgerChangeSet): Promise<void>;
}

export const positionId = (key: PositionKey) => `${key.user}|${key.asset}`;

export function emptyPosition(user: UserId, asset: AssetId): PositionState {
  return {
    user,
    asset,
    suppliedAmount: 0n,
    borrowedAmount: 0n,
    supplyIndexSnapshot: 0n,
    borrowIndexSnapshot: 0n,
    isCollateral: false,
  };
}

export function emptyChangeSet(): LedgerChangeSet {
  return { markets: [], positions: [], removedPositions: [], touched: [], untouched: [] };
}

export function isEmptyChangeSet(changes: LedgerChangeSet): boolean {
  return (
    changes.markets.length === 0 &&
    changes.positions.length === 0 &&
    changes.removedPositions.length === 0 &&
    changes.touched.length === 0 &&
    changes.untouched.length === 0
  );
}

export function sameMarket(a: MarketState, b: MarketState): boolean {
  return (
    a.asset === b.asset &&
    a.active === b.active &&
    a.totalSupplied === b.totalSupplied &&
    a.totalBorrowed === b.totalBorrowed &&
    a.supplyRatePerSecond === b.supplyRatePerSecond &&
    a.borrowRatePerSecond === b.borrowRatePerSecond &&
    a.reserveFactor === b.reserveFactor &&
    a.collateralFactor === b.collateralFactor &&
    a.liquidationThreshold === b.liquidationThreshold &&
    a.lastUpdateTime === b.lastUpdateTime &&
    a.supplyIndex === b.supplyIndex &&
    a.borrowIndex === b.borrowIndex
  );
}

export function samePosition(a: PositionState, b: PositionState): boolean {
  return (
    a.user === b.user &&
    a.asset === b.asset &&
    a.suppliedAmount === b.suppliedAmount &&
    a.borrowedAmount === b.borrowedAmount &&
    a.supplyIndexSnapshot === b.supplyIndexSnapshot &&
    a.borrowIndexSnapshot === b.borrowIndexSnapshot &&
    a.isCollateral === b.isCollateral
  );
}
