import type { AssetId, LedgerChangeSet, MarketState, PositionKey, PositionState, Timestamp, UserId } from '../types';
import { AssetNotActiveError } from '../utils/ledger-error';
import { type LedgerStore, emptyChangeSet, emptyPosition, positionId, sameMarket, samePosition } from './ledger-store';

/** Read access shared by the unit of work and the read-only queries. */
export interface LedgerReader {
  readonly now: Timestamp;
  market(asset: AssetId): Promise<MarketState>;
  position(user: UserId, asset: AssetId): Promise<PositionState>;
  touchedAssets(user: UserId): Promise<AssetId[]>;
}

export interface TransferIntent {
  asset: AssetId;
  account: UserId;
  amount: bigint;
}

interface Staged<T> {
  before: T | null;
  current: T;
}

/**
 * Unit of work over a LedgerStore. Operations mutate working copies; nothing reaches
 * the store until the settlement commits `changes()`. `revert()` restores the
 * before-images of everything `changes()` wrote.
 */
export class LedgerTransaction implements LedgerReader {
  readonly pulls: TransferIntent[] = [];
  readonly pushes: TransferIntent[] = [];

  private markets = new Map<AssetId, Staged<MarketState>>();
  private positions = new Map<string, Staged<PositionState>>();
  private touchedByUser = new Map<UserId, AssetId[]>();
  private added: PositionKey[] = [];

  constructor(private readonly store: LedgerStore, readonly now: Timestamp) {}

  async market(asset: AssetId): Promise<MarketState> {
    const staged = this.markets.get(asset);
    if (staged) return staged.current;
    const found = await this.store.findMarket(asset);
    if (!found) throw new AssetNotActiveError(asset);
    const entry: Staged<MarketState> = { before: found, current: { ...found } };
    this.markets.set(asset, entry);
    return entry.current;
  }

  async position(user: UserId, asset: AssetId): Promise<PositionState> {
    const id = positionId({ user, asset });
    const staged = this.positions.get(id);
    if (staged) return staged.current;
    const found = await this.store.findPosition(user, asset);
    const entry: Staged<PositionState> = found
      ? { before: found, current: { ...found } }
      : { before: null, current: emptyPosition(user, asset) };
    this.positions.set(id, entry);
    return entry.current;
  }

  async touchedAssets(user: UserId): Promise<AssetId[]> {
    let assets = this.touchedByUser.get(user);
    if (!assets) {
      assets = await this.store.listTouchedAssets(user);
      this.touchedByUser.set(user, assets);
    }
    return [...assets];
  }

  async touch(user: UserId, asset: AssetId): Promise<void> {
    const assets = await this.touchedAssets(user);
    if (assets.includes(asset)) return;
    this.touchedByUser.set(user, [...assets, asset]);
    this.added.push({ user, asset });
  }

  /** Debit the caller into custody before the mutation is committed. */
  pull(asset: AssetId, from: UserId, amount: bigint): void {
    this.pulls.push({ asset, account: from, amount });
  }

  /** Release from custody once the mutation is committed. */
  push(asset: AssetId, to: UserId, amount: bigint): void {
    this.pushes.push({ asset, account: to, amount });
  }

  changes(): LedgerChangeSet {
    const changes = emptyChangeSet();
    for (const { before, current } of this.markets.values()) {
      if (!before || !sameMarket(before, current)) changes.markets.push({ ...current });
    }
    for (const { before, current } of this.positions.values()) {
      const baseline = before ?? emptyPosition(current.user, current.asset);
      if (!samePosition(baseline, current)) changes.positions.push({ ...current });
    }
    changes.touched.push(...this.added);
    return changes;
  }

  revert(): LedgerChangeSet {
    const changes = emptyChangeSet();
    for (const { before, current } of this.markets.values()) {
      if (before && !sameMarket(before, current)) changes.markets.push({ ...before });
    }
    for (const { before, current } of this.positions.values()) {
      if (before) {
        if (!samePosition(before, current)) changes.positions.push({ ...before });
      } else if (!samePosition(emptyPosition(current.user, current.asset), current)) {
        changes.removedPositions.push({ user: current.user, asset: current.asset });
      }
    }
    changes.untouched.push(...this.added);
    return changes;
  }
}
