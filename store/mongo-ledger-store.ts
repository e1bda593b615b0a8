import mongoose, { type ClientSession } from 'mongoose';
import { AccountAsset } from '../models/AccountAsset';
import { AssetPrice } from '../models/AssetPrice';
import { type IMarket, Market } from '../models/Market';
import { type IPosition, Position } from '../models/Position';
import { PROTOCOL_SETTINGS_KEY, ProtocolSetting } from '../models/ProtocolSetting';
import type { AssetId, LedgerChangeSet, MarketState, PositionState, UserId } from '../types';
import { AssetAlreadyRegisteredError, isDuplicateKeyError } from '../utils/ledger-error';
import { type LedgerStore, isEmptyChangeSet } from './ledger-store';

function toMarketState(doc: IMarket): MarketState {
  return {
    asset: doc.asset,
    active: doc.active,
    totalSupplied: BigInt(doc.totalSupplied),
    totalBorrowed: BigInt(doc.totalBorrowed),
    supplyRatePerSecond: BigInt(doc.supplyRatePerSecond),
    borrowRatePerSecond: BigInt(doc.borrowRatePerSecond),
    reserveFactor: BigInt(doc.reserveFactor),
    collateralFactor: BigInt(doc.collateralFactor),
    liquidationThreshold: BigInt(doc.liquidationThreshold),
    lastUpdateTime: doc.lastUpdateTime,
    supplyIndex: BigInt(doc.supplyIndex),
    borrowIndex: BigInt(doc.borrowIndex),
  };
}

function toMarketFields(market: MarketState) {
  return {
    asset: market.asset,
    active: market.active,
    totalSupplied: market.totalSupplied.toString(),
    totalBorrowed: market.totalBorrowed.toString(),
    supplyRatePerSecond: market.supplyRatePerSecond.toString(),
    borrowRatePerSecond: market.borrowRatePerSecond.toString(),
    reserveFactor: market.reserveFactor.toString(),
    collateralFactor: market.collateralFactor.toString(),
    liquidationThreshold: market.liquidationThreshold.toString(),
    lastUpdateTime: market.lastUpdateTime,
    supplyIndex: market.supplyIndex.toString(),
    borrowIndex: market.borrowIndex.toString(),
  };
}

function toPositionState(doc: IPosition): PositionState {
  return {
    user: doc.user,
    asset: doc.asset,
    suppliedAmount: BigInt(doc.suppliedAmount),
    borrowedAmount: BigInt(doc.borrowedAmount),
    supplyIndexSnapshot: BigInt(doc.supplyIndexSnapshot),
    borrowIndexSnapshot: BigInt(doc.borrowIndexSnapshot),
    isCollateral: doc.isCollateral,
  };
}

function toPositionFields(position: PositionState) {
  return {
    user: position.user,
    asset: position.asset,
    suppliedAmount: position.suppliedAmount.toString(),
    borrowedAmount: position.borrowedAmount.toString(),
    supplyIndexSnapshot: position.supplyIndexSnapshot.toString(),
    borrowIndexSnapshot: position.borrowIndexSnapshot.toString(),
    isCollateral: position.isCollateral,
  };
}

/**
 * Mongo-backed ledger. With transactions enabled (the default) every commit runs in a
 * session transaction, which needs a replica set.
 */
export class MongoLedgerStore implements LedgerStore {
  constructor(private readonly useTransactions = true) {}

  async findMarket(asset: AssetId): Promise<MarketState | null> {
    const doc = await Market.findOne({ asset }).exec();
    return doc ? toMarketState(doc) : null;
  }

  async listMarkets(): Promise<MarketState[]> {
    const docs = await Market.find({}).sort({ createdAt: 1 }).exec();
    return docs.map(toMarketState);
  }

  async insertMarket(market: MarketState): Promise<void> {
    if (await Market.exists({ asset: market.asset })) throw new AssetAlreadyRegisteredError(market.asset);
    try {
      await Market.create(toMarketFields(market));
    } catch (err) {
      if (isDuplicateKeyError(err)) throw new AssetAlreadyRegisteredError(market.asset);
      throw err;
    }
  }

  async findPosition(user: UserId, asset: AssetId): Promise<PositionState | null> {
    const doc = await Position.findOne({ user, asset }).exec();
    return doc ? toPositionState(doc) : null;
  }

  async listTouchedAssets(user: UserId): Promise<AssetId[]> {
    const rows = await AccountAsset.find({ user }).sort({ _id: 1 }).exec();
    return rows.map((row) => row.asset);
  }

  async findPrice(asset: AssetId): Promise<bigint | null> {
    const doc = await AssetPrice.findOne({ asset }).exec();
    return doc ? BigInt(doc.price) : null;
  }

  async savePrice(asset: AssetId, price: bigint): Promise<void> {
    await AssetPrice.updateOne({ asset }, { $set: { price: price.toString() } }, { upsert: true }).exec();
  }

  async isPaused(): Promise<boolean> {
    const doc = await ProtocolSetting.findOne({ key: PROTOCOL_SETTINGS_KEY }).exec();
    return doc?.paused ?? false;
  }

  async setPaused(paused: boolean): Promise<void> {
    await ProtocolSetting.updateOne({ key: PROTOCOL_SETTINGS_KEY }, { $set: { paused } }, { upsert: true }).exec();
  }

  async commit(changes: LedgerChangeSet): Promise<void> {
    if (isEmptyChangeSet(changes)) return;
    if (!this.useTransactions) {
      await this.apply(changes);
      return;
    }
    await mongoose.connection.transaction(async (session) => {
      await this.apply(changes, session);
    });
  }

  private async apply(changes: LedgerChangeSet, session?: ClientSession): Promise<void> {
    if (changes.markets.length > 0) {
      await Market.bulkWrite(
        changes.markets.map((market) => ({
          updateOne: { filter: { asset: market.asset }, update: { $set: toMarketFields(market) }, upsert: true },
        })),
        { session }
      );
    }
    if (changes.positions.length > 0) {
      await Position.bulkWrite(
        changes.positions.map((position) => ({
          updateOne: {
            filter: { user: position.user, asset: position.asset },
            update: { $set: toPositionFields(position) },
            upsert: true,
          },
        })),
        { session }
      );
    }
    if (changes.removedPositions.length > 0) {
      await Position.bulkWrite(
        changes.removedPositions.map(({ user, asset }) => ({ deleteOne: { filter: { user, asset } } })),
        { session }
      );
    }
    if (changes.touched.length > 0) {
      await AccountAsset.bulkWrite(
        changes.touched.map(({ user, asset }) => ({
          updateOne: { filter: { user, asset }, update: { $setOnInsert: { user, asset } }, upsert: true },
        })),
        { session }
      );
    }
    if (changes.untouched.length > 0) {
      await AccountAsset.bulkWrite(
        changes.untouched.map(({ user, asset }) => ({ deleteOne: { filter: { user, asset } } })),
        { session }
      );
    }
  }
}
