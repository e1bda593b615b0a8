import mongoose, { type ClientSession } from 'mongoose';
import { WalletBalance } from '../models/WalletBalance';
import type { WalletBook } from '../services/asset-transfer.service';
import type { AssetId } from '../types';
import { InsufficientBalanceError, InvalidAmountError } from '../utils/ledger-error';

/** Custodial wallet balances persisted in the WalletBalance collection. */
export class MongoWalletBook implements WalletBook {
  constructor(private readonly useTransactions = true) {}

  async balanceOf(account: string, asset: AssetId): Promise<bigint> {
    return this.read(account, asset);
  }

  async credit(account: string, asset: AssetId, amount: bigint): Promise<void> {
    if (amount <= 0n) throw new InvalidAmountError();
    await this.atomically(async (session) => {
      const current = await this.read(account, asset, session);
      await this.write(account, asset, current + amount, session);
    });
  }

  async move(asset: AssetId, from: string, to: string, amount: bigint): Promise<void> {
    await this.atomically(async (session) => {
      const available = await this.read(from, asset, session);
      if (available < amount) {
        throw new InsufficientBalanceError(`Insufficient ${asset} wallet balance for ${from}`);
      }
      await this.write(from, asset, available - amount, session);
      const received = await this.read(to, asset, session);
      await this.write(to, asset, received + amount, session);
    });
  }

  private async atomically(work: (session?: ClientSession) => Promise<void>): Promise<void> {
    if (!this.useTransactions) {
      await work();
      return;
    }
    await mongoose.connection.transaction(async (session) => {
      await work(session);
    });
  }

  private async read(account: string, asset: AssetId, session?: ClientSession): Promise<bigint> {
    const doc = await WalletBalance.findOne({ account, asset }).session(session ?? null).exec();
    return doc ? BigInt(doc.amount) : 0n;
  }

  private async write(account: string, asset: AssetId, amount: bigint, session?: ClientSession): Promise<void> {
    await WalletBalance.updateOne({ account, asset }, { $set: { amount: amount.toString() } }, { upsert: true, session }).exec();
  }
}
