import type { AssetId, TransferOptions, UserId } from '../types';
import { InsufficientBalanceError, InvalidAmountError } from '../utils/ledger-error';

/**
 * Moves value between a user's wallet and protocol custody. Each call is all-or-nothing.
 */
export interface AssetTransfer {
  /** Debit `from` into custody; fails when the balance (or authorization) is insufficient. */
  pull(asset: AssetId, from: UserId, amount: bigint, options?: TransferOptions): Promise<void>;
  /** Credit `to` out of custody. */
  push(asset: AssetId, to: UserId, amount: bigint, options?: TransferOptions): Promise<void>;
}

export const CUSTODY_ACCOUNT = 'custody';

/** Custodial balances per (account, asset). */
export interface WalletBook {
  balanceOf(account: string, asset: AssetId): Promise<bigint>;
  credit(account: string, asset: AssetId, amount: bigint): Promise<void>;
  /** Atomic debit-and-credit; rejects without effect when `from` is short. */
  move(asset: AssetId, from: string, to: string, amount: bigint): Promise<void>;
}

const walletKey = (account: string, asset: AssetId) => `${account}|${asset}`;

export class MemoryWalletBook implements WalletBook {
  private balances = new Map<string, bigint>();

  async balanceOf(account: string, asset: AssetId): Promise<bigint> {
    return this.balances.get(walletKey(account, asset)) ?? 0n;
  }

  async credit(account: string, asset: AssetId, amount: bigint): Promise<void> {
    if (amount <= 0n) throw new InvalidAmountError();
    const key = walletKey(account, asset);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  async move(asset: AssetId, from: string, to: string, amount: bigint): Promise<void> {
    const fromKey = walletKey(from, asset);
    const available = this.balances.get(fromKey) ?? 0n;
    if (available < amount) {
      throw new InsufficientBalanceError(`Insufficient ${asset} wallet balance for ${from}`);
    }
    this.balances.set(fromKey, available - amount);
    const toKey = walletKey(to, asset);
    this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
  }
}

/**
 * Transfers settled inside a custodial wallet book: pulls move user funds into the
 * custody account, pushes move them back out.
 */
export class WalletAssetTransfer implements AssetTransfer {
  constructor(
    private readonly book: WalletBook,
    private readonly custody: string = CUSTODY_ACCOUNT
  ) {}

  async pull(asset: AssetId, from: UserId, amount: bigint): Promise<void> {
    await this.book.move(asset, from, this.custody, amount);
  }

  async push(asset: AssetId, to: UserId, amount: bigint): Promise<void> {
    await this.book.move(asset, this.custody, to, amount);
  }
}
