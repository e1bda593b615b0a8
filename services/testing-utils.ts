import { MemoryLedgerStore } from '../store/memory-ledger-store';
import type { AssetId, MarketRegistration, UserId } from '../types';
import { parseUnits } from '../utils/fixed-point';
import { AdminService } from './admin.service';
import { type AssetTransfer, MemoryWalletBook, WalletAssetTransfer } from './asset-transfer.service';
import { LendingService } from './lending.service';

export const T0 = 1_700_000_000;
export const ONE_YEAR = 31_536_000;

export const units = (value: string) => parseUnits(value);

/** Wallet transfers with switches for failing calls and a hook that runs inside a pull. */
export class ScriptedTransfer implements AssetTransfer {
  onPull?: () => Promise<void>;
  private pullFailures = 0;
  private pushFailures = 0;
  private readonly inner: WalletAssetTransfer;

  constructor(book: MemoryWalletBook) {
    this.inner = new WalletAssetTransfer(book);
  }

  failNextPulls(count = 1): void {
    this.pullFailures = count;
  }

  failNextPushes(count = 1): void {
    this.pushFailures = count;
  }

  async pull(asset: AssetId, from: UserId, amount: bigint): Promise<void> {
    if (this.onPull) await this.onPull();
    if (this.pullFailures > 0) {
      this.pullFailures -= 1;
      throw new Error('pull rejected by network');
    }
    await this.inner.pull(asset, from, amount);
  }

  async push(asset: AssetId, to: UserId, amount: bigint): Promise<void> {
    if (this.pushFailures > 0) {
      this.pushFailures -= 1;
      throw new Error('push rejected by network');
    }
    await this.inner.push(asset, to, amount);
  }
}

export function marketParams(asset: AssetId, overrides: Partial<MarketRegistration> = {}): MarketRegistration {
  return {
    asset,
    annualSupplyRate: 0n,
    annualBorrowRate: 0n,
    reserveFactor: units('0.1'),
    collateralFactor: units('0.8'),
    liquidationThreshold: units('0.85'),
    initialPrice: units('1'),
    ...overrides,
  };
}

/** A complete ledger over in-memory storage with a manual clock starting at T0. */
export function createLedger() {
  let now = T0;
  const clock = () => now;
  const store = new MemoryLedgerStore();
  const wallets = new MemoryWalletBook();
  const transfer = new ScriptedTransfer(wallets);
  const lending = new LendingService({ store, transfer, clock });
  const admin = new AdminService({ store, settlement: lending.settlement, clock, wallets });

  return {
    store,
    wallets,
    transfer,
    lending,
    admin,
    advance: (seconds: number) => {
      now += seconds;
    },
    /** Credits a wallet with the given human amount. */
    fund: (account: UserId, asset: AssetId, amount: string) => wallets.credit(account, asset, units(amount)),
  };
}

export type Ledger = ReturnType<typeof createLedger>;
