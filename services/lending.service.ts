import type { LedgerStore } from '../store/ledger-store';
import { LedgerTransaction } from '../store/ledger-transaction';
import {
  type AccountLiquidity,
  type AssetId,
  type AssetUtilization,
  type Clock,
  type LiquidationResult,
  type MarketState,
  type PositionView,
  type RepayResult,
  type TransferOptions,
  type UserId,
  systemClock,
} from '../types';
import { formatUnits } from '../utils/fixed-point';
import { KeyedLock, marketKey, userKey } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import type { AssetTransfer } from './asset-transfer.service';
import { accrueMarket, projectMarket, utilizationOf } from './interest-accrual.service';
import { LiquidationService, type LiquidationRequest } from './liquidation.service';
import { PositionService, borrowBalanceOf, supplyBalanceOf } from './position.service';
import { type PriceOracle, StoredPriceOracle } from './price.service';
import { SettlementService } from './settlement.service';
import { SolvencyService } from './solvency.service';

export interface LendingServiceDeps {
  store: LedgerStore;
  transfer: AssetTransfer;
  oracle?: PriceOracle;
  clock?: Clock;
  locks?: KeyedLock;
}

/**
 * Public face of the ledger. Mutating calls run through the settlement (locks, pause,
 * atomic commit with transfers); reads project indices without writing anything.
 */
export class LendingService {
  readonly store: LedgerStore;
  readonly settlement: SettlementService;
  readonly solvency: SolvencyService;
  private readonly positions: PositionService;
  private readonly liquidations: LiquidationService;
  private readonly clock: Clock;

  constructor(deps: LendingServiceDeps) {
    const oracle = deps.oracle ?? new StoredPriceOracle(deps.store);
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.settlement = new SettlementService(deps.store, deps.transfer, this.clock, deps.locks ?? new KeyedLock());
    this.solvency = new SolvencyService(oracle);
    this.positions = new PositionService(this.solvency);
    this.liquidations = new LiquidationService(this.solvency, oracle);
  }

  async supply(user: UserId, asset: AssetId, amount: bigint, options?: TransferOptions): Promise<bigint> {
    const supplied = await this.settlement.run(
      [userKey(user), marketKey(asset)],
      (tx) => this.positions.supply(tx, user, asset, amount),
      options
    );
    logger.success(`Supply: ${user} supplied ${formatUnits(amount)} ${asset}`);
    return supplied;
  }

  async withdraw(user: UserId, asset: AssetId, amount: bigint, options?: TransferOptions): Promise<bigint> {
    const supplied = await this.settlement.run(
      [userKey(user), marketKey(asset)],
      (tx) => this.positions.withdraw(tx, user, asset, amount),
      options
    );
    logger.success(`Withdraw: ${user} withdrew ${formatUnits(amount)} ${asset}`);
    return supplied;
  }

  async borrow(user: UserId, asset: AssetId, amount: bigint, options?: TransferOptions): Promise<bigint> {
    const borrowed = await this.settlement.run(
      [userKey(user), marketKey(asset)],
      (tx) => this.positions.borrow(tx, user, asset, amount),
      options
    );
    logger.success(`Borrow: ${user} borrowed ${formatUnits(amount)} ${asset}`);
    return borrowed;
  }

  async repay(user: UserId, asset: AssetId, amount: bigint, options?: TransferOptions): Promise<RepayResult> {
    const result = await this.settlement.run(
      [userKey(user), marketKey(asset)],
      (tx) => this.positions.repay(tx, user, asset, amount),
      options
    );
    logger.success(`Repay: ${user} repaid ${formatUnits(result.repaid)} ${asset}`);
    return result;
  }

  async setCollateral(user: UserId, asset: AssetId, enabled: boolean): Promise<boolean> {
    const isCollateral = await this.settlement.run([userKey(user), marketKey(asset)], (tx) =>
      this.positions.setCollateral(tx, user, asset, enabled)
    );
    logger.success(`Collateral: ${user} ${enabled ? 'enabled' : 'disabled'} ${asset}`);
    return isCollateral;
  }

  async liquidate(request: LiquidationRequest, options?: TransferOptions): Promise<LiquidationResult> {
    const keys = [
      userKey(request.liquidator),
      userKey(request.borrower),
      marketKey(request.borrowAsset),
      marketKey(request.collateralAsset),
    ];
    const result = await this.settlement.run(keys, (tx) => this.liquidations.liquidate(tx, request), options);
    logger.success(
      `Liquidation: ${result.liquidator} repaid ${formatUnits(result.actualRepay)} ${result.borrowAsset} ` +
        `for ${result.borrower}, seized ${formatUnits(result.seizeAmount)} ${result.collateralAsset}`
    );
    return result;
  }

  /** Bring a market's indices current; callable by anyone, any number of times. */
  async accrue(asset: AssetId): Promise<MarketState> {
    return this.settlement.run([marketKey(asset)], async (tx) => {
      const market = await tx.market(asset);
      accrueMarket(market, tx.now);
      return { ...market };
    });
  }

  async getSupplyBalance(user: UserId, asset: AssetId): Promise<bigint> {
    const reader = this.reader();
    const market = projectMarket(await reader.market(asset), reader.now);
    return supplyBalanceOf(await reader.position(user, asset), market);
  }

  async getBorrowBalance(user: UserId, asset: AssetId): Promise<bigint> {
    const reader = this.reader();
    const market = projectMarket(await reader.market(asset), reader.now);
    return borrowBalanceOf(await reader.position(user, asset), market);
  }

  async getAccountLiquidity(user: UserId): Promise<AccountLiquidity> {
    return this.solvency.evaluate(this.reader(), user);
  }

  async getAssetUtilization(asset: AssetId): Promise<AssetUtilization> {
    const reader = this.reader();
    const market = projectMarket(await reader.market(asset), reader.now);
    return {
      asset,
      totalSupplied: market.totalSupplied,
      totalBorrowed: market.totalBorrowed,
      utilization: utilizationOf(market),
      supplyRatePerSecond: market.supplyRatePerSecond,
      borrowRatePerSecond: market.borrowRatePerSecond,
      reserveFactor: market.reserveFactor,
      supplyIndex: market.supplyIndex,
      borrowIndex: market.borrowIndex,
    };
  }

  async getMarket(asset: AssetId): Promise<MarketState> {
    const reader = this.reader();
    return projectMarket(await reader.market(asset), reader.now);
  }

  async listMarkets(): Promise<MarketState[]> {
    const now = this.clock();
    const markets = await this.store.listMarkets();
    return markets.map((market) => projectMarket(market, now));
  }

  async getPositions(user: UserId): Promise<PositionView[]> {
    const reader = this.reader();
    const views: PositionView[] = [];
    for (const asset of await reader.touchedAssets(user)) {
      const market = projectMarket(await reader.market(asset), reader.now);
      const position = await reader.position(user, asset);
      views.push({
        asset,
        supplied: supplyBalanceOf(position, market),
        borrowed: borrowBalanceOf(position, market),
        isCollateral: position.isCollateral,
      });
    }
    return views;
  }

  /** A unit of work that is never committed. */
  private reader(): LedgerTransaction {
    return new LedgerTransaction(this.store, this.clock());
  }
}
