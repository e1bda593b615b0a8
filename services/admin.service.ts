import { SCALE, ratePerSecond } from '../config/lending';
import type { LedgerStore } from '../store/ledger-store';
import { type AssetId, type Clock, type MarketRegistration, type MarketState, systemClock } from '../types';
import { formatUnits } from '../utils/fixed-point';
import { marketKey } from '../utils/keyed-lock';
import { AssetNotActiveError, InvalidAmountError, InvalidRiskParametersError, LedgerError } from '../utils/ledger-error';
import { logger } from '../utils/logger';
import type { WalletBook } from './asset-transfer.service';
import { accrueMarket } from './interest-accrual.service';
import type { SettlementService } from './settlement.service';

export interface AdminServiceDeps {
  store: LedgerStore;
  settlement: SettlementService;
  clock?: Clock;
  wallets?: WalletBook;
}

export function validateRiskParameters(params: MarketRegistration): void {
  if (!params.asset.trim()) throw new InvalidRiskParametersError('Asset identifier is required');
  if (params.annualSupplyRate < 0n || params.annualBorrowRate < 0n) {
    throw new InvalidRiskParametersError('Rates cannot be negative');
  }
  if (params.reserveFactor < 0n || params.reserveFactor > SCALE) {
    throw new InvalidRiskParametersError('Reserve factor must be between 0 and 1');
  }
  if (params.collateralFactor < 0n || params.collateralFactor >= params.liquidationThreshold) {
    throw new InvalidRiskParametersError('Collateral factor must be below the liquidation threshold');
  }
  if (params.liquidationThreshold > SCALE) {
    throw new InvalidRiskParametersError('Liquidation threshold cannot exceed 1');
  }
  if (params.initialPrice <= 0n) throw new InvalidRiskParametersError('Initial price must be greater than zero');
}

/**
 * Market admission, price feed writes, rate changes, the global pause, and wallet
 * funding for the custodial transfer mode.
 */
export class AdminService {
  private readonly store: LedgerStore;
  private readonly settlement: SettlementService;
  private readonly clock: Clock;
  private readonly wallets?: WalletBook;

  constructor(deps: AdminServiceDeps) {
    this.store = deps.store;
    this.settlement = deps.settlement;
    this.clock = deps.clock ?? systemClock;
    this.wallets = deps.wallets;
  }

  async registerMarket(params: MarketRegistration): Promise<MarketState> {
    validateRiskParameters(params);
    const asset = params.asset.trim();
    return this.settlement.exclusive([marketKey(asset)], async () => {
      const market: MarketState = {
        asset,
        active: true,
        totalSupplied: 0n,
        totalBorrowed: 0n,
        supplyRatePerSecond: ratePerSecond(params.annualSupplyRate),
        borrowRatePerSecond: ratePerSecond(params.annualBorrowRate),
        reserveFactor: params.reserveFactor,
        collateralFactor: params.collateralFactor,
        liquidationThreshold: params.liquidationThreshold,
        lastUpdateTime: this.clock(),
        supplyIndex: SCALE,
        borrowIndex: SCALE,
      };
      await this.store.insertMarket(market);
      await this.store.savePrice(asset, params.initialPrice);
      logger.success(`Market registered: ${asset} (price ${formatUnits(params.initialPrice)})`);
      return market;
    });
  }

  async setPrice(asset: AssetId, price: bigint): Promise<void> {
    if (price <= 0n) throw new InvalidRiskParametersError('Price must be greater than zero');
    await this.settlement.exclusive([marketKey(asset)], async () => {
      if (!(await this.store.findMarket(asset))) throw new AssetNotActiveError(asset);
      await this.store.savePrice(asset, price);
    });
    logger.info(`Price updated: ${asset} = ${formatUnits(price)}`);
  }

  /** Accrues at the old rates up to now, then switches to the new ones. */
  async updateRates(asset: AssetId, annualSupplyRate: bigint, annualBorrowRate: bigint): Promise<MarketState> {
    if (annualSupplyRate < 0n || annualBorrowRate < 0n) throw new InvalidRiskParametersError('Rates cannot be negative');
    const market = await this.settlement.run(
      [marketKey(asset)],
      async (tx) => {
        const working = await tx.market(asset);
        accrueMarket(working, tx.now);
        working.supplyRatePerSecond = ratePerSecond(annualSupplyRate);
        working.borrowRatePerSecond = ratePerSecond(annualBorrowRate);
        return { ...working };
      },
      { bypassPause: true }
    );
    logger.info(`Rates updated: ${asset}`);
    return market;
  }

  async setPaused(paused: boolean): Promise<void> {
    await this.store.setPaused(paused);
    logger.warn(`Protocol ${paused ? 'paused' : 'unpaused'}`);
  }

  async isPaused(): Promise<boolean> {
    return this.store.isPaused();
  }

  /** Funds a custodial wallet; only available when transfers settle in the wallet book. */
  async creditWallet(account: string, asset: AssetId, amount: bigint): Promise<bigint> {
    if (!this.wallets) {
      throw new LedgerError('TransferFailed', 'Wallet funding is only available in wallet transfer mode', 400);
    }
    if (amount <= 0n) throw new InvalidAmountError();
    if (!(await this.store.findMarket(asset))) throw new AssetNotActiveError(asset);
    await this.wallets.credit(account, asset, amount);
    return this.wallets.balanceOf(account, asset);
  }
}
