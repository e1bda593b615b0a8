import { CLOSE_FACTOR, LIQUIDATION_INCENTIVE, SCALE } from '../config/lending';
import type { LedgerTransaction } from '../store/ledger-transaction';
import type { AssetId, LiquidationResult, UserId } from '../types';
import { min, subFloor } from '../utils/fixed-point';
import {
  InvalidAmountError,
  NoCollateralOrNoDebtError,
  NotLiquidatableError,
  SeizeExceedsCollateralError,
  SelfLiquidationDisallowedError,
} from '../utils/ledger-error';
import { accrueMarket } from './interest-accrual.service';
import { reconcileBorrow, reconcileSupply } from './position.service';
import type { PriceOracle } from './price.service';
import type { SolvencyService } from './solvency.service';

export interface LiquidationRequest {
  liquidator: UserId;
  borrower: UserId;
  borrowAsset: AssetId;
  collateralAsset: AssetId;
  repayAmount: bigint;
}

/**
 * Seized collateral for a repayment: repaid value plus the incentive, priced in the
 * collateral asset. Truncates.
 */
export function seizeAmountFor(actualRepay: bigint, borrowPrice: bigint, collateralPrice: bigint): bigint {
  return (actualRepay * borrowPrice * LIQUIDATION_INCENTIVE) / (collateralPrice * SCALE);
}

/** Largest repayment one call may make against `debt`. */
export function maxRepayFor(debt: bigint): bigint {
  return (debt * CLOSE_FACTOR) / SCALE;
}

export class LiquidationService {
  constructor(
    private readonly solvency: SolvencyService,
    private readonly oracle: PriceOracle
  ) {}

  /**
   * Repays part of an unhealthy borrower's debt on behalf of the liquidator and seizes
   * discounted collateral. Requests above the close factor are truncated, not rejected.
   * The liquidator's repayment is pulled before the commit and the seized collateral
   * pushed after it; the settlement keeps both transfers and all four balance changes
   * atomic.
   */
  async liquidate(tx: LedgerTransaction, request: LiquidationRequest): Promise<LiquidationResult> {
    const { liquidator, borrower, borrowAsset, collateralAsset, repayAmount } = request;
    if (liquidator === borrower) throw new SelfLiquidationDisallowedError();
    if (repayAmount <= 0n) throw new InvalidAmountError();

    const borrowMarket = await tx.market(borrowAsset);
    accrueMarket(borrowMarket, tx.now);
    const collateralMarket = await tx.market(collateralAsset);
    accrueMarket(collateralMarket, tx.now);

    const account = await this.solvency.evaluate(tx, borrower);
    if (!account.liquidatable) throw new NotLiquidatableError(borrower);

    const debtPosition = await tx.position(borrower, borrowAsset);
    reconcileBorrow(debtPosition, borrowMarket);
    const collateralPosition = await tx.position(borrower, collateralAsset);
    reconcileSupply(collateralPosition, collateralMarket);

    if (debtPosition.borrowedAmount === 0n) {
      throw new NoCollateralOrNoDebtError(`Borrower has no ${borrowAsset} debt`);
    }
    if (!collateralPosition.isCollateral || collateralPosition.suppliedAmount === 0n) {
      throw new NoCollateralOrNoDebtError(`Borrower has no ${collateralAsset} collateral`);
    }

    const actualRepay = min(repayAmount, maxRepayFor(debtPosition.borrowedAmount));
    if (actualRepay === 0n) throw new InvalidAmountError('Repay amount rounds down to zero under the close factor');

    const [borrowPrice, collateralPrice] = await Promise.all([
      this.oracle.price(borrowAsset),
      this.oracle.price(collateralAsset),
    ]);
    const seizeAmount = seizeAmountFor(actualRepay, borrowPrice, collateralPrice);
    if (seizeAmount > collateralPosition.suppliedAmount) throw new SeizeExceedsCollateralError();

    tx.pull(borrowAsset, liquidator, actualRepay);
    debtPosition.borrowedAmount -= actualRepay;
    borrowMarket.totalBorrowed = subFloor(borrowMarket.totalBorrowed, actualRepay);
    collateralPosition.suppliedAmount -= seizeAmount;
    collateralMarket.totalSupplied = subFloor(collateralMarket.totalSupplied, seizeAmount);
    tx.push(collateralAsset, liquidator, seizeAmount);

    return { borrower, liquidator, borrowAsset, collateralAsset, actualRepay, seizeAmount };
  }
}
