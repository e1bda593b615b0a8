import type { LedgerTransaction } from '../store/ledger-transaction';
import type { AssetId, MarketState, PositionState, RepayResult, UserId } from '../types';
import { min, subFloor } from '../utils/fixed-point';
import {
  AssetNotActiveError,
  InsufficientBalanceError,
  InsufficientCollateralError,
  InsufficientLiquidityError,
  InvalidAmountError,
  NoCollateralOrNoDebtError,
} from '../utils/ledger-error';
import { accrueMarket, availableLiquidity } from './interest-accrual.service';
import type { SolvencyService } from './solvency.service';

/** principal × index / snapshot, or the bare principal for a never-reconciled side. */
function grow(principal: bigint, index: bigint, snapshot: bigint): bigint {
  if (principal === 0n || snapshot === 0n) return principal;
  return (principal * index) / snapshot;
}

export function supplyBalanceOf(position: PositionState, market: MarketState): bigint {
  return grow(position.suppliedAmount, market.supplyIndex, position.supplyIndexSnapshot);
}

export function borrowBalanceOf(position: PositionState, market: MarketState): bigint {
  return grow(position.borrowedAmount, market.borrowIndex, position.borrowIndexSnapshot);
}

/**
 * Fold interest accrued since the last touch into the supplied principal and move the
 * snapshot to the market's current index. The market must already be accrued.
 */
export function reconcileSupply(position: PositionState, market: MarketState): void {
  position.suppliedAmount = supplyBalanceOf(position, market);
  position.supplyIndexSnapshot = market.supplyIndex;
}

export function reconcileBorrow(position: PositionState, market: MarketState): void {
  position.borrowedAmount = borrowBalanceOf(position, market);
  position.borrowIndexSnapshot = market.borrowIndex;
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) throw new InvalidAmountError();
}

function requireActive(market: MarketState): void {
  if (!market.active) throw new AssetNotActiveError(market.asset);
}

/**
 * Supply, withdraw, borrow, repay and collateral toggling against a unit of work.
 * Every operation accrues the target market before reading or writing its position.
 */
export class PositionService {
  constructor(private readonly solvency: SolvencyService) {}

  async supply(tx: LedgerTransaction, user: UserId, asset: AssetId, amount: bigint): Promise<bigint> {
    requirePositive(amount);
    const market = await tx.market(asset);
    requireActive(market);
    accrueMarket(market, tx.now);

    const position = await tx.position(user, asset);
    reconcileSupply(position, market);
    position.suppliedAmount += amount;
    market.totalSupplied += amount;
    await tx.touch(user, asset);

    tx.pull(asset, user, amount);
    return position.suppliedAmount;
  }

  async withdraw(tx: LedgerTransaction, user: UserId, asset: AssetId, amount: bigint): Promise<bigint> {
    requirePositive(amount);
    const market = await tx.market(asset);
    accrueMarket(market, tx.now);

    const position = await tx.position(user, asset);
    reconcileSupply(position, market);
    if (position.suppliedAmount < amount) {
      throw new InsufficientBalanceError(`Insufficient supplied balance in ${asset}`);
    }
    if (amount > availableLiquidity(market)) throw new InsufficientLiquidityError(asset);
    if (position.isCollateral && !(await this.solvency.remainsSolventAfterWithdraw(tx, user, asset, amount))) {
      throw new InsufficientCollateralError('Withdrawal would leave the account undercollateralized');
    }

    position.suppliedAmount -= amount;
    market.totalSupplied = subFloor(market.totalSupplied, amount);

    tx.push(asset, user, amount);
    return position.suppliedAmount;
  }

  async borrow(tx: LedgerTransaction, user: UserId, asset: AssetId, amount: bigint): Promise<bigint> {
    requirePositive(amount);
    const market = await tx.market(asset);
    requireActive(market);
    accrueMarket(market, tx.now);

    if (amount > availableLiquidity(market)) throw new InsufficientLiquidityError(asset);
    if (!(await this.solvency.canBorrow(tx, user, asset, amount))) {
      throw new InsufficientCollateralError('Borrow exceeds the account borrowing capacity');
    }

    const position = await tx.position(user, asset);
    reconcileBorrow(position, market);
    position.borrowedAmount += amount;
    market.totalBorrowed += amount;
    await tx.touch(user, asset);

    tx.push(asset, user, amount);
    return position.borrowedAmount;
  }

  /** Repays min(amount, debt); overpayment is never pulled. */
  async repay(tx: LedgerTransaction, user: UserId, asset: AssetId, amount: bigint): Promise<RepayResult> {
    requirePositive(amount);
    const market = await tx.market(asset);
    accrueMarket(market, tx.now);

    const position = await tx.position(user, asset);
    reconcileBorrow(position, market);
    if (position.borrowedAmount === 0n) throw new NoCollateralOrNoDebtError(`No outstanding ${asset} debt to repay`);

    const repaid = min(amount, position.borrowedAmount);
    position.borrowedAmount -= repaid;
    market.totalBorrowed = subFloor(market.totalBorrowed, repaid);

    tx.pull(asset, user, repaid);
    return { repaid, remainingDebt: position.borrowedAmount };
  }

  async setCollateral(tx: LedgerTransaction, user: UserId, asset: AssetId, enabled: boolean): Promise<boolean> {
    const market = await tx.market(asset);
    accrueMarket(market, tx.now);

    const position = await tx.position(user, asset);
    reconcileSupply(position, market);

    if (enabled) {
      if (position.suppliedAmount === 0n) {
        throw new NoCollateralOrNoDebtError(`No supplied ${asset} balance to use as collateral`);
      }
    } else if (position.isCollateral && !(await this.solvency.remainsSolventWithoutCollateral(tx, user, asset))) {
      throw new InsufficientCollateralError('Disabling this collateral would leave the account undercollateralized');
    }

    position.isCollateral = enabled;
    return position.isCollateral;
  }
}
