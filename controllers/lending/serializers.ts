import { MAX_HEALTH_FACTOR } from '../../config/lending';
import type {
  AccountLiquidity,
  AssetUtilization,
  LiquidationResult,
  MarketState,
  PositionView,
  RepayResult,
} from '../../types';
import { formatUnits } from '../../utils/fixed-point';

export const serializeMarket = (market: MarketState) => ({
  asset: market.asset,
  active: market.active,
  totalSupplied: formatUnits(market.totalSupplied),
  totalBorrowed: formatUnits(market.totalBorrowed),
  supplyRatePerSecond: formatUnits(market.supplyRatePerSecond),
  borrowRatePerSecond: formatUnits(market.borrowRatePerSecond),
  reserveFactor: formatUnits(market.reserveFactor),
  collateralFactor: formatUnits(market.collateralFactor),
  liquidationThreshold: formatUnits(market.liquidationThreshold),
  supplyIndex: formatUnits(market.supplyIndex),
  borrowIndex: formatUnits(market.borrowIndex),
  lastUpdateTime: market.lastUpdateTime,
});

export const serializeUtilization = (view: AssetUtilization) => ({
  asset: view.asset,
  totalSupplied: formatUnits(view.totalSupplied),
  totalBorrowed: formatUnits(view.totalBorrowed),
  utilization: formatUnits(view.utilization),
  supplyRatePerSecond: formatUnits(view.supplyRatePerSecond),
  borrowRatePerSecond: formatUnits(view.borrowRatePerSecond),
  reserveFactor: formatUnits(view.reserveFactor),
  supplyIndex: formatUnits(view.supplyIndex),
  borrowIndex: formatUnits(view.borrowIndex),
});

export const serializeLiquidity = (user: string, liquidity: AccountLiquidity) => ({
  user,
  collateralValue: formatUnits(liquidity.collateralValue),
  liquidationValue: formatUnits(liquidity.liquidationValue),
  borrowValue: formatUnits(liquidity.borrowValue),
  // no debt: unbounded
  healthFactor: liquidity.healthFactor === MAX_HEALTH_FACTOR ? 'infinite' : formatUnits(liquidity.healthFactor),
  liquidatable: liquidity.liquidatable,
});

export const serializePosition = (view: PositionView) => ({
  asset: view.asset,
  supplied: formatUnits(view.supplied),
  borrowed: formatUnits(view.borrowed),
  isCollateral: view.isCollateral,
});

export const serializeRepay = (result: RepayResult) => ({
  repaid: formatUnits(result.repaid),
  remainingDebt: formatUnits(result.remainingDebt),
});

export const serializeLiquidation = (result: LiquidationResult) => ({
  borrower: result.borrower,
  liquidator: result.liquidator,
  borrowAsset: result.borrowAsset,
  collateralAsset: result.collateralAsset,
  actualRepay: formatUnits(result.actualRepay),
  seizeAmount: formatUnits(result.seizeAmount),
});
