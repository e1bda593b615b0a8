/** Asset identifier: "native" or "CODE:ISSUER". */
export type AssetId = string;
export type UserId = string;

/** Unix time in seconds. */
export type Timestamp = number;

export type Clock = () => Timestamp;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface MarketState {
  asset: AssetId;
  active: boolean;
  totalSupplied: bigint;
  totalBorrowed: bigint;
  supplyRatePerSecond: bigint;
  borrowRatePerSecond: bigint;
  reserveFactor: bigint;
  collateralFactor: bigint;
  liquidationThreshold: bigint;
  lastUpdateTime: Timestamp;
  supplyIndex: bigint;
  borrowIndex: bigint;
}

/**
 * Principal as of the last touch. A zero snapshot marks a position whose side
 * has never been reconciled against its market.
 */
export interface PositionState {
  user: UserId;
  asset: AssetId;
  suppliedAmount: bigint;
  borrowedAmount: bigint;
  supplyIndexSnapshot: bigint;
  borrowIndexSnapshot: bigint;
  isCollateral: boolean;
}

export interface PositionKey {
  user: UserId;
  asset: AssetId;
}

export interface LedgerChangeSet {
  markets: MarketState[];
  positions: PositionState[];
  removedPositions: PositionKey[];
  touched: PositionKey[];
  untouched: PositionKey[];
}

export interface AccountLiquidity {
  collateralValue: bigint;
  liquidationValue: bigint;
  borrowValue: bigint;
  healthFactor: bigint;
  liquidatable: boolean;
}

export interface AssetUtilization {
  asset: AssetId;
  totalSupplied: bigint;
  totalBorrowed: bigint;
  utilization: bigint;
  supplyRatePerSecond: bigint;
  borrowRatePerSecond: bigint;
  reserveFactor: bigint;
  supplyIndex: bigint;
  borrowIndex: bigint;
}

export interface PositionView {
  asset: AssetId;
  supplied: bigint;
  borrowed: bigint;
  isCollateral: boolean;
}

export interface MarketRegistration {
  asset: AssetId;
  annualSupplyRate: bigint;
  annualBorrowRate: bigint;
  reserveFactor: bigint;
  collateralFactor: bigint;
  liquidationThreshold: bigint;
  initialPrice: bigint;
}

export interface TransferOptions {
  /** Caller credential handed through to the transfer collaborator, e.g. a signing secret. */
  authorization?: string;
}

export interface LiquidationResult {
  borrower: UserId;
  liquidator: UserId;
  borrowAsset: AssetId;
  collateralAsset: AssetId;
  actualRepay: bigint;
  seizeAmount: bigint;
}

export interface RepayResult {
  repaid: bigint;
  remainingDebt: bigint;
}

/** Caller identity carried by a bearer token. */
export interface AuthenticatedUser {
  id: UserId;
  role?: string;
}
