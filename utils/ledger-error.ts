/**
 * Ledger error taxonomy. Every rejection is synchronous and leaves no partial effect;
 * callers surface the error and may retry with adjusted parameters.
 * API responses share one shape: { success: false, message, code }.
 */

export type LedgerErrorCode =
  | 'InvalidAmount'
  | 'AssetNotActive'
  | 'AssetAlreadyRegistered'
  | 'InvalidRiskParameters'
  | 'InsufficientBalance'
  | 'InsufficientCollateral'
  | 'InsufficientLiquidity'
  | 'NoCollateralOrNoDebt'
  | 'SelfLiquidationDisallowed'
  | 'NotLiquidatable'
  | 'SeizeExceedsCollateral'
  | 'TransferFailed'
  | 'PriceUnavailable'
  | 'ProtocolPaused'
  | 'ReentrantCall';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly status: number;

  constructor(code: LedgerErrorCode, message: string, status = 400) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { code: LedgerErrorCode; message: string } {
    return { code: this.code, message: this.message };
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(message = 'Invalid amount: must be greater than zero') {
    super('InvalidAmount', message);
  }
}

export class AssetNotActiveError extends LedgerError {
  constructor(asset: string) {
    super('AssetNotActive', `Asset ${asset} is not an active market`, 404);
  }
}

export class AssetAlreadyRegisteredError extends LedgerError {
  constructor(asset: string) {
    super('AssetAlreadyRegistered', `Asset ${asset} is already registered`, 409);
  }
}

export class InvalidRiskParametersError extends LedgerError {
  constructor(message: string) {
    super('InvalidRiskParameters', message);
  }
}

export class InsufficientBalanceError extends LedgerError {
  constructor(message = 'Insufficient balance') {
    super('InsufficientBalance', message);
  }
}

export class InsufficientCollateralError extends LedgerError {
  constructor(message = 'Insufficient collateral') {
    super('InsufficientCollateral', message);
  }
}

export class InsufficientLiquidityError extends LedgerError {
  constructor(asset: string) {
    super('InsufficientLiquidity', `Insufficient liquidity in ${asset} market`);
  }
}

export class NoCollateralOrNoDebtError extends LedgerError {
  constructor(message: string) {
    super('NoCollateralOrNoDebt', message);
  }
}

export class SelfLiquidationDisallowedError extends LedgerError {
  constructor() {
    super('SelfLiquidationDisallowed', 'Borrowers cannot liquidate their own position');
  }
}

export class NotLiquidatableError extends LedgerError {
  constructor(user: string) {
    super('NotLiquidatable', `Account ${user} is healthy and cannot be liquidated`);
  }
}

export class SeizeExceedsCollateralError extends LedgerError {
  constructor() {
    super('SeizeExceedsCollateral', 'Seize amount exceeds the borrower collateral; reduce the repay amount');
  }
}

export class TransferFailedError extends LedgerError {
  constructor(message: string, cause?: unknown) {
    super('TransferFailed', `Transfer failed: ${message}`, 502);
    this.cause = cause;
  }
}

export class PriceUnavailableError extends LedgerError {
  constructor(asset: string) {
    super('PriceUnavailable', `No price available for ${asset}`, 503);
  }
}

export class ProtocolPausedError extends LedgerError {
  constructor() {
    super('ProtocolPaused', 'Protocol is paused; please try again later', 423);
  }
}

export class ReentrantCallError extends LedgerError {
  constructor(resource: string) {
    super('ReentrantCall', `Reentrant call rejected while ${resource} is locked`, 409);
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

/** Mongo E11000 (unique index violation). */
export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Fallback when internal details must not reach the client. */
export const GENERIC_MESSAGE = 'Something went wrong. Please try again.';

const NEVER_EXPOSE = [
  /secret|password|key|env|process\.env/i,
  /undefined|null|\[object/i,
  /at \s+\w+ \(.*\.(ts|js):/i,
  /ECONNREFUSED|ETIMEDOUT|ENOTFOUND/i,
];

/**
 * Turn any thrown value into a single user-facing message.
 * Ledger errors are written for users and pass through unchanged.
 */
export function toUserMessage(err: unknown): string {
  if (err == null) return GENERIC_MESSAGE;
  if (isLedgerError(err)) return err.message;
  const msg = describeError(err).trim();
  if (!msg || msg.length > 200) return GENERIC_MESSAGE;
  if (NEVER_EXPOSE.some((re) => re.test(msg))) return GENERIC_MESSAGE;
  return msg;
}
