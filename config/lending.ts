/** Fixed-point unit: 1e18 represents 1.0 for amounts, prices, rates and indices. */
export const SCALE = 10n ** 18n;

export const SECONDS_PER_YEAR = 31_536_000n;

/** Share of a single debt position one liquidation call may repay (50%). */
export const CLOSE_FACTOR = SCALE / 2n;

/** Collateral premium paid to liquidators (8%). */
export const LIQUIDATION_INCENTIVE = (SCALE * 108n) / 100n;

/** Health factor reported for accounts without debt. */
export const MAX_HEALTH_FACTOR = 2n ** 256n - 1n;

/**
 * Per-second rate derived from an annual rate, e.g. 8e16 (8%) / 31536000.
 * Truncates; the remainder is never charged.
 */
export function ratePerSecond(annualRate: bigint): bigint {
  return annualRate / SECONDS_PER_YEAR;
}
