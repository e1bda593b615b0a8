import { SCALE } from '../config/lending';
import type { MarketState, Timestamp } from '../types';

/**
 * Advance a market's indices to `now`, folding the elapsed interval's interest into
 * the indices and the aggregate totals. Each call compounds on the totals current at
 * call time; within one call growth is linear in elapsed time. Divisions truncate.
 *
 * Idempotent for a fixed `now`; a timestamp at or before `lastUpdateTime` is a no-op.
 */
export function accrueMarket(market: MarketState, now: Timestamp): void {
  if (now <= market.lastUpdateTime) return;
  const elapsed = BigInt(now - market.lastUpdateTime);

  if (market.totalBorrowed > 0n) {
    const borrowInterest = (market.totalBorrowed * market.borrowRatePerSecond * elapsed) / SCALE;
    market.borrowIndex += (borrowInterest * SCALE) / market.totalBorrowed;
    market.totalBorrowed += borrowInterest;
  }

  if (market.totalSupplied > 0n) {
    const supplyInterest = (market.totalSupplied * market.supplyRatePerSecond * elapsed) / SCALE;
    market.supplyIndex += (supplyInterest * SCALE) / market.totalSupplied;
    market.totalSupplied += supplyInterest;
  }

  market.lastUpdateTime = now;
}

/** What `accrueMarket` would produce at `now`, without touching the input. */
export function projectMarket(market: MarketState, now: Timestamp): MarketState {
  const projected = { ...market };
  accrueMarket(projected, now);
  return projected;
}

/** Borrowed share of supplied liquidity, scaled to SCALE; zero for an empty market. */
export function utilizationOf(market: MarketState): bigint {
  if (market.totalSupplied === 0n) return 0n;
  return (market.totalBorrowed * SCALE) / market.totalSupplied;
}

export function availableLiquidity(market: MarketState): bigint {
  return market.totalSupplied > market.totalBorrowed ? market.totalSupplied - market.totalBorrowed : 0n;
}
