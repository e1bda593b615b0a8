import { SCALE } from '../config/lending';
import { InvalidAmountError } from './ledger-error';

const DECIMALS = 18;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/** a - b, floored at zero. Aggregate totals may carry index rounding dust. */
export function subFloor(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/**
 * Parse a human decimal string ("1000.5") into an 18-decimal fixed-point value.
 */
export function parseUnits(value: string): bigint {
  const trimmed = value.trim();
  const match = DECIMAL_PATTERN.exec(trimmed);
  if (!match) throw new InvalidAmountError(`Invalid amount: ${value}`);
  const whole = match[1];
  const fraction = match[2] ?? '';
  if (fraction.length > DECIMALS) {
    throw new InvalidAmountError(`Invalid amount: at most ${DECIMALS} decimals are supported`);
  }
  return BigInt(whole) * SCALE + BigInt(fraction.padEnd(DECIMALS, '0'));
}

/** Format an 18-decimal fixed-point value, trimming trailing zeros. */
export function formatUnits(value: bigint, maxDecimals: number = DECIMALS): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / SCALE;
  const fraction = (abs % SCALE).toString().padStart(DECIMALS, '0').slice(0, maxDecimals).replace(/0+$/, '');
  const body = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}
