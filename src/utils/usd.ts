import { GasOptimizerError } from './errors';

/** 1 USD in fixed-point units. */
export const USD_DECIMALS = 18;
export const USD_SCALE = 10n ** 18n;
export const BPS_DENOMINATOR = 10_000n;

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parses a decimal string such as "12.5" into 18-decimal fixed point.
 * Digits beyond the 18th decimal are truncated.
 */
export function parseUsd(value: string): bigint {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new GasOptimizerError('InvalidConfiguration', `Invalid USD amount: "${value}"`);
  }
  const whole = match[1];
  const fraction = (match[2] ?? '').slice(0, USD_DECIMALS).padEnd(USD_DECIMALS, '0');
  return BigInt(whole) * USD_SCALE + BigInt(fraction);
}

export function usdFromNumber(value: number): bigint {
  if (!Number.isFinite(value) || value < 0) {
    throw new GasOptimizerError('InvalidConfiguration', `Invalid USD amount: ${value}`);
  }
  return parseUsd(value.toFixed(12));
}

export function formatUsd(value: bigint, decimals: number = 2): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / USD_SCALE;
  const fraction = (abs % USD_SCALE).toString().padStart(USD_DECIMALS, '0').slice(0, decimals);
  const body = decimals > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

export function applyBps(amount: bigint, bps: number): bigint {
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

/** `part / whole` in basis points, rounded down. Zero when `whole` is zero. */
export function toBps(part: bigint, whole: bigint): number {
  if (whole === 0n) {
    return 0;
  }
  return Number((part * BPS_DENOMINATOR) / whole);
}
